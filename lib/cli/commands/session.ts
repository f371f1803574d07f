/**
 * `cv-cue session login|status|clear`
 */

import { parseArgs } from "node:util";
import { withCvCueClient } from "../../infrastructure/cvcue/client/cvcue-client";
import { formatJson } from "../../formatters/managed-device-formatter";
import { parseOrUsage, VERBOSE_OPTION } from "../args";
import { applyCommandVerbosity, createCliLogger, type CliContext } from "../context";

function parseSessionArgs(args: string[], ctx: CliContext): CliContext {
  const values = parseOrUsage(() =>
    parseArgs({ args, options: { ...VERBOSE_OPTION }, strict: true, allowPositionals: false }).values,
  );
  return applyCommandVerbosity(ctx, values.verbose);
}

export async function sessionLogin(args: string[], parent: CliContext): Promise<number> {
  const ctx = parseSessionArgs(args, parent);
  const { io, verbose } = ctx;

  return withCvCueClient({ ...ctx.clientOptions, logger: createCliLogger(io, verbose) }, async (client) => {
    if (verbose) {
      io.out("Attempting to login...");
    }
    const response = await client.login();
    io.out("✓ Login successful");
    if (verbose) {
      io.out(formatJson(response));
    }
    return 0;
  });
}

export async function sessionStatus(args: string[], parent: CliContext): Promise<number> {
  const ctx = parseSessionArgs(args, parent);
  const { io, verbose } = ctx;

  return withCvCueClient({ ...ctx.clientOptions, logger: createCliLogger(io, verbose) }, async (client) => {
    if (await client.isSessionActive()) {
      io.out("✓ Session is active");
    } else {
      io.out("✗ Session is not active");
      io.out("Run 'cv-cue session login' to create a new session");
    }
    return 0;
  });
}

export async function sessionClear(args: string[], parent: CliContext): Promise<number> {
  const ctx = parseSessionArgs(args, parent);
  const { io, verbose } = ctx;

  return withCvCueClient({ ...ctx.clientOptions, logger: createCliLogger(io, verbose) }, async (client) => {
    if (await client.clearSession()) {
      io.out("✓ Session cache cleared");
      return 0;
    }
    io.err(`✗ Failed to clear session cache: ${client.sessionFile}`);
    return 1;
  });
}
