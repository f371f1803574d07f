import type { CvCueClientOptions } from "../infrastructure/cvcue/client/cvcue-client";
import type { CvCueLogger } from "../infrastructure/cvcue/logger";

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface CliContext {
  io: CliIO;
  verbose: boolean;
  /** Passed to every client the CLI creates (credentials, env, fetch...) */
  clientOptions: CvCueClientOptions;
}

/**
 * Fold a command's own --verbose flag into the shared context, so the runner
 * sees the verbosity the command actually used
 */
export function applyCommandVerbosity(ctx: CliContext, verbose: boolean | undefined): CliContext {
  if (verbose === true) {
    ctx.verbose = true;
  }
  return ctx;
}

export const processIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Library log lines go to stderr so stdout stays parseable.
 * Info and error lines only show with --verbose; the CLI reports failures itself.
 */
export function createCliLogger(io: CliIO, verbose: boolean): CvCueLogger {
  return {
    info: verbose ? (message) => io.err(message) : undefined,
    warn: (message) => io.err(`Warning: ${message}`),
    error: verbose ? (message) => io.err(message) : undefined,
  };
}
