/**
 * CV-CUE command-line interface
 *
 *   cv-cue [-v] session login|status|clear
 *   cv-cue [-v] managed-devices list-aps|get-all-aps [options]
 */

import { UsageError } from "./args";
import { getAllAps, listAps } from "./commands/managed-devices";
import { sessionClear, sessionLogin, sessionStatus } from "./commands/session";
import { processIO, type CliContext, type CliIO } from "./context";
import type { CvCueClientOptions } from "../infrastructure/cvcue/client/cvcue-client";

type Command = (args: string[], ctx: CliContext) => Promise<number>;

const COMMANDS: Record<string, Record<string, Command>> = {
  session: {
    login: sessionLogin,
    status: sessionStatus,
    clear: sessionClear,
  },
  "managed-devices": {
    "list-aps": listAps,
    "get-all-aps": getAllAps,
  },
};

export const USAGE = `Usage: cv-cue [--verbose] <group> <command> [options]

Session management:
  session login                 Login and create a new session
  session status                Check session status
  session clear                 Clear cached session

Managed devices (Access Points):
  managed-devices list-aps      List one page of managed devices
    --pagesize <n>              Number of results per page (default: 10)
    --startindex <n>            Start index for pagination (default: 0)
    --total-count               Include total count in response
    --sortby <field>            Field to sort by (default: boxid)
    --ascending | --descending  Sort order (default: ascending)
    --active <true|false>       Filter by active status
    --model <model>             Filter by model (repeatable)
    --name <name>               Filter by name (repeatable)
    --filter <p:op:value>       Advanced filter, e.g. name:contains:Arista (repeatable)
    --filter-operator <AND|OR>  Logical operator for filters (default: AND)
    -o, --output <format>       json | table | compact (default: json)

  managed-devices get-all-aps   Get all managed devices across all pages
    --pagesize <n>              Number of results per page (default: 100)
    --active <true|false>       Filter by active status
    --model <model>             Filter by model (repeatable)
    --filter <p:op:value>       Advanced filter (repeatable)
    --filter-operator <AND|OR>  Logical operator for filters (default: AND)
    --max-pages <n>             Fail instead of requesting more than n pages
    -o, --output <format>       json | count (default: json)

Environment: CV_CUE_KEY_ID, CV_CUE_KEY_VALUE, CV_CUE_CLIENT_ID, CV_CUE_BASE_URL,
             CV_CUE_SESSION_FILE, CV_CUE_TIMEOUT_MS`;

export interface RunOptions {
  io?: CliIO;
  clientOptions?: CvCueClientOptions;
}

/**
 * Run the CLI and resolve to the process exit code:
 * 0 on success, 1 on a failed operation, 2 on a usage error
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const args = [...argv];

  let verbose = false;
  while (args[0] !== undefined && args[0].startsWith("-")) {
    const flag = args.shift();
    if (flag === "-v" || flag === "--verbose") {
      verbose = true;
    } else if (flag === "-h" || flag === "--help") {
      io.out(USAGE);
      return 0;
    } else {
      io.err(`Unknown option: ${flag}`);
      io.err(USAGE);
      return 2;
    }
  }

  const [group, name, ...rest] = args;
  const command = group !== undefined && name !== undefined ? COMMANDS[group]?.[name] : undefined;
  if (!command) {
    io.err(group ? `Unknown command: ${[group, name].filter(Boolean).join(" ")}` : "Missing command");
    io.err(USAGE);
    return 2;
  }

  const ctx: CliContext = { io, verbose, clientOptions: options.clientOptions ?? {} };

  try {
    return await command(rest, ctx);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`✗ ${error.message}`);
      return 2;
    }

    io.err(`✗ Error: ${error instanceof Error ? error.message : String(error)}`);
    if (ctx.verbose && error instanceof Error && error.stack) {
      io.err(error.stack);
    }
    return 1;
  }
}
