export { run, USAGE, type RunOptions } from "./run";
export type { CliContext, CliIO } from "./context";
