// @blockpaint/cli — Command-line entry points
export { parseArgs, printHelp, HELP_TEXT } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { getOutputSize, FALLBACK_SIZE } from "./terminal-size.js";
export type { SizedStream } from "./terminal-size.js";
export { main, run, formatError, effectiveSettings, VERSION } from "./main.js";
export type { MainIO } from "./main.js";
