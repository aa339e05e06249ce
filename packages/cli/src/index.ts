/**
 * @datamask/cli - programmatic access to the datamask command.
 */

export { EXIT_OK, EXIT_PROBLEM, EXIT_USAGE, VERSION, runCli } from "./run.js";
export type { CliIo } from "./run.js";
export { getHelp, isError, parseArgs } from "./args.js";
export type { HelpArgs, MaskArgs, ParseError, ParseResult, ParsedArgs, VersionArgs } from "./args.js";
