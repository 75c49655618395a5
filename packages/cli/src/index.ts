/**
 * @splitrelay/cli — Command-line front end for the forwarding service.
 */

export { runCli, parseCommand, UsageError, USAGE, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from "./cli.js";
export type { CliDeps, ParsedCommand, ForwardCommand, ServiceOverrides } from "./cli.js";
export { consoleOutput, ok, info, warn, fail, heading } from "./output.js";
export type { Output } from "./output.js";
