/**
 * @pocketbook/cli — Command-line front end for a pocketbook ledger.
 */

export { runCli, helpText, PROGRAM } from "./cli.js";
export type { CliOutput } from "./cli.js";
export { COMMANDS, OPTIONS } from "./commands.js";
export type { Command, CommandContext, FileAccess, Flags } from "./commands.js";
export { ConfigSchema, loadConfig } from "./config.js";
export type { CliConfig } from "./config.js";
export { createLogger, mutationLogger } from "./logger.js";
