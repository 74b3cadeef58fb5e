/**
 * @fxwallet/cli — Shell, command parser and output formatting.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger, createActionLogger } from "./logger.js";
export type { LoggerConfig } from "./logger.js";

export { parseCommand, tokenize, CommandError, COMMANDS } from "./commands.js";
export type { Command, CommandName, CommandErrorCode, CommandHelp } from "./commands.js";

export { Formatter, groupThousands } from "./format.js";
export type { Align } from "./format.js";

export { Shell } from "./shell.js";
export type { ShellOptions, ShellOutcome, Writer } from "./shell.js";
