/**
 * @strongbox/cli — Command-line front end.
 *
 * @packageDocumentation
 */

export { ConfigSchema, loadConfig, formatConfigError } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { runCli, usage, UsageError, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from "./cli.js";
export type { CliContext, Output } from "./cli.js";
