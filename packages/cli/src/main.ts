/**
 * @strongbox/cli — Entry point.
 *
 * Loads config, builds the root logger and runs one command.
 */

import { ZodError } from "zod";
import { formatConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { EXIT_USAGE, runCli } from "./cli.js";
import { createLogger } from "./logger.js";

function main(): number {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ZodError) {
      process.stderr.write(`Invalid configuration:\n${formatConfigError(err)}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const logger = createLogger(config);
  return runCli(process.argv.slice(2), {
    config,
    logger,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

process.exitCode = main();
