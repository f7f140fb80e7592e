/**
 * @strongbox/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ZodError } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Persistence
  STRONGBOX_DATA_FILE: z.string().min(1).default("accounts.json"),
  STRONGBOX_ON_CORRUPT: z.enum(["fallback", "throw"]).default("fallback"),

  // Domain defaults
  STRONGBOX_DECIMALS: z.coerce.number().int().min(0).max(8).default(6),
  STRONGBOX_STATEMENT_SIZE: z.coerce.number().int().min(1).default(10),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * One line per invalid variable: "NAME: problem".
 */
export function formatConfigError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
}
