/**
 * @pocketbook/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  POCKETBOOK_DB: z.string().min(1).default("pocketbook.db"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Ledger
  LEDGER_DECIMALS: z.coerce.number().int().min(0).max(6).default(2),
  SEARCH_LIMIT: z.coerce.number().int().min(1).default(200),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}
