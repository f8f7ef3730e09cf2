/**
 * @tally/service — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAmount } from "@tally/types";
import type { RetentionPolicy } from "@tally/reports";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Reports
  REPORT_BALANCE_TOLERANCE: z
    .string()
    .refine(isAmount, { message: "Must be a decimal amount" })
    .default("0.01"),
  REPORT_CACHE_RETENTION: z.coerce.number().int().min(0).default(1),

  // Ledger
  TRANSACTION_LIST_LIMIT: z.coerce.number().int().min(1).max(500).default(50),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
): AppConfig {
  return ConfigSchema.parse(env);
}

/** `REPORT_CACHE_RETENTION=0` keeps every month. */
export function retentionPolicy(config: Pick<AppConfig, "REPORT_CACHE_RETENTION">): RetentionPolicy {
  return config.REPORT_CACHE_RETENTION === 0
    ? { kind: "keep-all" }
    : { kind: "keep-last", count: config.REPORT_CACHE_RETENTION };
}
