/**
 * @vigil/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Escrow
  ESCROW_CURRENCY: z.string().min(1).default("ETH"),
  ESCROW_DECIMALS: z.coerce.number().int().min(0).max(18).default(18),
  CLAIM_SCOPE: z.enum(["per-plan", "global"]).default("per-plan"),
  SHARE_BASIS: z.enum(["funded", "remaining"]).default("funded"),
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
