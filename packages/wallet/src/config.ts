/**
 * @quorumgate/wallet — Configuration.
 *
 * Loads and validates wallet configuration from environment variables
 * using Zod. Owner-set rules (duplicates, null principals, quorum range)
 * belong to the registry and are not repeated here.
 */

import { z } from "zod";

// =============================================================================
// Owner List Parsing
// =============================================================================

/**
 * Parse the WALLET_OWNERS env var into an ordered owner list.
 *
 * Format: "0xA,0xB,0xC". Whitespace is trimmed and empty items dropped;
 * duplicates are kept so the registry can reject them.
 */
export function parseOwnerList(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  WALLET_ADDRESS: z.string().trim().min(1),
  WALLET_OWNERS: z.string().default("").transform(parseOwnerList),
  WALLET_REQUIRED_APPROVALS: z.coerce.number().int().nonnegative(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
