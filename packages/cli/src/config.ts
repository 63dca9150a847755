/**
 * @arbor/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Command-line flags override these per invocation.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

/** Digest algorithms the CLI can use as its combining function. */
export const HASH_ALGORITHMS = [
  "sha256",
  "sha512-256",
  "sha3-256",
  "blake2s256",
] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const ConfigSchema = z.object({
  ARBOR_HASH: z.enum(HASH_ALGORITHMS).default("sha256"),
  // An empty variable means unset, not 0
  ARBOR_PROOF_CAPACITY: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().nonnegative().optional(),
  ),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
