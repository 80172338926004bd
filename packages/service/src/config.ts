/**
 * @navsync/service — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@navsync/types";
import { isAddress, normalizeAddress } from "@navsync/types";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine(isAddress, { message: "Expected a 0x-prefixed 20-byte hex address" })
  .transform(normalizeAddress);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Chain
  CHAIN_ID: z.coerce.number().int().positive().default(1),
  RPC_URL: z.string().url().optional(),

  // Bridge
  SPOKE_POOL_ADDRESS: AddressSchema,
  WRAPPED_NATIVE_ADDRESS: AddressSchema.optional(),
  CROSSCHAIN_TOKENS: z.string().default(""),

  // Pools
  MAX_ACTIVE_TOKENS: z.coerce.number().int().min(1).default(128),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Token List Parsing
// =============================================================================

/**
 * Parse the CROSSCHAIN_TOKENS env var into normalized addresses.
 *
 * Format: "0xabc...,0xdef..." (duplicates collapse, order is kept)
 */
export function parseTokenList(raw: string): readonly Address[] {
  const tokens: Address[] = [];
  const seen = new Set<Address>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed === "") continue;

    if (!isAddress(trimmed)) {
      throw new Error(`Invalid CROSSCHAIN_TOKENS entry: "${trimmed}". Expected a 0x-prefixed address`);
    }
    const token = normalizeAddress(trimmed);
    if (!seen.has(token)) {
      seen.add(token);
      tokens.push(token);
    }
  }

  return tokens;
}

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
