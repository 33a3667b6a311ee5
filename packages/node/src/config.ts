/**
 * @concord/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAccount, isAmountString } from "@concord/types";
import type { GenesisBalance } from "./services/concord-service.js";

// =============================================================================
// Schema
// =============================================================================

const AmountString = z
  .string()
  .refine(isAmountString, "Must be a non-negative integer written in decimal");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  OWNER_ADDRESS: z.string().refine(isAccount, "Must be a non-reserved account address"),
  STORAGE_FEE: AmountString.default("0"),
  GENESIS_BALANCES: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Genesis Balance Parsing
// =============================================================================

/**
 * Parse the GENESIS_BALANCES env var into bank funding records.
 *
 * Format: "address1:amount1,address2:amount2"
 */
export function parseGenesisBalances(raw: string): readonly GenesisBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  const balances: GenesisBalance[] = [];

  for (const entry of raw.split(",")) {
    const separator = entry.lastIndexOf(":");
    if (separator === -1) {
      throw new Error(
        `Invalid GENESIS_BALANCES entry: "${entry.trim()}". Expected format: address:amount`,
      );
    }

    const account = entry.slice(0, separator).trim();
    const amount = entry.slice(separator + 1).trim();

    if (!isAccount(account)) {
      throw new Error(`Invalid account "${account}" in GENESIS_BALANCES`);
    }
    if (!isAmountString(amount)) {
      throw new Error(`Invalid amount "${amount}" for ${account} in GENESIS_BALANCES`);
    }

    balances.push({ account, amount: BigInt(amount) });
  }

  return balances;
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
