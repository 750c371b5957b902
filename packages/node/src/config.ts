/**
 * @capstream/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddressLike } from "@capstream/types";
import type { Address } from "@capstream/types";

// =============================================================================
// Schema
// =============================================================================

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

const AddressSchema = z.custom<Address>(
  isAddressLike,
  "must be a 0x-prefixed 20-byte hex address",
);

const PrivateKeySchema = z.custom<`0x${string}`>(
  (value) => typeof value === "string" && PRIVATE_KEY_PATTERN.test(value),
  "must be a 0x-prefixed 32-byte hex key",
);

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Ledger
    OWNER_ADDRESS: AddressSchema,

    // Auth
    API_KEYS: z.string().default(""),

    // Transfer gateway
    GATEWAY: z.enum(["memory", "evm"]).default("memory"),
    CHAIN_ID: z.string().default("eip155:1"),
    RPC_URL: z.string().url().optional(),
    VAULT_PRIVATE_KEY: PrivateKeySchema.optional(),
    VAULT_SEED: z.string().default(""),
  })
  .superRefine((config, ctx) => {
    if (config.GATEWAY !== "evm") return;
    if (config.RPC_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RPC_URL"],
        message: "RPC_URL is required when GATEWAY=evm",
      });
    }
    if (config.VAULT_PRIVATE_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["VAULT_PRIVATE_KEY"],
        message: "VAULT_PRIVATE_KEY is required when GATEWAY=evm",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xAddress1,key2:0xAddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  return parseEntries(raw, "API_KEYS", "key:address").map(([key, address]) => {
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddressLike(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    return { key, address };
  });
}

// =============================================================================
// Vault Seed Parsing
// =============================================================================

export interface VaultSeedEntry {
  readonly asset: Address;
  readonly amount: bigint;
}

/**
 * Parse the VAULT_SEED env var (in-memory gateway only).
 *
 * Format: "0xAsset1:amount1,0xAsset2:amount2" with amounts in smallest units.
 */
export function parseVaultSeed(raw: string): readonly VaultSeedEntry[] {
  return parseEntries(raw, "VAULT_SEED", "asset:amount").map(([asset, amount]) => {
    if (!isAddressLike(asset)) {
      throw new Error(`Invalid asset "${asset}" in VAULT_SEED`);
    }
    if (!/^\d+$/.test(amount)) {
      throw new Error(`Invalid amount "${amount}" in VAULT_SEED`);
    }
    return { asset, amount: BigInt(amount) };
  });
}

function parseEntries(
  raw: string,
  variable: string,
  format: string,
): readonly (readonly [string, string])[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [first, second] = parts;
    if (parts.length !== 2 || first === undefined || second === undefined) {
      throw new Error(
        `Invalid ${variable} entry: "${entry.trim()}". Expected format: ${format}`,
      );
    }
    return [first, second] as const;
  });
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
