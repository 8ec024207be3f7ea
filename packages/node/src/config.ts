/**
 * @capvault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and the market file that seeds the in-process market.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { isAddress, isAssetId, isBaseUnitString } from "@capvault/types";

// =============================================================================
// Schema
// =============================================================================

const baseUnits = z
  .string()
  .refine(isBaseUnitString, "must be a non-negative integer string")
  .transform((v) => BigInt(v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault
  VAULT_ADDRESS: z.string().refine(isAddress, "must be a valid address").default("vault"),
  REFERENCE_ASSET: z.string().refine(isAssetId, "must be a valid asset id").default("usdc"),
  REFERENCE_DECIMALS: z.coerce.number().int().min(0).max(77).default(6),
  CAP_DECIMALS: z.coerce.number().int().min(0).max(77).default(8),
  /** Bank cap in cap units. Default: one million reference units at 8 decimals. */
  BANK_CAP: baseUnits.default("100000000000000"),
  ADMIN_ADDRESSES: z
    .string()
    .default("admin")
    .transform((raw) => raw.split(",").map((a) => a.trim()).filter((a) => a !== ""))
    .refine((list) => list.length > 0 && list.every(isAddress), "must list at least one valid address"),

  // Market
  MARKET_FILE: z.string().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: "admin" | "operator" | "viewer";
  /** Vault address requests made with this key act as */
  readonly address: string;
}

const RoleSchema = z.enum(["admin", "operator", "viewer"]);

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, address, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const parsedRole = RoleSchema.safeParse(role);
    if (!parsedRole.success) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, role: parsedRole.data, address });
  }

  return keys;
}

// =============================================================================
// Market File
// =============================================================================

const assetId = z.string().refine(isAssetId, "must be a valid asset id");

export const MarketFileSchema = z.object({
  assets: z
    .array(
      z.object({
        id: assetId,
        symbol: z.string().min(1),
        decimals: z.number().int().min(0).max(77),
        transferFeeBps: z.number().int().min(0).max(10_000).optional(),
      }),
    )
    .min(1),
  native: z.object({ asset: assetId, wrapped: assetId }).optional(),
  pools: z
    .array(
      z.object({
        pair: z.tuple([assetId, assetId]),
        reserves: z.record(baseUnits),
      }),
    )
    .default([]),
  balances: z
    .array(
      z.object({
        holder: z.string().refine(isAddress, "must be a valid address"),
        asset: assetId,
        amount: baseUnits,
      }),
    )
    .default([]),
});

export type MarketFile = z.infer<typeof MarketFileSchema>;

// =============================================================================
// Loaders
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

/**
 * @throws {z.ZodError} if the file does not describe a market
 */
export function loadMarketFile(path: string | URL): MarketFile {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return MarketFileSchema.parse(raw);
}
