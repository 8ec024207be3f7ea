/**
 * Primitive Types
 *
 * Identifiers shared by every CapVault package.
 *
 * Rules:
 * - Amounts inside the engine are bigint base units, never floats
 * - Amounts crossing a process boundary are decimal strings of base units
 * - Identifiers are opaque strings; meaning lives in consuming code
 */

/**
 * An account holder, contract, or pool identifier
 * (e.g., "0x5fbd...", "vault", "pool:WETH/USDC").
 */
export type Address = string;

/**
 * A fungible asset identifier (e.g., "USDC", "WETH", "0xa0b8...").
 */
export type AssetId = string;

/**
 * Description of an asset known to the system.
 */
export interface AssetInfo {
  readonly id: AssetId;
  readonly symbol: string;
  /** Number of fractional digits in one whole unit. USDC = 6, WETH = 18. */
  readonly decimals: number;
}

/**
 * Largest value representable by an unsigned 256-bit integer.
 * Every amount in the engine is bounded by it.
 */
export const UINT256_MAX: bigint = (1n << 256n) - 1n;
