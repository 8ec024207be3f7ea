/**
 * Pool Interfaces
 *
 * A two-asset constant-product liquidity venue, modelled on the
 * Uniswap V2 pair: the caller delivers input to the pool first, then asks
 * for output. The pool validates its own invariant against its balances.
 */

import type { Address, AssetId } from "./primitives.js";

/**
 * Raw reserves as reported by a pool, in token0/token1 order.
 */
export interface RawReserves {
  readonly reserve0: bigint;
  readonly reserve1: bigint;
}

/**
 * An external two-asset pool.
 */
export interface Pool {
  /** The pool's own custody address in the asset book. */
  readonly address: Address;
  readonly token0: AssetId;
  readonly token1: AssetId;

  /** Reserves recorded at the end of the last interaction. */
  getReserves(): Promise<RawReserves>;

  /**
   * Send `amount0Out` of token0 and `amount1Out` of token1 to `to`,
   * provided the input already delivered keeps the fee-adjusted product
   * invariant.
   */
  swap(amount0Out: bigint, amount1Out: bigint, to: Address): Promise<void>;
}

/**
 * Resolves the pool trading a pair of assets.
 */
export interface PoolFactory {
  /** The pool for the unordered pair, or undefined if none exists. */
  getPool(assetA: AssetId, assetB: AssetId): Promise<Pool | undefined>;
}
