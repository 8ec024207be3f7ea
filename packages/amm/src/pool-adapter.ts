/**
 * PoolAdapter — Executes swaps against an external pool.
 *
 * Nothing the pool or the asset says about amounts is trusted:
 * - the input the pool actually received is its balance minus its
 *   recorded reserve, measured after delivery
 * - the output is recomputed on that measured input and capped at the
 *   caller's estimate
 * - the output the recipient actually received is its balance delta,
 *   checked against the caller's minimum
 *
 * A failure after delivery does not return the input, and a failed
 * output check leaves the output with the recipient. Callers account
 * for both.
 */

import type { Address, AssetBook, AssetId, Pool, PoolFactory } from "@capvault/types";
import { minUint } from "@capvault/ledger";
import { PoolError } from "./errors.js";
import { expectedOut } from "./swap-calculator.js";

// =============================================================================
// Types
// =============================================================================

export interface PoolReserves {
  readonly reserveIn: bigint;
  readonly reserveOut: bigint;
  /** True when the input asset is the pool's token0. */
  readonly tokenInIsFirst: boolean;
}

export interface SwapParams {
  readonly pool: Pool;
  readonly assetIn: AssetId;
  readonly amountIn: bigint;
  /** Output estimated before delivery. The adapter never asks for more. */
  readonly amountOutExpected: bigint;
  readonly minAmountOut: bigint;
  /** Custody the input is delivered from. */
  readonly from: Address;
  readonly recipient: Address;
}

export interface SwapResult {
  readonly assetOut: AssetId;
  readonly amountInEffective: bigint;
  readonly amountOutRequested: bigint;
  readonly amountOutActual: bigint;
}

export interface PoolAdapterOptions {
  readonly factory: PoolFactory;
  readonly book: AssetBook;
}

// =============================================================================
// PoolAdapter
// =============================================================================

export class PoolAdapter {
  private readonly factory: PoolFactory;
  private readonly book: AssetBook;

  constructor(options: PoolAdapterOptions) {
    this.factory = options.factory;
    this.book = options.book;
  }

  async resolvePool(assetIn: AssetId, assetOut: AssetId): Promise<Pool> {
    const pool = await this.factory.getPool(assetIn, assetOut);
    if (pool === undefined) {
      throw new PoolError("PAIR_NOT_FOUND", `No pool trades ${assetIn}/${assetOut}`, {
        assetIn,
        assetOut,
      });
    }
    return pool;
  }

  async getReserves(pool: Pool, assetIn: AssetId): Promise<PoolReserves> {
    const tokenInIsFirst = tokenIsFirst(pool, assetIn);
    const { reserve0, reserve1 } = await pool.getReserves();
    if (reserve0 === 0n || reserve1 === 0n) {
      throw new PoolError(
        "INSUFFICIENT_LIQUIDITY",
        `Pool ${pool.address} has no liquidity`,
        { reserve0: reserve0.toString(), reserve1: reserve1.toString() },
      );
    }
    return tokenInIsFirst
      ? { reserveIn: reserve0, reserveOut: reserve1, tokenInIsFirst }
      : { reserveIn: reserve1, reserveOut: reserve0, tokenInIsFirst };
  }

  async swap(params: SwapParams): Promise<SwapResult> {
    const { pool, assetIn, amountIn, amountOutExpected, minAmountOut, from, recipient } = params;
    const tokenInIsFirst = tokenIsFirst(pool, assetIn);
    const assetOut = tokenInIsFirst ? pool.token1 : pool.token0;

    await this.book.transfer(assetIn, from, pool.address, amountIn);

    const reserves = await this.getReserves(pool, assetIn);
    const poolBalance = await this.book.balanceOf(assetIn, pool.address);
    const amountInEffective =
      poolBalance > reserves.reserveIn ? poolBalance - reserves.reserveIn : 0n;
    if (amountInEffective === 0n) {
      throw new PoolError("ZERO_EFFECTIVE_INPUT", `Pool ${pool.address} received none of the input`, {
        amountIn: amountIn.toString(),
      });
    }

    const recomputed = expectedOut(amountInEffective, reserves.reserveIn, reserves.reserveOut);
    const amountOutRequested = minUint(recomputed, amountOutExpected);

    const recipientBefore = await this.book.balanceOf(assetOut, recipient);
    if (tokenInIsFirst) {
      await pool.swap(0n, amountOutRequested, recipient);
    } else {
      await pool.swap(amountOutRequested, 0n, recipient);
    }
    const recipientAfter = await this.book.balanceOf(assetOut, recipient);

    const amountOutActual =
      recipientAfter > recipientBefore ? recipientAfter - recipientBefore : 0n;
    if (amountOutActual < minAmountOut || amountOutActual === 0n) {
      throw new PoolError(
        "INSUFFICIENT_OUTPUT_AMOUNT",
        `Swap delivered ${amountOutActual.toString()} ${assetOut}, below the minimum of ${minAmountOut.toString()}`,
        {
          amountOutActual: amountOutActual.toString(),
          minAmountOut: minAmountOut.toString(),
        },
      );
    }

    return { assetOut, amountInEffective, amountOutRequested, amountOutActual };
  }
}

function tokenIsFirst(pool: Pool, assetIn: AssetId): boolean {
  if (assetIn === pool.token0) return true;
  if (assetIn === pool.token1) return false;
  throw new PoolError("INVALID_POOL", `Pool ${pool.address} does not trade ${assetIn}`, {
    pool: pool.address,
    assetIn,
  });
}
