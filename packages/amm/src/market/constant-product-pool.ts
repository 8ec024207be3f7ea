/**
 * ConstantProductPool — In-process two-asset pair.
 *
 * Follows the Uniswap V2 pair protocol:
 * - liquidity and swap input are delivered to the pool's address first
 * - `swap()` infers the input from balance minus reserve
 * - the fee-adjusted product of balances must not fall below the product
 *   of reserves (0.3% fee on the input side)
 * - reserves are updated to balances at the end of every interaction
 *
 * Every check runs before the pool sends anything, so a rejected swap
 * leaves balances untouched.
 */

import type { Address, AssetId, Pool, RawReserves } from "@capvault/types";
import { checkedMul, checkedSub } from "@capvault/ledger";
import { PoolError } from "../errors.js";
import { FEE_DENOMINATOR, FEE_NUMERATOR } from "../swap-calculator.js";
import type { InMemoryAssetBook } from "./asset-book.js";

const FEE_COMPLEMENT = FEE_DENOMINATOR - FEE_NUMERATOR;

export interface ConstantProductPoolOptions {
  readonly address: Address;
  readonly token0: AssetId;
  readonly token1: AssetId;
  readonly book: InMemoryAssetBook;
}

export class ConstantProductPool implements Pool {
  readonly address: Address;
  readonly token0: AssetId;
  readonly token1: AssetId;

  private readonly book: InMemoryAssetBook;
  private reserve0 = 0n;
  private reserve1 = 0n;
  private locked = false;

  constructor(options: ConstantProductPoolOptions) {
    if (options.token0 === options.token1) {
      throw new PoolError("INVALID_POOL", `A pool needs two distinct assets, got "${options.token0}" twice`);
    }
    this.address = options.address;
    this.token0 = options.token0;
    this.token1 = options.token1;
    this.book = options.book;
  }

  async getReserves(): Promise<RawReserves> {
    return { reserve0: this.reserve0, reserve1: this.reserve1 };
  }

  /**
   * Pull both assets from `provider` and record the new reserves.
   */
  async addLiquidity(provider: Address, amount0: bigint, amount1: bigint): Promise<RawReserves> {
    await this.book.transferFrom(this.token0, provider, this.address, amount0);
    await this.book.transferFrom(this.token1, provider, this.address, amount1);
    return this.sync();
  }

  /**
   * Force reserves to match balances.
   */
  async sync(): Promise<RawReserves> {
    this.reserve0 = await this.book.balanceOf(this.token0, this.address);
    this.reserve1 = await this.book.balanceOf(this.token1, this.address);
    return this.getReserves();
  }

  async swap(amount0Out: bigint, amount1Out: bigint, to: Address): Promise<void> {
    if (this.locked) {
      throw new PoolError("LOCKED", `Pool ${this.address} is already executing a swap`);
    }
    if (amount0Out === 0n && amount1Out === 0n) {
      throw new PoolError("INSUFFICIENT_OUTPUT_AMOUNT", "Swap must request some output");
    }
    if (amount0Out >= this.reserve0 || amount1Out >= this.reserve1) {
      throw new PoolError(
        "INSUFFICIENT_LIQUIDITY",
        `Requested output (${amount0Out.toString()}, ${amount1Out.toString()}) exceeds reserves (${this.reserve0.toString()}, ${this.reserve1.toString()})`,
      );
    }
    if (to === this.address) {
      throw new PoolError("INVALID_POOL", "Swap output cannot be sent to the pool itself");
    }

    this.locked = true;
    try {
      const held0 = await this.book.balanceOf(this.token0, this.address);
      const held1 = await this.book.balanceOf(this.token1, this.address);
      const balance0 = checkedSub(held0, amount0Out);
      const balance1 = checkedSub(held1, amount1Out);

      const keep0 = this.reserve0 - amount0Out;
      const keep1 = this.reserve1 - amount1Out;
      const amount0In = balance0 > keep0 ? balance0 - keep0 : 0n;
      const amount1In = balance1 > keep1 ? balance1 - keep1 : 0n;
      if (amount0In === 0n && amount1In === 0n) {
        throw new PoolError("INSUFFICIENT_INPUT_AMOUNT", "No input was delivered before the swap");
      }

      const adjusted0 = checkedMul(balance0, FEE_DENOMINATOR) - checkedMul(amount0In, FEE_COMPLEMENT);
      const adjusted1 = checkedMul(balance1, FEE_DENOMINATOR) - checkedMul(amount1In, FEE_COMPLEMENT);
      const kBefore = checkedMul(
        checkedMul(this.reserve0, this.reserve1),
        FEE_DENOMINATOR * FEE_DENOMINATOR,
      );
      if (checkedMul(adjusted0, adjusted1) < kBefore) {
        throw new PoolError("K_INVARIANT", "Swap would decrease the pool's constant product");
      }

      if (amount0Out > 0n) {
        await this.book.transfer(this.token0, this.address, to, amount0Out);
      }
      if (amount1Out > 0n) {
        await this.book.transfer(this.token1, this.address, to, amount1Out);
      }

      this.reserve0 = balance0;
      this.reserve1 = balance1;
    } finally {
      this.locked = false;
    }
  }
}
