/**
 * Shared market fixtures for amm tests.
 */

import type { Address, AssetId, Pool, RawReserves } from "@capvault/types";
import { InMemoryAssetBook } from "../src/market/asset-book.js";
import { InMemoryPoolFactory } from "../src/market/pool-factory.js";
import type { ConstantProductPool } from "../src/market/constant-product-pool.js";

export const VAULT = "vault";
export const USDC = "usdc";
export const TKN = "tkn";
/** Skims 5% of every transfer. */
export const FOT = "fot";
/** Skims the whole transfer. */
export const BURN = "burn";

export interface Market {
  readonly book: InMemoryAssetBook;
  readonly factory: InMemoryPoolFactory;
  readonly tknPool: ConstantProductPool;
}

export function createMarket(): Market {
  const book = new InMemoryAssetBook();
  book.registerAsset({ id: USDC, symbol: "USDC", decimals: 6 });
  book.registerAsset({ id: TKN, symbol: "TKN", decimals: 18 });
  book.registerAsset({ id: FOT, symbol: "FOT", decimals: 18, transferFeeBps: 500 });
  book.registerAsset({ id: BURN, symbol: "BURN", decimals: 18, transferFeeBps: 10_000 });

  const factory = new InMemoryPoolFactory(book);
  const tknPool = factory.createPool(TKN, USDC);
  return { book, factory, tknPool };
}

/** Seed a pool straight to the given reserves, bypassing transfer fees. */
export async function seedPool(
  book: InMemoryAssetBook,
  pool: ConstantProductPool,
  reserve0: bigint,
  reserve1: bigint,
): Promise<void> {
  book.mint(pool.token0, pool.address, reserve0);
  book.mint(pool.token1, pool.address, reserve1);
  await pool.sync();
}

/**
 * A pool that reports fixed reserves and pays `payoutBps` of each
 * requested output from its own balance.
 */
export class ScriptedPool implements Pool {
  readonly requests: Array<{ amount0Out: bigint; amount1Out: bigint; to: Address }> = [];

  constructor(
    private readonly book: InMemoryAssetBook,
    readonly address: Address,
    readonly token0: AssetId,
    readonly token1: AssetId,
    private readonly reported: RawReserves,
    private readonly payoutBps = 10_000n,
  ) {}

  async getReserves(): Promise<RawReserves> {
    return this.reported;
  }

  async swap(amount0Out: bigint, amount1Out: bigint, to: Address): Promise<void> {
    this.requests.push({ amount0Out, amount1Out, to });
    if (amount0Out > 0n) {
      await this.book.transfer(this.token0, this.address, to, (amount0Out * this.payoutBps) / 10_000n);
    }
    if (amount1Out > 0n) {
      await this.book.transfer(this.token1, this.address, to, (amount1Out * this.payoutBps) / 10_000n);
    }
  }
}
