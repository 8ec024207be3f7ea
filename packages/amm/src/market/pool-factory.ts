/**
 * InMemoryPoolFactory — Pair registry for the in-process market.
 *
 * Pairs are unordered: `getPool(a, b)` and `getPool(b, a)` resolve the
 * same pool. `createPool` builds a ConstantProductPool with its tokens
 * sorted; `registerPool` accepts any Pool, which is how tests plug in
 * pools that misbehave.
 */

import type { Address, AssetId, Pool, PoolFactory } from "@capvault/types";
import { PoolError } from "../errors.js";
import type { InMemoryAssetBook } from "./asset-book.js";
import { ConstantProductPool } from "./constant-product-pool.js";

export function pairKey(assetA: AssetId, assetB: AssetId): string {
  return assetA < assetB ? `${assetA}|${assetB}` : `${assetB}|${assetA}`;
}

export class InMemoryPoolFactory implements PoolFactory {
  private readonly _pools = new Map<string, Pool>();

  constructor(private readonly book: InMemoryAssetBook) {}

  createPool(assetA: AssetId, assetB: AssetId, address?: Address): ConstantProductPool {
    const [token0, token1] = assetA < assetB ? [assetA, assetB] : [assetB, assetA];
    const pool = new ConstantProductPool({
      address: address ?? `pool:${token0}-${token1}`,
      token0,
      token1,
      book: this.book,
    });
    this.registerPool(pool);
    return pool;
  }

  registerPool(pool: Pool): void {
    const key = pairKey(pool.token0, pool.token1);
    if (this._pools.has(key)) {
      throw new PoolError("INVALID_POOL", `A pool already exists for ${pool.token0}/${pool.token1}`);
    }
    this._pools.set(key, pool);
  }

  async getPool(assetA: AssetId, assetB: AssetId): Promise<Pool | undefined> {
    return this._pools.get(pairKey(assetA, assetB));
  }

  listPools(): readonly Pool[] {
    return [...this._pools.values()];
  }
}
