/**
 * Builds the in-process market described by a market file: assets with
 * their transfer fees, seeded constant-product pools, the native wrapper
 * and starting balances.
 */

import {
  InMemoryAssetBook,
  InMemoryNativeWrapper,
  InMemoryPoolFactory,
} from "@capvault/amm";
import type { MarketFile } from "../config.js";

export interface Market {
  readonly book: InMemoryAssetBook;
  readonly factory: InMemoryPoolFactory;
  readonly wrapper?: InMemoryNativeWrapper | undefined;
}

export async function buildMarket(file: MarketFile): Promise<Market> {
  const book = new InMemoryAssetBook();
  for (const asset of file.assets) {
    book.registerAsset(asset);
  }

  const factory = new InMemoryPoolFactory(book);
  for (const { pair, reserves } of file.pools) {
    const pool = factory.createPool(pair[0], pair[1]);
    for (const asset of pair) {
      const reserve = reserves[asset];
      if (reserve === undefined || reserve === 0n) {
        throw new Error(`Pool ${pool.address} needs a positive ${asset} reserve`);
      }
      book.mint(asset, pool.address, reserve);
    }
    await pool.sync();
  }

  for (const { holder, asset, amount } of file.balances) {
    book.mint(asset, holder, amount);
  }

  const wrapper =
    file.native === undefined
      ? undefined
      : new InMemoryNativeWrapper({
          book,
          nativeAsset: file.native.asset,
          wrappedAsset: file.native.wrapped,
        });

  return { book, factory, wrapper };
}
