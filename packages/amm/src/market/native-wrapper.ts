/**
 * InMemoryNativeWrapper — Wraps native currency into a transferable asset.
 *
 * Native currency is itself an asset in the book. Wrapping moves it from
 * the payer into the wrapper's custody and mints the same amount of the
 * wrapped asset to the recipient, one to one.
 */

import type { Address, AssetId, NativeWrapper } from "@capvault/types";
import type { InMemoryAssetBook } from "./asset-book.js";

export interface InMemoryNativeWrapperOptions {
  readonly book: InMemoryAssetBook;
  readonly nativeAsset: AssetId;
  readonly wrappedAsset: AssetId;
  readonly address?: Address | undefined;
}

export class InMemoryNativeWrapper implements NativeWrapper {
  readonly wrappedAsset: AssetId;
  readonly nativeAsset: AssetId;
  readonly address: Address;

  private readonly book: InMemoryAssetBook;

  constructor(options: InMemoryNativeWrapperOptions) {
    this.book = options.book;
    this.nativeAsset = options.nativeAsset;
    this.wrappedAsset = options.wrappedAsset;
    this.address = options.address ?? `wrapper:${options.wrappedAsset}`;
  }

  async wrap(payer: Address, amount: bigint, recipient: Address): Promise<bigint> {
    const before = await this.book.balanceOf(this.nativeAsset, this.address);
    await this.book.transferFrom(this.nativeAsset, payer, this.address, amount);
    const received = (await this.book.balanceOf(this.nativeAsset, this.address)) - before;
    if (received > 0n) {
      this.book.mint(this.wrappedAsset, recipient, received);
    }
    return received;
  }
}
