export { InMemoryAssetBook, AssetBookError, DEFAULT_FEE_COLLECTOR } from "./asset-book.js";
export type { MarketAsset, TransferRecord, ReceiveHook, AssetBookErrorCode } from "./asset-book.js";
export { ConstantProductPool } from "./constant-product-pool.js";
export type { ConstantProductPoolOptions } from "./constant-product-pool.js";
export { InMemoryPoolFactory, pairKey } from "./pool-factory.js";
export { InMemoryNativeWrapper } from "./native-wrapper.js";
export type { InMemoryNativeWrapperOptions } from "./native-wrapper.js";
