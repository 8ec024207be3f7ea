/**
 * @capvault/types — Shared domain types for the CapVault stack.
 *
 * These types are used across all CapVault packages:
 * - Identifiers and asset descriptions
 * - Asset custody and pool collaborator interfaces
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Collaborator interfaces describe behavior, never an implementation
 */

export type { Address, AssetId, AssetInfo } from "./primitives.js";
export { UINT256_MAX } from "./primitives.js";

export type { AssetBook, NativeWrapper } from "./assets.js";

export type { Pool, PoolFactory, RawReserves } from "./pool.js";

export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export {
  isAddress,
  isAssetId,
  isBaseUnitString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
