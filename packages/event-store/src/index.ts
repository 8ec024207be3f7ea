/**
 * @capvault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation and schema versions
 * - Vault domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadDirection,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Vault domain events
export {
  VAULT_EVENTS,
  createVaultCatalog,
  DepositCompletedPayload,
  DepositStrandedPayload,
  WithdrawalCompletedPayload,
  CapUpdatedPayload,
  RescueCompletedPayload,
  PauseChangedPayload,
} from "./vault-events.js";
export type { VaultEventType } from "./vault-events.js";
