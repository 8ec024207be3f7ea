/**
 * Runtime Type Guards
 *
 * Narrowing functions for CapVault domain types.
 * Used at system boundaries (HTTP inputs, market files, deserialized
 * snapshots).
 */

import type { Address, AssetId } from "./primitives.js";
import { UINT256_MAX } from "./primitives.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

const IDENTIFIER = /^[A-Za-z0-9][A-Za-z0-9:._/-]{0,127}$/;
const BASE_UNITS = /^(0|[1-9]\d*)$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && IDENTIFIER.test(value);
}

export function isAssetId(value: unknown): value is AssetId {
  return typeof value === "string" && IDENTIFIER.test(value);
}

/**
 * A non-negative integer amount in base units, written as a decimal
 * string without leading zeros, that fits in uint256.
 */
export function isBaseUnitString(value: unknown): value is string {
  if (typeof value !== "string" || !BASE_UNITS.test(value)) return false;
  return BigInt(value) <= UINT256_MAX;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "ledger", "admin"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  return (
    "eventId" in value &&
    typeof value.eventId === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "actor" in value &&
    typeof value.actor === "string" &&
    "correlationId" in value &&
    typeof value.correlationId === "string" &&
    "source" in value &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  return (
    "type" in value &&
    typeof value.type === "string" &&
    "metadata" in value &&
    isEventMetadata(value.metadata) &&
    "payload" in value &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
