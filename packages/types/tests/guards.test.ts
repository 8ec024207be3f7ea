/**
 * Runtime type guard tests for @capvault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isAssetId,
  isBaseUnitString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { UINT256_MAX } from "../src/primitives.js";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAddress", () => {
  it("accepts hex and symbolic identifiers", () => {
    expect(isAddress("0x5fbdb2315678afecb367f032d93f642f64180aa3")).toBe(true);
    expect(isAddress("vault")).toBe(true);
    expect(isAddress("pool:WETH/USDC")).toBe(true);
  });

  it("rejects empty and non-string values", () => {
    expect(isAddress("")).toBe(false);
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });

  it("rejects whitespace and leading punctuation", () => {
    expect(isAddress("alice bob")).toBe(false);
    expect(isAddress("-alice")).toBe(false);
  });

  it("rejects identifiers longer than 128 characters", () => {
    expect(isAddress("a".repeat(128))).toBe(true);
    expect(isAddress("a".repeat(129))).toBe(false);
  });
});

describe("isAssetId", () => {
  it("accepts token symbols", () => {
    expect(isAssetId("USDC")).toBe(true);
    expect(isAssetId("WETH")).toBe(true);
  });

  it("rejects empty string", () => {
    expect(isAssetId("")).toBe(false);
  });
});

describe("isBaseUnitString", () => {
  it("accepts zero and positive integers", () => {
    expect(isBaseUnitString("0")).toBe(true);
    expect(isBaseUnitString("500000000")).toBe(true);
  });

  it("rejects decimals, signs and leading zeros", () => {
    expect(isBaseUnitString("1.5")).toBe(false);
    expect(isBaseUnitString("-1")).toBe(false);
    expect(isBaseUnitString("007")).toBe(false);
    expect(isBaseUnitString("")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isBaseUnitString(100)).toBe(false);
  });

  it("bounds values at uint256", () => {
    expect(isBaseUnitString(UINT256_MAX.toString())).toBe(true);
    expect(isBaseUnitString((UINT256_MAX + 1n).toString())).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2024-01-15T10:00:00.000Z",
  actor: "alice",
  correlationId: "dep-1",
  source: "vault",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("vault")).toBe(true);
    expect(isEventSource("ledger")).toBe(true);
    expect(isEventSource("admin")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("observer")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects metadata with an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "treasury" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _ignored, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a well-formed event", () => {
    expect(
      isDomainEvent({
        type: "vault.deposit.completed",
        metadata,
        payload: { amountIn: "1000" },
      }),
    ).toBe(true);
  });

  it("rejects null payload", () => {
    expect(
      isDomainEvent({ type: "vault.deposit.completed", metadata, payload: null }),
    ).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isDomainEvent("vault.deposit.completed")).toBe(false);
  });
});
