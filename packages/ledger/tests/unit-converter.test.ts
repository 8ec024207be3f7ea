/**
 * Tests for reference-unit to cap-unit conversion.
 */

import { describe, it, expect } from "vitest";
import { UINT256_MAX } from "@capvault/types";
import { createUnitConverter, toCapUnits } from "../src/unit-converter.js";
import { LedgerError } from "../src/types.js";

describe("toCapUnits", () => {
  it("scales 6-decimal units by 100", () => {
    expect(toCapUnits(500_000_000n)).toBe(50_000_000_000n);
  });

  it("maps one base unit to 100 cap units", () => {
    expect(toCapUnits(1n)).toBe(100n);
  });

  it("throws ARITHMETIC_OVERFLOW instead of wrapping", () => {
    expect(() => toCapUnits(UINT256_MAX)).toThrow(LedgerError);
    try {
      toCapUnits(UINT256_MAX);
    } catch (err) {
      expect(err).toHaveProperty("code", "ARITHMETIC_OVERFLOW");
    }
  });
});

describe("createUnitConverter", () => {
  it("derives the scale from the precision gap", () => {
    expect(createUnitConverter(6, 8).scale).toBe(100n);
    expect(createUnitConverter(6, 18).scale).toBe(1_000_000_000_000n);
    expect(createUnitConverter(8, 8).scale).toBe(1n);
  });

  it("floors when converting back", () => {
    const converter = createUnitConverter(6, 8);
    expect(converter.fromCapUnits(12_345n)).toBe(123n);
  });

  it("rejects a cap precision below the reference precision", () => {
    expect(() => createUnitConverter(8, 6)).toThrow(RangeError);
  });

  it("rejects fractional precisions", () => {
    expect(() => createUnitConverter(6.5, 8)).toThrow(RangeError);
  });
});
