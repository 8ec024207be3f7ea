/**
 * @capvault/ledger — Checked unsigned arithmetic.
 *
 * Every amount in the engine is a bigint bounded by uint256. Operations
 * that would leave [0, UINT256_MAX] throw instead of wrapping or
 * saturating.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero
 * - Decimal strings are for display and configuration only
 */

import { UINT256_MAX } from "@capvault/types";
import { LedgerError } from "./types.js";

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert that a value is a uint256. Throws INVALID_AMOUNT otherwise.
 */
export function assertUint(value: bigint, label = "amount"): bigint {
  if (value < 0n || value > UINT256_MAX) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be within uint256, got ${value.toString()}`,
    );
  }
  return value;
}

function overflow(op: string, a: bigint, b: bigint): LedgerError {
  return new LedgerError(
    "ARITHMETIC_OVERFLOW",
    `Arithmetic overflow: ${a.toString()} ${op} ${b.toString()}`,
    { a: a.toString(), b: b.toString(), op },
  );
}

// ─── Checked Operations ──────────────────────────────────────────────────

export function checkedAdd(a: bigint, b: bigint): bigint {
  assertUint(a);
  assertUint(b);
  const sum = a + b;
  if (sum > UINT256_MAX) throw overflow("+", a, b);
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  assertUint(a);
  assertUint(b);
  if (b > a) throw overflow("-", a, b);
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  assertUint(a);
  assertUint(b);
  const product = a * b;
  if (product > UINT256_MAX) throw overflow("*", a, b);
  return product;
}

/**
 * Floor division. bigint division already truncates toward zero, which is
 * floor for unsigned operands.
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  assertUint(a);
  assertUint(b);
  if (b === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", `Division by zero: ${a.toString()} / 0`);
  }
  return a / b;
}

export function minUint(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse a non-negative decimal string into base units.
 *
 * "500" with decimals=6 → 500000000n
 * "1.5" with decimals=6 → 1500000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return assertUint(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Format base units as a decimal string.
 *
 * 500000000n with decimals=6 → "500.000000"
 * 5n with decimals=2 → "0.05"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertUint(scaled);
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}
