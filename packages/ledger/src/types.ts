/**
 * @capvault/ledger — Types for the reference-asset ledger.
 *
 * Rules:
 * - All returned structures are readonly
 * - Balances are denominated in reference-asset base units
 * - Cumulative deposits are tracked in cap units
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@capvault/types";

// ─── Totals ──────────────────────────────────────────────────────────────

/**
 * Process-wide totals owned by the ledger.
 */
export interface LedgerTotals {
  /** Cumulative deposits ever credited, in cap units. Never decreases. */
  readonly totalDeposited: bigint;
  /** Reference-asset base units currently owed to users. */
  readonly totalHeld: bigint;
  /** Upper bound for `totalDeposited`, in cap units. */
  readonly bankCap: bigint;
  /** Committed credits, debits and debit reversals (diagnostic). */
  readonly operationCount: number;
}

// ─── Operation Results ───────────────────────────────────────────────────

export interface CreditResult {
  readonly account: Address;
  readonly amount: bigint;
  readonly amountCap: bigint;
  readonly balanceAfter: bigint;
  readonly totalDeposited: bigint;
}

/**
 * Proof of a committed debit. Held by the caller until the outbound
 * transfer settles, then either settled or reversed exactly once.
 */
export interface DebitReceipt {
  readonly receiptId: string;
  readonly account: Address;
  readonly amount: bigint;
  readonly balanceAfter: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger. Amounts are base-unit strings.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly { readonly account: Address; readonly amount: string }[];
  readonly totalHeld: string;
  readonly totalDeposited: string;
  readonly bankCap: string;
  readonly operationCount: number;
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations and checked arithmetic. */
export type LedgerErrorCode =
  | "CAP_EXCEEDED"
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "ARITHMETIC_OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "UNKNOWN_RECEIPT"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}
