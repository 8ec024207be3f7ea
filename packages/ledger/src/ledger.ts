/**
 * @capvault/ledger — Core Ledger class.
 *
 * Owns per-account reference-asset balances, the running totals and the
 * bank cap. It is the only component allowed to mutate balances.
 *
 * API surface:
 * - credit() — Apply a deposit, enforcing the cap
 * - debit() — Remove funds for a withdrawal
 * - settleDebit() / reverseDebit() — Close a debit after its transfer
 * - setBankCap() — Replace the cap (callers gate this on admin rights)
 * - balanceOf(), totals(), capHeadroom() — Queries
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Every mutating method computes all new values first and writes them
 * afterwards, with no await in between. A reader can never observe a
 * balance without its matching totals.
 */

import type { Address } from "@capvault/types";
import { assertUint, checkedAdd, checkedSub } from "./money-math.js";
import { createUnitConverter } from "./unit-converter.js";
import type { UnitConverter } from "./unit-converter.js";
import type {
  CreditResult,
  DebitReceipt,
  LedgerSnapshot,
  LedgerTotals,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface LedgerOptions {
  /** Initial cap in cap units. */
  readonly bankCap: bigint;
  readonly converter?: UnitConverter | undefined;
}

export class Ledger {
  readonly converter: UnitConverter;

  private readonly _balances = new Map<Address, bigint>();
  private readonly _openDebits = new Map<string, DebitReceipt>();
  private _totalHeld = 0n;
  private _totalDeposited = 0n;
  private _bankCap: bigint;
  private _operationCount = 0;
  private _nextReceipt = 1;

  constructor(options: LedgerOptions) {
    this._bankCap = assertUint(options.bankCap, "bankCap");
    this.converter = options.converter ?? createUnitConverter();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Credit `amount` reference units to `account`.
   *
   * Fails with CAP_EXCEEDED if the cumulative deposits in cap units would
   * pass the bank cap. No field changes on failure.
   */
  credit(account: Address, amount: bigint): CreditResult {
    this._assertAccount(account);
    this._assertPositive(amount);

    const amountCap = this.converter.toCapUnits(amount);
    const newTotal = checkedAdd(this._totalDeposited, amountCap);
    if (newTotal > this._bankCap) {
      throw new LedgerError(
        "CAP_EXCEEDED",
        `Deposit would raise total deposits to ${newTotal.toString()}, above the cap of ${this._bankCap.toString()}`,
        { newTotal: newTotal.toString(), cap: this._bankCap.toString() },
      );
    }

    const balanceAfter = checkedAdd(this.balanceOf(account), amount);
    const heldAfter = checkedAdd(this._totalHeld, amount);

    this._balances.set(account, balanceAfter);
    this._totalHeld = heldAfter;
    this._totalDeposited = newTotal;
    this._operationCount++;

    return { account, amount, amountCap, balanceAfter, totalDeposited: newTotal };
  }

  /**
   * Debit `amount` reference units from `account`.
   *
   * The debit is committed when this returns. The receipt stays open
   * until the caller settles or reverses it.
   */
  debit(account: Address, amount: bigint): DebitReceipt {
    this._assertAccount(account);
    this._assertPositive(amount);

    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account}" holds ${balance.toString()}, cannot debit ${amount.toString()}`,
        { balance: balance.toString(), requested: amount.toString() },
      );
    }

    const balanceAfter = balance - amount;
    const heldAfter = checkedSub(this._totalHeld, amount);

    this._balances.set(account, balanceAfter);
    this._totalHeld = heldAfter;
    this._operationCount++;

    const receipt: DebitReceipt = {
      receiptId: `debit-${String(this._nextReceipt++)}`,
      account,
      amount,
      balanceAfter,
    };
    this._openDebits.set(receipt.receiptId, receipt);
    return receipt;
  }

  /**
   * Mark a debit final once its outbound transfer has succeeded.
   */
  settleDebit(receipt: DebitReceipt): void {
    this._takeOpenDebit(receipt);
  }

  /**
   * Restore a debit whose outbound transfer failed. `totalDeposited` is
   * not touched: it never moved on the debit either.
   */
  reverseDebit(receipt: DebitReceipt): void {
    const open = this._takeOpenDebit(receipt);

    const balanceAfter = checkedAdd(this.balanceOf(open.account), open.amount);
    const heldAfter = checkedAdd(this._totalHeld, open.amount);

    this._balances.set(open.account, balanceAfter);
    this._totalHeld = heldAfter;
    this._operationCount++;
  }

  setBankCap(cap: bigint): { readonly previous: bigint; readonly current: bigint } {
    assertUint(cap, "bankCap");
    const previous = this._bankCap;
    this._bankCap = cap;
    return { previous, current: cap };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  totals(): LedgerTotals {
    return {
      totalDeposited: this._totalDeposited,
      totalHeld: this._totalHeld,
      bankCap: this._bankCap,
      operationCount: this._operationCount,
    };
  }

  /**
   * Largest amount, in reference units, that can still be credited.
   */
  capHeadroom(): bigint {
    if (this._totalDeposited >= this._bankCap) return 0n;
    return this.converter.fromCapUnits(this._bankCap - this._totalDeposited);
  }

  accounts(): readonly Address[] {
    return [...this._balances.keys()];
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Serialize the ledger. Open debits are not part of a snapshot; take
   * one only between operations.
   */
  snapshot(timestamp?: string): LedgerSnapshot {
    return {
      version: 1,
      balances: [...this._balances.entries()].map(([account, amount]) => ({
        account,
        amount: amount.toString(),
      })),
      totalHeld: this._totalHeld.toString(),
      totalDeposited: this._totalDeposited.toString(),
      bankCap: this._bankCap.toString(),
      operationCount: this._operationCount,
      createdAt: timestamp ?? new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. Rejects a snapshot whose balances
   * do not sum to its totalHeld.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, converter?: UnitConverter): Ledger {
    const ledger = new Ledger({ bankCap: parseSnapshotAmount(snapshot.bankCap), converter });

    let sum = 0n;
    for (const { account, amount } of snapshot.balances) {
      ledger._assertAccount(account);
      const value = parseSnapshotAmount(amount);
      ledger._balances.set(account, value);
      sum = checkedAdd(sum, value);
    }

    const totalHeld = parseSnapshotAmount(snapshot.totalHeld);
    if (sum !== totalHeld) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot balances sum to ${sum.toString()} but totalHeld is ${totalHeld.toString()}`,
      );
    }

    ledger._totalHeld = totalHeld;
    ledger._totalDeposited = parseSnapshotAmount(snapshot.totalDeposited);
    ledger._operationCount = snapshot.operationCount;
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertAccount(account: Address): void {
    if (account.trim() === "") {
      throw new LedgerError("INVALID_ACCOUNT", "Account must be a non-empty string");
    }
  }

  private _assertPositive(amount: bigint): void {
    assertUint(amount);
    if (amount === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Amount must be greater than zero");
    }
  }

  private _takeOpenDebit(receipt: DebitReceipt): DebitReceipt {
    const open = this._openDebits.get(receipt.receiptId);
    if (open === undefined) {
      throw new LedgerError(
        "UNKNOWN_RECEIPT",
        `Debit "${receipt.receiptId}" is not open`,
      );
    }
    this._openDebits.delete(receipt.receiptId);
    return open;
  }
}

function parseSnapshotAmount(value: string): bigint {
  if (!/^(0|[1-9]\d*)$/.test(value)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Invalid snapshot amount: "${value}"`);
  }
  return assertUint(BigInt(value));
}
