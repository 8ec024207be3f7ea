/**
 * Tests for the core Ledger class.
 *
 * Covers:
 * - Credits and cap enforcement
 * - Debits and sufficient-funds checks
 * - Debit settlement and reversal
 * - Cumulative deposit tracking across withdrawals
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Ledger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";
import type { LedgerErrorCode } from "../src/types.js";
import { createUnitConverter } from "../src/unit-converter.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-01-15T10:00:00.000Z";

/** 1,000 whole reference units expressed in 8-decimal cap units. */
const CAP_1000 = 1_000n * 10n ** 8n;

/** Whole reference units (6 decimals) to base units. */
function usdc(whole: number): bigint {
  return BigInt(whole) * 1_000_000n;
}

function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): LedgerError {
  try {
    fn();
  } catch (err) {
    if (!(err instanceof LedgerError)) throw err;
    expect(err.code).toBe(code);
    return err;
  }
  throw new Error(`Expected LedgerError ${code}`);
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger({ bankCap: CAP_1000 });
  });

  describe("credit", () => {
    it("credits a new account and updates every total together", () => {
      const result = ledger.credit("alice", usdc(500));

      expect(result.balanceAfter).toBe(500_000_000n);
      expect(result.amountCap).toBe(50_000_000_000n);
      expect(ledger.balanceOf("alice")).toBe(500_000_000n);
      expect(ledger.totals()).toEqual({
        totalDeposited: 50_000_000_000n,
        totalHeld: 500_000_000n,
        bankCap: CAP_1000,
        operationCount: 1,
      });
    });

    it("accumulates repeated credits", () => {
      ledger.credit("alice", usdc(100));
      ledger.credit("alice", usdc(50));
      expect(ledger.balanceOf("alice")).toBe(usdc(150));
    });

    it("allows a credit that lands exactly on the cap", () => {
      ledger.credit("alice", usdc(1000));
      expect(ledger.totals().totalDeposited).toBe(CAP_1000);
      expect(ledger.capHeadroom()).toBe(0n);
    });

    it("rejects a credit above the cap with no state change", () => {
      ledger.credit("alice", usdc(900));
      const before = ledger.totals();

      const err = expectLedgerError(() => ledger.credit("bob", usdc(101)), "CAP_EXCEEDED");

      expect(err.details).toEqual({
        newTotal: (1_001n * 10n ** 8n).toString(),
        cap: CAP_1000.toString(),
      });
      expect(ledger.totals()).toEqual(before);
      expect(ledger.balanceOf("bob")).toBe(0n);
      expect(ledger.accounts()).toEqual(["alice"]);
    });

    it("rejects zero amounts", () => {
      expectLedgerError(() => ledger.credit("alice", 0n), "ZERO_AMOUNT");
    });

    it("rejects empty accounts", () => {
      expectLedgerError(() => ledger.credit("  ", usdc(1)), "INVALID_ACCOUNT");
    });
  });

  describe("debit", () => {
    beforeEach(() => {
      ledger.credit("alice", usdc(300));
    });

    it("decrements balance and totalHeld but not totalDeposited", () => {
      const receipt = ledger.debit("alice", usdc(100));

      expect(receipt.balanceAfter).toBe(usdc(200));
      expect(receipt.account).toBe("alice");
      expect(ledger.totals().totalHeld).toBe(usdc(200));
      expect(ledger.totals().totalDeposited).toBe(300n * 10n ** 8n);
    });

    it("rejects zero amounts", () => {
      expectLedgerError(() => ledger.debit("alice", 0n), "ZERO_AMOUNT");
    });

    it("rejects debits above the balance with no state change", () => {
      const before = ledger.totals();
      expectLedgerError(() => ledger.debit("alice", usdc(301)), "INSUFFICIENT_BALANCE");
      expect(ledger.totals()).toEqual(before);
      expect(ledger.balanceOf("alice")).toBe(usdc(300));
    });

    it("rejects debits from unknown accounts", () => {
      expectLedgerError(() => ledger.debit("bob", 1n), "INSUFFICIENT_BALANCE");
    });

    it("can drain an account to zero", () => {
      ledger.debit("alice", usdc(300));
      expect(ledger.balanceOf("alice")).toBe(0n);
      expect(ledger.accounts()).toEqual(["alice"]);
    });
  });

  describe("settle and reverse", () => {
    beforeEach(() => {
      ledger.credit("alice", usdc(300));
    });

    it("reverseDebit restores balance and totalHeld", () => {
      const receipt = ledger.debit("alice", usdc(120));
      ledger.reverseDebit(receipt);

      expect(ledger.balanceOf("alice")).toBe(usdc(300));
      expect(ledger.totals().totalHeld).toBe(usdc(300));
      expect(ledger.totals().totalDeposited).toBe(300n * 10n ** 8n);
    });

    it("a receipt closes exactly once", () => {
      const receipt = ledger.debit("alice", usdc(10));
      ledger.settleDebit(receipt);

      expectLedgerError(() => ledger.reverseDebit(receipt), "UNKNOWN_RECEIPT");
      expectLedgerError(() => ledger.settleDebit(receipt), "UNKNOWN_RECEIPT");
    });

    it("issues distinct receipt ids", () => {
      const a = ledger.debit("alice", 1n);
      const b = ledger.debit("alice", 1n);
      expect(a.receiptId).not.toBe(b.receiptId);
    });
  });

  describe("cumulative cap", () => {
    it("does not regain headroom when funds are withdrawn", () => {
      ledger.credit("alice", usdc(1000));
      ledger.settleDebit(ledger.debit("alice", usdc(1000)));

      expect(ledger.totals().totalHeld).toBe(0n);
      expectLedgerError(() => ledger.credit("alice", 1n), "CAP_EXCEEDED");
    });

    it("raising the cap reopens headroom", () => {
      ledger.credit("alice", usdc(1000));
      const change = ledger.setBankCap(2n * CAP_1000);

      expect(change).toEqual({ previous: CAP_1000, current: 2n * CAP_1000 });
      expect(ledger.capHeadroom()).toBe(usdc(1000));
      expect(ledger.credit("alice", usdc(1)).balanceAfter).toBe(usdc(1001));
    });

    it("lowering the cap below totalDeposited blocks further credits", () => {
      ledger.credit("alice", usdc(600));
      ledger.setBankCap(CAP_1000 / 2n);
      expect(ledger.capHeadroom()).toBe(0n);
      expectLedgerError(() => ledger.credit("bob", 1n), "CAP_EXCEEDED");
    });

    it("rejects a negative cap", () => {
      expectLedgerError(() => ledger.setBankCap(-1n), "INVALID_AMOUNT");
    });
  });

  describe("custom precision", () => {
    it("applies the converter's scale to cap checks", () => {
      const wide = new Ledger({
        bankCap: 10n ** 18n,
        converter: createUnitConverter(6, 18),
      });
      wide.credit("alice", 1_000_000n);
      expect(wide.totals().totalDeposited).toBe(10n ** 18n);
      expectLedgerError(() => wide.credit("alice", 1n), "CAP_EXCEEDED");
    });
  });

  describe("snapshot", () => {
    it("round-trips balances and totals", () => {
      ledger.credit("alice", usdc(300));
      ledger.credit("bob", usdc(200));
      ledger.settleDebit(ledger.debit("bob", usdc(50)));

      const snap = ledger.snapshot(TS);
      expect(snap).toEqual({
        version: 1,
        balances: [
          { account: "alice", amount: "300000000" },
          { account: "bob", amount: "150000000" },
        ],
        totalHeld: "450000000",
        totalDeposited: "50000000000",
        bankCap: CAP_1000.toString(),
        operationCount: 3,
        createdAt: TS,
      });

      const restored = Ledger.fromSnapshot(snap);
      expect(restored.totals()).toEqual(ledger.totals());
      expect(restored.balanceOf("bob")).toBe(usdc(150));
    });

    it("rejects a snapshot whose balances do not back totalHeld", () => {
      ledger.credit("alice", usdc(300));
      const snap = { ...ledger.snapshot(TS), totalHeld: "1" };
      expectLedgerError(() => Ledger.fromSnapshot(snap), "INVALID_SNAPSHOT");
    });

    it("rejects malformed amounts", () => {
      const snap = { ...ledger.snapshot(TS), bankCap: "-5" };
      expectLedgerError(() => Ledger.fromSnapshot(snap), "INVALID_SNAPSHOT");
    });
  });
});
