/**
 * @capvault/ledger — Reference-asset ledger with a cumulative deposit cap.
 *
 * A pure TypeScript ledger with zero runtime dependencies beyond
 * @capvault/types. Enforces:
 * - sum of account balances == totalHeld
 * - totalDeposited (cap units) never passes the bank cap on credit
 * - a credit or debit applies entirely or not at all
 * - all arithmetic is checked uint256 bigint (no floating point)
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";

// Unit conversion
export {
  createUnitConverter,
  toCapUnits,
  REFERENCE_DECIMALS,
  CAP_DECIMALS,
} from "./unit-converter.js";
export type { UnitConverter } from "./unit-converter.js";

// Checked arithmetic
export {
  assertUint,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  minUint,
  parseAmount,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  LedgerTotals,
  CreditResult,
  DebitReceipt,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
