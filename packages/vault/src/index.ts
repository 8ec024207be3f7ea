/**
 * @capvault/vault — Custodial swap-and-credit vault.
 *
 * Users deposit any asset with a pool against the reference asset; the
 * vault swaps it, credits the measured output to the user's ledger
 * balance under the bank cap, and pays balances back on withdrawal.
 */

export { Vault } from "./vault.js";
export type { VaultDeps } from "./vault.js";

export { AccessControl } from "./access-control.js";
export { SerialLane } from "./serial-lane.js";
export { VaultEventLog, VAULT_STREAM } from "./event-log.js";
export { DepositOrchestrator } from "./deposit-orchestrator.js";
export type { DepositOrchestratorDeps } from "./deposit-orchestrator.js";
export { WithdrawalHandler } from "./withdrawal-handler.js";
export type { WithdrawalHandlerDeps } from "./withdrawal-handler.js";

export type {
  VaultConfig,
  DepositRequest,
  NativeDepositRequest,
  DepositPlan,
  DepositPath,
  DepositReceipt,
  DepositQuote,
  WithdrawalReceipt,
  RescueReceipt,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";
