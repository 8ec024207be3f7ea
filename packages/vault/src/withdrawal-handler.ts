/**
 * Withdrawal Handler — Pays reference balance back to its owner.
 *
 * The ledger debit commits before the outbound transfer starts, so a
 * call that re-enters the vault during the transfer already sees the
 * lower balance.
 *
 * A failed transfer is judged by the vault's reference balance, not by
 * the error: if the payout left custody anyway, the debit settles and
 * the withdrawal completes. Only when nothing left is the debit reversed
 * and the failure surfaced as TRANSFER_FAILED.
 */

import type { Address, AssetBook, AssetId } from "@capvault/types";
import { isAddress } from "@capvault/types";
import { LedgerError } from "@capvault/ledger";
import type { Ledger } from "@capvault/ledger";
import { VAULT_EVENTS } from "@capvault/event-store";
import type { AccessControl } from "./access-control.js";
import type { VaultEventLog } from "./event-log.js";
import type { WithdrawalReceipt } from "./types.js";
import { VaultError } from "./types.js";

export interface WithdrawalHandlerDeps {
  readonly vaultAddress: Address;
  readonly referenceAsset: AssetId;
  readonly ledger: Ledger;
  readonly book: AssetBook;
  readonly access: AccessControl;
  readonly events: VaultEventLog;
}

export class WithdrawalHandler {
  private nextWithdrawal = 1;
  /** Reference units paid out by settled withdrawals, nested ones included */
  private paidOut = 0n;

  constructor(private readonly deps: WithdrawalHandlerDeps) {}

  async withdraw(user: Address, amount: bigint): Promise<WithdrawalReceipt> {
    if (!isAddress(user)) {
      throw new VaultError("INVALID_INPUT", `Invalid user address: "${user}"`);
    }
    if (amount === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Withdrawal amount must be greater than zero");
    }
    this.deps.access.requireActive();

    const { ledger, book, vaultAddress, referenceAsset, events } = this.deps;
    const heldBefore = await book.balanceOf(referenceAsset, vaultAddress);
    const paidOutBefore = this.paidOut;
    const debit = ledger.debit(user, amount);

    try {
      await book.transfer(referenceAsset, vaultAddress, user, amount);
    } catch (err) {
      // Withdrawals nested inside this transfer account for their own outflow.
      const nested = this.paidOut - paidOutBefore;
      const left = heldBefore - (await book.balanceOf(referenceAsset, vaultAddress)) - nested;
      if (left <= 0n) {
        ledger.reverseDebit(debit);
        throw new VaultError(
          "TRANSFER_FAILED",
          `Transfer of ${amount.toString()} ${referenceAsset} to ${user} failed: ${err instanceof Error ? err.message : String(err)}`,
          { amount: amount.toString() },
          { cause: err },
        );
      }
    }
    ledger.settleDebit(debit);
    this.paidOut += amount;

    const receipt: WithdrawalReceipt = {
      withdrawalId: `wd-${String(this.nextWithdrawal++)}`,
      user,
      amount,
      balanceAfter: debit.balanceAfter,
    };
    events.record(VAULT_EVENTS.WITHDRAWAL_COMPLETED, user, receipt.withdrawalId, {
      withdrawalId: receipt.withdrawalId,
      user,
      amount: amount.toString(),
      balanceAfter: receipt.balanceAfter.toString(),
    });
    return receipt;
  }
}
