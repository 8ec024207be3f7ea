/**
 * AccessControl — Admin role and the pause switch.
 *
 * Rules:
 * - Only admins pause, unpause, change roles, move the cap or rescue
 * - Pausing stops deposits and withdrawals; admin calls still work
 * - The last admin cannot be revoked
 */

import type { Address } from "@capvault/types";
import { isAddress } from "@capvault/types";
import { VaultError } from "./types.js";

export class AccessControl {
  private readonly _admins: Set<Address>;
  private _paused = false;

  constructor(admins: readonly Address[]) {
    for (const admin of admins) assertAddress(admin);
    this._admins = new Set(admins);
  }

  isAdmin(caller: Address): boolean {
    return this._admins.has(caller);
  }

  isPaused(): boolean {
    return this._paused;
  }

  listAdmins(): readonly Address[] {
    return [...this._admins];
  }

  requireAdmin(caller: Address): void {
    if (!this.isAdmin(caller)) {
      throw new VaultError("UNAUTHORIZED", `${caller} is not an admin`, { caller });
    }
  }

  requireActive(): void {
    if (this._paused) {
      throw new VaultError("SYSTEM_PAUSED", "The vault is paused");
    }
  }

  /** Returns false if the vault was already paused. */
  pause(caller: Address): boolean {
    this.requireAdmin(caller);
    const changed = !this._paused;
    this._paused = true;
    return changed;
  }

  /** Returns false if the vault was not paused. */
  unpause(caller: Address): boolean {
    this.requireAdmin(caller);
    const changed = this._paused;
    this._paused = false;
    return changed;
  }

  grantAdmin(caller: Address, account: Address): void {
    this.requireAdmin(caller);
    assertAddress(account);
    this._admins.add(account);
  }

  revokeAdmin(caller: Address, account: Address): void {
    this.requireAdmin(caller);
    if (this._admins.has(account) && this._admins.size === 1) {
      throw new VaultError("INVALID_INPUT", "Cannot revoke the last admin", { account });
    }
    this._admins.delete(account);
  }
}

function assertAddress(value: string): void {
  if (!isAddress(value)) {
    throw new VaultError("INVALID_INPUT", `Invalid address: "${value}"`);
  }
}
