/**
 * Vault — Custodial swap-and-credit vault, top-level coordinator.
 *
 * Composes:
 * - Ledger (balances, totals, bank cap)
 * - AccessControl (admin role, pause switch)
 * - DepositOrchestrator (pull-in, swap, credit)
 * - WithdrawalHandler (debit, transfer, reverse on failure)
 * - VaultEventLog (hash-chained domain events)
 *
 * Every operation that moves custody runs on one SerialLane. Cap and
 * role changes are synchronous and need no lane.
 *
 * Only withdrawals may re-enter a running operation. A deposit or rescue
 * issued from inside one (a pool's swap, a receive hook) fails with
 * REENTRANT_CALL, since its inflow would land inside the outer
 * operation's balance-delta measurement.
 */

import type { Address, AssetBook, AssetId, NativeWrapper, PoolFactory } from "@capvault/types";
import { isAddress, isAssetId } from "@capvault/types";
import { Ledger } from "@capvault/ledger";
import type { LedgerTotals } from "@capvault/ledger";
import { PoolAdapter } from "@capvault/amm";
import { InMemoryEventStore, VAULT_EVENTS } from "@capvault/event-store";
import type { EventStore } from "@capvault/event-store";
import { AccessControl } from "./access-control.js";
import { DepositOrchestrator } from "./deposit-orchestrator.js";
import { VaultEventLog } from "./event-log.js";
import { SerialLane } from "./serial-lane.js";
import { WithdrawalHandler } from "./withdrawal-handler.js";
import type {
  DepositQuote,
  DepositReceipt,
  DepositRequest,
  NativeDepositRequest,
  RescueReceipt,
  VaultConfig,
  WithdrawalReceipt,
} from "./types.js";
import { VaultError } from "./types.js";

export interface VaultDeps {
  readonly book: AssetBook;
  readonly factory: PoolFactory;
  readonly wrapper?: NativeWrapper | undefined;
  readonly eventStore?: EventStore | undefined;
  /** Restored ledger; replaces the one built from `config.bankCap` */
  readonly ledger?: Ledger | undefined;
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly config: VaultConfig;
  readonly ledger: Ledger;
  readonly access: AccessControl;
  readonly events: EventStore;

  private readonly book: AssetBook;
  private readonly log: VaultEventLog;
  private readonly lane = new SerialLane();
  private readonly deposits: DepositOrchestrator;
  private readonly withdrawals: WithdrawalHandler;
  private nextAdminOp = 1;

  constructor(config: VaultConfig, deps: VaultDeps) {
    if (!isAddress(config.vaultAddress)) {
      throw new VaultError("INVALID_INPUT", `Invalid vault address: "${config.vaultAddress}"`);
    }
    if (!isAssetId(config.referenceAsset)) {
      throw new VaultError("INVALID_INPUT", `Invalid reference asset: "${config.referenceAsset}"`);
    }

    this.config = config;
    this.book = deps.book;
    this.ledger =
      deps.ledger ?? new Ledger({ bankCap: config.bankCap, converter: config.converter });
    this.access = new AccessControl(config.admins);
    this.events = deps.eventStore ?? new InMemoryEventStore({ now: deps.now });
    this.log = new VaultEventLog(this.events, deps.now);

    const shared = {
      vaultAddress: config.vaultAddress,
      referenceAsset: config.referenceAsset,
      ledger: this.ledger,
      book: deps.book,
      access: this.access,
      events: this.log,
    };
    this.deposits = new DepositOrchestrator({
      ...shared,
      adapter: new PoolAdapter({ factory: deps.factory, book: deps.book }),
      wrapper: deps.wrapper,
    });
    this.withdrawals = new WithdrawalHandler(shared);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits & withdrawals
  // ───────────────────────────────────────────────────────────────────────

  depositToken(request: DepositRequest): Promise<DepositReceipt> {
    return this.exclusive("depositToken", () => this.deposits.deposit(request));
  }

  depositNative(request: NativeDepositRequest): Promise<DepositReceipt> {
    return this.exclusive("depositNative", () => this.deposits.depositNative(request));
  }

  withdraw(user: Address, amount: bigint): Promise<WithdrawalReceipt> {
    return this.lane.run(() => this.withdrawals.withdraw(user, amount));
  }

  quoteDeposit(assetIn: AssetId, amountIn: bigint): Promise<DepositQuote> {
    return this.deposits.quote(assetIn, amountIn);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(user: Address): bigint {
    return this.ledger.balanceOf(user);
  }

  totals(): LedgerTotals {
    return this.ledger.totals();
  }

  capHeadroom(): bigint {
    return this.ledger.capHeadroom();
  }

  isPaused(): boolean {
    return this.access.isPaused();
  }

  /**
   * Reference units held by the vault beyond what users are owed.
   */
  async surplus(): Promise<bigint> {
    const held = await this.book.balanceOf(this.config.referenceAsset, this.config.vaultAddress);
    const owed = this.ledger.totals().totalHeld;
    return held > owed ? held - owed : 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  setBankCap(caller: Address, cap: bigint): { readonly previous: bigint; readonly current: bigint } {
    this.access.requireAdmin(caller);
    const change = this.ledger.setBankCap(cap);
    this.log.record(VAULT_EVENTS.CAP_UPDATED, caller, this.adminOpId(), {
      previous: change.previous.toString(),
      current: change.current.toString(),
      updatedBy: caller,
    });
    return change;
  }

  pause(caller: Address): void {
    if (this.access.pause(caller)) {
      this.log.record(VAULT_EVENTS.PAUSED, caller, this.adminOpId(), { by: caller });
    }
  }

  unpause(caller: Address): void {
    if (this.access.unpause(caller)) {
      this.log.record(VAULT_EVENTS.UNPAUSED, caller, this.adminOpId(), { by: caller });
    }
  }

  grantAdmin(caller: Address, account: Address): void {
    this.access.grantAdmin(caller, account);
  }

  revokeAdmin(caller: Address, account: Address): void {
    this.access.revokeAdmin(caller, account);
  }

  /**
   * Move assets the ledger does not account for out of custody. For the
   * reference asset, only the surplus above `totalHeld` may leave.
   */
  rescue(caller: Address, asset: AssetId, to: Address, amount: bigint): Promise<RescueReceipt> {
    return this.exclusive("rescue", async () => {
      this.access.requireAdmin(caller);
      if (!isAssetId(asset) || !isAddress(to) || amount <= 0n) {
        throw new VaultError("INVALID_INPUT", "Rescue needs an asset, a recipient and a positive amount");
      }
      if (asset === this.config.referenceAsset) {
        const surplus = await this.surplus();
        if (amount > surplus) {
          throw new VaultError(
            "RESCUE_EXCEEDS_SURPLUS",
            `Only ${surplus.toString()} ${asset} is unaccounted for`,
            { requested: amount.toString(), surplus: surplus.toString() },
          );
        }
      }

      await this.book.transfer(asset, this.config.vaultAddress, to, amount);
      this.log.record(VAULT_EVENTS.RESCUE_COMPLETED, caller, this.adminOpId(), {
        asset,
        to,
        amount: amount.toString(),
        rescuedBy: caller,
      });
      return { asset, to, amount };
    });
  }

  private exclusive<T>(operation: string, task: () => Promise<T>): Promise<T> {
    if (this.lane.isInside()) {
      return Promise.reject(
        new VaultError("REENTRANT_CALL", `${operation} cannot run inside another vault operation`, {
          operation,
        }),
      );
    }
    return this.lane.run(task);
  }

  private adminOpId(): string {
    return `admin-${String(this.nextAdminOp++)}`;
  }
}
