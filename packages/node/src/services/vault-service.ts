/**
 * VaultService — Composition root for the HTTP node.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the market, the vault and its
 * event store, and logs the outcome of every vault operation.
 */

import type { Logger } from "pino";
import type { Address, AssetId } from "@capvault/types";
import { createUnitConverter } from "@capvault/ledger";
import { InMemoryEventStore } from "@capvault/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
} from "@capvault/event-store";
import { Vault } from "@capvault/vault";
import type {
  DepositQuote,
  DepositReceipt,
  RescueReceipt,
  WithdrawalReceipt,
} from "@capvault/vault";
import type { MarketFile } from "../config.js";
import type { VaultStatus } from "../types/dto.js";
import { buildMarket } from "./market.js";
import type { Market } from "./market.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vaultAddress: Address;
  readonly referenceAsset: AssetId;
  readonly referenceDecimals: number;
  readonly capDecimals: number;
  /** Bank cap in cap units */
  readonly bankCap: bigint;
  readonly admins: readonly Address[];
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly market: Market;
  readonly eventStore: InMemoryEventStore;

  private readonly log: Logger;

  constructor(config: VaultServiceConfig, market: Market, logger: Logger) {
    this.market = market;
    this.log = logger.child({ component: "vault" });
    this.eventStore = new InMemoryEventStore();
    this.vault = new Vault(
      {
        vaultAddress: config.vaultAddress,
        referenceAsset: config.referenceAsset,
        bankCap: config.bankCap,
        admins: config.admins,
        converter: createUnitConverter(config.referenceDecimals, config.capDecimals),
      },
      {
        book: market.book,
        factory: market.factory,
        wrapper: market.wrapper,
        eventStore: this.eventStore,
      },
    );
  }

  static async fromMarketFile(
    config: VaultServiceConfig,
    file: MarketFile,
    logger: Logger,
  ): Promise<VaultService> {
    return new VaultService(config, await buildMarket(file), logger);
  }

  // ─── Deposits & Withdrawals ────────────────────────────────────────

  depositToken(
    user: Address,
    assetIn: AssetId,
    amountIn: bigint,
    minAmountOut: bigint,
  ): Promise<DepositReceipt> {
    return this.observe(
      "deposit",
      { user, assetIn, amountIn: amountIn.toString() },
      () => this.vault.depositToken({ user, assetIn, amountIn, minAmountOut }),
      (r) => ({ depositId: r.depositId, credited: r.referenceCredited.toString(), path: r.path }),
    );
  }

  depositNative(user: Address, amount: bigint, minAmountOut: bigint): Promise<DepositReceipt> {
    return this.observe(
      "deposit.native",
      { user, amount: amount.toString() },
      () => this.vault.depositNative({ user, amount, minAmountOut }),
      (r) => ({ depositId: r.depositId, credited: r.referenceCredited.toString() }),
    );
  }

  quoteDeposit(assetIn: AssetId, amountIn: bigint): Promise<DepositQuote> {
    return this.vault.quoteDeposit(assetIn, amountIn);
  }

  withdraw(user: Address, amount: bigint): Promise<WithdrawalReceipt> {
    return this.observe(
      "withdraw",
      { user, amount: amount.toString() },
      () => this.vault.withdraw(user, amount),
      (r) => ({ withdrawalId: r.withdrawalId, balanceAfter: r.balanceAfter.toString() }),
    );
  }

  // ─── Queries ───────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this.vault.balanceOf(address);
  }

  async status(): Promise<VaultStatus> {
    return {
      referenceAsset: this.vault.config.referenceAsset,
      totals: this.vault.totals(),
      capHeadroom: this.vault.capHeadroom(),
      surplus: await this.vault.surplus(),
      paused: this.vault.isPaused(),
    };
  }

  // ─── Administration ────────────────────────────────────────────────

  setBankCap(caller: Address, cap: bigint): { readonly previous: bigint; readonly current: bigint } {
    const change = this.vault.setBankCap(caller, cap);
    this.log.info(
      { caller, previous: change.previous.toString(), current: change.current.toString() },
      "bank cap updated",
    );
    return change;
  }

  pause(caller: Address): void {
    this.vault.pause(caller);
    this.log.warn({ caller }, "vault paused");
  }

  unpause(caller: Address): void {
    this.vault.unpause(caller);
    this.log.info({ caller }, "vault unpaused");
  }

  rescue(caller: Address, asset: AssetId, to: Address, amount: bigint): Promise<RescueReceipt> {
    return this.observe(
      "rescue",
      { caller, asset, to, amount: amount.toString() },
      () => this.vault.rescue(caller, asset, to, amount),
      () => ({}),
    );
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  verifyEvents(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async observe<T>(
    operation: string,
    context: Record<string, string>,
    run: () => Promise<T>,
    summarize: (result: T) => Record<string, string>,
  ): Promise<T> {
    try {
      const result = await run();
      this.log.info({ operation, ...context, ...summarize(result) }, `${operation} completed`);
      return result;
    } catch (err) {
      this.log.warn({ operation, ...context, err }, `${operation} failed`);
      throw err;
    }
  }
}
