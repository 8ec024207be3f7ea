/**
 * InMemoryAssetBook — In-process asset custody.
 *
 * Stores balances per (asset, holder) in plain maps. Suitable for:
 * - Unit and integration tests
 * - The simulated market behind the HTTP node
 * - The CLI demo
 *
 * Behaviors modelled on real tokens:
 * - Fee-on-transfer: an asset may skim `transferFeeBps` of every transfer
 *   to a fee collector, so the recipient receives less than requested
 * - Receive hooks: a holder may run code when it receives funds. The hook
 *   runs after balances move and before the transfer resolves, so it can
 *   re-enter whoever initiated the transfer. A throwing hook reverts the
 *   transfer, unless the hook already moved the received funds on; then
 *   the transfer stands and fails with ROLLBACK_FAILED.
 */

import type { Address, AssetBook, AssetId, AssetInfo } from "@capvault/types";
import { UINT256_MAX } from "@capvault/types";
import { checkedAdd, checkedSub } from "@capvault/ledger";

// =============================================================================
// Types
// =============================================================================

export interface MarketAsset extends AssetInfo {
  /** Basis points skimmed from each transfer. Default: 0. */
  readonly transferFeeBps?: number | undefined;
}

export interface TransferRecord {
  readonly asset: AssetId;
  readonly from: Address;
  readonly to: Address;
  /** Amount the sender asked to move. */
  readonly requested: bigint;
  /** Amount the recipient actually received. */
  readonly received: bigint;
  readonly fee: bigint;
}

export type ReceiveHook = (transfer: TransferRecord) => void | Promise<void>;

export type AssetBookErrorCode =
  | "UNKNOWN_ASSET"
  | "DUPLICATE_ASSET"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_AMOUNT"
  | "INVALID_FEE"
  | "ROLLBACK_FAILED";

export class AssetBookError extends Error {
  constructor(
    public readonly code: AssetBookErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "AssetBookError";
  }
}

export const DEFAULT_FEE_COLLECTOR = "asset-fees";

// =============================================================================
// InMemoryAssetBook
// =============================================================================

export class InMemoryAssetBook implements AssetBook {
  private readonly _assets = new Map<AssetId, MarketAsset>();
  private readonly _balances = new Map<AssetId, Map<Address, bigint>>();
  private readonly _hooks = new Map<Address, ReceiveHook>();
  private readonly _feeCollector: Address;

  constructor(options?: { readonly feeCollector?: Address }) {
    this._feeCollector = options?.feeCollector ?? DEFAULT_FEE_COLLECTOR;
  }

  // ─── Assets ─────────────────────────────────────────────────────────

  registerAsset(asset: MarketAsset): void {
    if (this._assets.has(asset.id)) {
      throw new AssetBookError("DUPLICATE_ASSET", `Asset already registered: "${asset.id}"`);
    }
    const fee = asset.transferFeeBps ?? 0;
    if (!Number.isInteger(fee) || fee < 0 || fee > 10_000) {
      throw new AssetBookError(
        "INVALID_FEE",
        `Transfer fee must be an integer between 0 and 10000 bps, got ${String(fee)}`,
      );
    }
    this._assets.set(asset.id, { ...asset });
    this._balances.set(asset.id, new Map());
  }

  getAsset(asset: AssetId): MarketAsset | undefined {
    return this._assets.get(asset);
  }

  listAssets(): readonly MarketAsset[] {
    return [...this._assets.values()];
  }

  // ─── Supply ─────────────────────────────────────────────────────────

  mint(asset: AssetId, to: Address, amount: bigint): void {
    const ledger = this._ledgerFor(asset);
    ledger.set(to, checkedAdd(ledger.get(to) ?? 0n, amount));
  }

  burn(asset: AssetId, from: Address, amount: bigint): void {
    const ledger = this._ledgerFor(asset);
    const balance = ledger.get(from) ?? 0n;
    if (balance < amount) {
      throw new AssetBookError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${balance.toString()} ${asset}, cannot burn ${amount.toString()}`,
      );
    }
    ledger.set(from, balance - amount);
  }

  // ─── AssetBook ──────────────────────────────────────────────────────

  async balanceOf(asset: AssetId, holder: Address): Promise<bigint> {
    return this._ledgerFor(asset).get(holder) ?? 0n;
  }

  async transferFrom(
    asset: AssetId,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void> {
    await this._move(asset, from, to, amount);
  }

  async transfer(
    asset: AssetId,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void> {
    await this._move(asset, from, to, amount);
  }

  // ─── Hooks ──────────────────────────────────────────────────────────

  /**
   * Run `hook` whenever `holder` receives any asset.
   * Returns a function that removes the hook.
   */
  onReceive(holder: Address, hook: ReceiveHook): () => void {
    this._hooks.set(holder, hook);
    return () => {
      if (this._hooks.get(holder) === hook) {
        this._hooks.delete(holder);
      }
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _ledgerFor(asset: AssetId): Map<Address, bigint> {
    const ledger = this._balances.get(asset);
    if (ledger === undefined) {
      throw new AssetBookError("UNKNOWN_ASSET", `Unknown asset: "${asset}"`);
    }
    return ledger;
  }

  private async _move(
    asset: AssetId,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void> {
    if (amount < 0n) {
      throw new AssetBookError("INVALID_AMOUNT", `Transfer amount must not be negative`);
    }
    const ledger = this._ledgerFor(asset);
    const feeBps = BigInt(this._assets.get(asset)?.transferFeeBps ?? 0);

    const fromBalance = ledger.get(from) ?? 0n;
    if (fromBalance < amount) {
      throw new AssetBookError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${fromBalance.toString()} ${asset}, cannot transfer ${amount.toString()}`,
      );
    }

    const fee = (amount * feeBps) / 10_000n;
    const received = amount - fee;

    ledger.set(from, checkedSub(fromBalance, amount));
    ledger.set(to, checkedAdd(ledger.get(to) ?? 0n, received));
    if (fee > 0n) {
      ledger.set(this._feeCollector, checkedAdd(ledger.get(this._feeCollector) ?? 0n, fee));
    }

    const hook = this._hooks.get(to);
    if (hook === undefined) return;
    try {
      await hook({ asset, from, to, requested: amount, received, fee });
    } catch (err) {
      if (!this._revert(ledger, from, to, amount, received, fee)) {
        throw new AssetBookError(
          "ROLLBACK_FAILED",
          `${to} rejected ${received.toString()} ${asset} after moving it on; the transfer stands`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  /**
   * Undo a transfer in one step. Returns false, touching nothing, when
   * the recipient or the fee collector no longer holds what it received.
   */
  private _revert(
    ledger: Map<Address, bigint>,
    from: Address,
    to: Address,
    amount: bigint,
    received: bigint,
    fee: bigint,
  ): boolean {
    const next = new Map<Address, bigint>();
    const balance = (holder: Address): bigint => next.get(holder) ?? ledger.get(holder) ?? 0n;
    const takeBack = (holder: Address, value: bigint): boolean => {
      const current = balance(holder);
      if (current < value) return false;
      next.set(holder, current - value);
      return true;
    };

    if (!takeBack(to, received) || !takeBack(this._feeCollector, fee)) {
      return false;
    }
    const restored = balance(from) + amount;
    if (restored > UINT256_MAX) {
      return false;
    }
    next.set(from, restored);

    for (const [holder, value] of next) {
      ledger.set(holder, value);
    }
    return true;
  }
}
