/**
 * Deposit Orchestrator — Turns an inbound asset into a reference credit.
 *
 * Flow:
 * 1. Validate the request, then check the pause switch
 * 2. Choose the plan: direct credit for the reference asset, otherwise
 *    swap through the pool for (assetIn, reference)
 * 3. Preflight the swap estimate on the nominal input, before funds move
 * 4. Pull the input into vault custody, measuring what actually arrived
 * 5. Swap (if planned), measuring the reference output that arrived
 * 6. Credit the ledger with the measured amount
 *
 * The ledger is touched only in step 6, in one synchronous call. A
 * failure anywhere before it leaves the ledger exactly as it was; funds
 * already pulled in stay in custody and a stranded event records them.
 */

import type { Address, AssetBook, AssetId, NativeWrapper } from "@capvault/types";
import { UINT256_MAX, isAddress, isAssetId } from "@capvault/types";
import type { CreditResult, Ledger } from "@capvault/ledger";
import { PoolError, expectedOut, quoteSwap } from "@capvault/amm";
import type { PoolAdapter } from "@capvault/amm";
import { VAULT_EVENTS } from "@capvault/event-store";
import type { AccessControl } from "./access-control.js";
import type { VaultEventLog } from "./event-log.js";
import type {
  DepositPlan,
  DepositQuote,
  DepositReceipt,
  DepositRequest,
  NativeDepositRequest,
} from "./types.js";
import { VaultError } from "./types.js";

export interface DepositOrchestratorDeps {
  readonly vaultAddress: Address;
  readonly referenceAsset: AssetId;
  readonly ledger: Ledger;
  readonly book: AssetBook;
  readonly adapter: PoolAdapter;
  readonly access: AccessControl;
  readonly events: VaultEventLog;
  readonly wrapper?: NativeWrapper | undefined;
}

/** Vault balances taken before a deposit's input moves. */
interface Custody {
  readonly inBefore: bigint;
  readonly referenceBefore: bigint;
}

interface Settlement {
  readonly depositId: string;
  readonly user: Address;
  readonly assetIn: AssetId;
  readonly amountIn: bigint;
  readonly amountReceived: bigint;
  readonly minAmountOut: bigint;
  readonly plan: DepositPlan;
  readonly custody: Custody;
}

export class DepositOrchestrator {
  private nextDeposit = 1;

  constructor(private readonly deps: DepositOrchestratorDeps) {}

  // ─── Planning ───────────────────────────────────────────────────────

  async plan(assetIn: AssetId): Promise<DepositPlan> {
    if (assetIn === this.deps.referenceAsset) {
      return { kind: "direct-credit" };
    }
    const pool = await this.deps.adapter.resolvePool(assetIn, this.deps.referenceAsset);
    return { kind: "swap-then-credit", pool };
  }

  /**
   * Preview a deposit without moving funds. Assumes the input arrives
   * without a transfer fee.
   */
  async quote(assetIn: AssetId, amountIn: bigint): Promise<DepositQuote> {
    assertAsset(assetIn);
    assertPositiveAmount(amountIn, "amountIn");

    const plan = await this.plan(assetIn);
    let referenceOut = amountIn;
    let priceImpactBps = 0;
    if (plan.kind === "swap-then-credit") {
      const { reserveIn, reserveOut } = await this.deps.adapter.getReserves(plan.pool, assetIn);
      const swap = quoteSwap(amountIn, reserveIn, reserveOut);
      referenceOut = swap.amountOut;
      priceImpactBps = swap.priceImpactBps;
    }

    const { ledger } = this.deps;
    const capHeadroom = ledger.capHeadroom();
    return {
      assetIn,
      amountIn,
      path: plan.kind,
      referenceOut,
      priceImpactBps,
      capUnits: ledger.converter.toCapUnits(referenceOut),
      capHeadroom,
      fitsUnderCap: referenceOut > 0n && referenceOut <= capHeadroom,
    };
  }

  // ─── Deposits ───────────────────────────────────────────────────────

  async deposit(request: DepositRequest): Promise<DepositReceipt> {
    const { user, assetIn, amountIn, minAmountOut } = request;
    assertUser(user);
    assertAsset(assetIn);
    assertPositiveAmount(amountIn, "amountIn");
    assertMinimum(minAmountOut);
    this.deps.access.requireActive();

    const plan = await this.plan(assetIn);
    await this.preflight(plan, assetIn, amountIn, minAmountOut);

    const { book, vaultAddress } = this.deps;
    const custody = await this.openCustody(assetIn);
    await book.transferFrom(assetIn, user, vaultAddress, amountIn);
    const amountReceived = (await book.balanceOf(assetIn, vaultAddress)) - custody.inBefore;
    if (amountReceived <= 0n) {
      throw new VaultError("ZERO_EFFECTIVE_INPUT", `The vault received none of the ${assetIn} deposit`, {
        amountIn: amountIn.toString(),
      });
    }

    return this.settle({
      depositId: this.newDepositId(),
      user,
      assetIn,
      amountIn,
      amountReceived,
      minAmountOut,
      plan,
      custody,
    });
  }

  /**
   * Wrap native currency, then deposit the wrapped asset.
   */
  async depositNative(request: NativeDepositRequest): Promise<DepositReceipt> {
    const { user, amount, minAmountOut } = request;
    assertUser(user);
    assertPositiveAmount(amount, "amount");
    assertMinimum(minAmountOut);
    this.deps.access.requireActive();

    const { wrapper, book, vaultAddress } = this.deps;
    if (wrapper === undefined) {
      throw new VaultError("WRAP_FAILED", "Native deposits are not configured");
    }
    const assetIn = wrapper.wrappedAsset;
    const plan = await this.plan(assetIn);
    await this.preflight(plan, assetIn, amount, minAmountOut);

    const custody = await this.openCustody(assetIn);
    try {
      await wrapper.wrap(user, amount, vaultAddress);
    } catch (err) {
      throw new VaultError(
        "WRAP_FAILED",
        `Wrapping ${amount.toString()} native for ${user} failed: ${errorMessage(err)}`,
        { amount: amount.toString() },
        { cause: err },
      );
    }
    const amountReceived = (await book.balanceOf(assetIn, vaultAddress)) - custody.inBefore;
    if (amountReceived <= 0n) {
      throw new VaultError("WRAP_FAILED", "The wrapper delivered nothing to the vault", {
        amount: amount.toString(),
      });
    }

    return this.settle({
      depositId: this.newDepositId(),
      user,
      assetIn,
      amountIn: amount,
      amountReceived,
      minAmountOut,
      plan,
      custody,
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Reject a swap whose nominal estimate already misses the minimum.
   * Transfer fees only lower the real input, so nothing that fails here
   * could pass after the pull-in.
   */
  private async preflight(
    plan: DepositPlan,
    assetIn: AssetId,
    amountIn: bigint,
    minAmountOut: bigint,
  ): Promise<void> {
    if (plan.kind === "direct-credit") return;
    const { reserveIn, reserveOut } = await this.deps.adapter.getReserves(plan.pool, assetIn);
    assertEstimate(expectedOut(amountIn, reserveIn, reserveOut), minAmountOut);
  }

  private async settle(s: Settlement): Promise<DepositReceipt> {
    const { ledger, adapter, vaultAddress, events } = this.deps;

    let referenceReceived = s.amountReceived;
    let credit: CreditResult;
    try {
      if (s.plan.kind === "swap-then-credit") {
        const { pool } = s.plan;
        const { reserveIn, reserveOut } = await adapter.getReserves(pool, s.assetIn);
        const estimate = expectedOut(s.amountReceived, reserveIn, reserveOut);
        assertEstimate(estimate, s.minAmountOut);

        const swap = await adapter.swap({
          pool,
          assetIn: s.assetIn,
          amountIn: s.amountReceived,
          amountOutExpected: estimate,
          minAmountOut: s.minAmountOut,
          from: vaultAddress,
          recipient: vaultAddress,
        });
        referenceReceived = swap.amountOutActual;
      }

      credit = ledger.credit(s.user, referenceReceived);
    } catch (err) {
      try {
        await this.recordStranded(s, err);
      } catch {
        // The deposit's own failure is the one to report.
      }
      throw err;
    }

    const receipt: DepositReceipt = {
      depositId: s.depositId,
      user: s.user,
      assetIn: s.assetIn,
      amountIn: s.amountIn,
      amountReceived: s.amountReceived,
      referenceCredited: credit.amount,
      capUnits: credit.amountCap,
      balanceAfter: credit.balanceAfter,
      path: s.plan.kind,
    };

    events.record(VAULT_EVENTS.DEPOSIT_COMPLETED, s.user, s.depositId, {
      depositId: receipt.depositId,
      user: receipt.user,
      assetIn: receipt.assetIn,
      amountIn: receipt.amountIn.toString(),
      amountReceived: receipt.amountReceived.toString(),
      referenceCredited: receipt.referenceCredited.toString(),
      path: receipt.path,
    });
    return receipt;
  }

  /**
   * Record what this deposit left behind. Reference output that reached
   * the vault is reported first; otherwise whatever input is still in
   * custody; otherwise the input went to the pool.
   */
  private async recordStranded(s: Settlement, err: unknown): Promise<void> {
    const { book, vaultAddress, referenceAsset, events } = this.deps;

    let strandedAsset = s.assetIn;
    let strandedAmount = s.amountReceived;
    let custodian: Address = vaultAddress;

    const referenceNow = await book.balanceOf(referenceAsset, vaultAddress);
    const inputNow = await book.balanceOf(s.assetIn, vaultAddress);
    if (referenceNow > s.custody.referenceBefore) {
      strandedAsset = referenceAsset;
      strandedAmount = referenceNow - s.custody.referenceBefore;
    } else if (inputNow > s.custody.inBefore) {
      strandedAmount = inputNow - s.custody.inBefore;
    } else if (s.plan.kind === "swap-then-credit") {
      custodian = s.plan.pool.address;
    }

    events.record(VAULT_EVENTS.DEPOSIT_STRANDED, s.user, s.depositId, {
      depositId: s.depositId,
      user: s.user,
      assetIn: s.assetIn,
      amountIn: s.amountIn.toString(),
      strandedAsset,
      strandedAmount: strandedAmount.toString(),
      custodian,
      reason: errorCode(err),
    });
  }

  private async openCustody(assetIn: AssetId): Promise<Custody> {
    const { book, vaultAddress, referenceAsset } = this.deps;
    return {
      inBefore: await book.balanceOf(assetIn, vaultAddress),
      referenceBefore: await book.balanceOf(referenceAsset, vaultAddress),
    };
  }

  private newDepositId(): string {
    return `dep-${String(this.nextDeposit++)}`;
  }
}

// =============================================================================
// Validation
// =============================================================================

function assertUser(user: string): void {
  if (!isAddress(user)) {
    throw new VaultError("INVALID_INPUT", `Invalid user address: "${user}"`);
  }
}

function assertAsset(asset: string): void {
  if (!isAssetId(asset)) {
    throw new VaultError("INVALID_INPUT", `Invalid asset id: "${asset}"`);
  }
}

function assertPositiveAmount(amount: bigint, label: string): void {
  if (amount <= 0n || amount > UINT256_MAX) {
    throw new VaultError("INVALID_INPUT", `${label} must be between 1 and 2^256-1`, {
      [label]: amount.toString(),
    });
  }
}

function assertMinimum(minAmountOut: bigint): void {
  if (minAmountOut < 0n || minAmountOut > UINT256_MAX) {
    throw new VaultError("INVALID_INPUT", "minAmountOut must be between 0 and 2^256-1", {
      minAmountOut: minAmountOut.toString(),
    });
  }
}

function assertEstimate(estimate: bigint, minAmountOut: bigint): void {
  if (estimate === 0n || estimate < minAmountOut) {
    throw new PoolError(
      "INSUFFICIENT_OUTPUT_AMOUNT",
      `Estimated output ${estimate.toString()} is below the minimum of ${minAmountOut.toString()}`,
      { estimate: estimate.toString(), minAmountOut: minAmountOut.toString() },
    );
  }
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "UNKNOWN";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
