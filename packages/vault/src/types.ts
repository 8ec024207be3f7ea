/**
 * Vault Types
 *
 * Domain types for the custodial swap-and-credit vault.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units inside the vault
 * - A deposit chooses its plan once, before any funds move
 */

import type { Address, AssetId, Pool } from "@capvault/types";
import type { UnitConverter } from "@capvault/ledger";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** The vault's own custody address in the asset book */
  readonly vaultAddress: Address;

  /** Asset every balance is denominated in */
  readonly referenceAsset: AssetId;

  /** Initial bank cap, in cap units */
  readonly bankCap: bigint;

  /** Addresses holding the admin role at start-up */
  readonly admins: readonly Address[];

  /** Native-to-cap unit scaling. Default: 6 → 8 decimals. */
  readonly converter?: UnitConverter | undefined;
}

// =============================================================================
// Deposits
// =============================================================================

export interface DepositRequest {
  readonly user: Address;
  readonly assetIn: AssetId;
  /** Amount of `assetIn` to pull from the user, in its base units */
  readonly amountIn: bigint;
  /** Least reference output the user accepts from a swap. Ignored for direct credits. */
  readonly minAmountOut: bigint;
}

export interface NativeDepositRequest {
  readonly user: Address;
  readonly amount: bigint;
  readonly minAmountOut: bigint;
}

/**
 * How a deposit reaches the ledger. Chosen once per deposit.
 */
export type DepositPlan =
  | { readonly kind: "direct-credit" }
  | { readonly kind: "swap-then-credit"; readonly pool: Pool };

export type DepositPath = DepositPlan["kind"];

export interface DepositReceipt {
  readonly depositId: string;
  readonly user: Address;
  readonly assetIn: AssetId;
  readonly amountIn: bigint;
  /** Input the vault measured after any transfer fee */
  readonly amountReceived: bigint;
  readonly referenceCredited: bigint;
  readonly capUnits: bigint;
  readonly balanceAfter: bigint;
  readonly path: DepositPath;
}

export interface DepositQuote {
  readonly assetIn: AssetId;
  readonly amountIn: bigint;
  readonly path: DepositPath;
  /** Estimated reference credit, assuming no transfer fee */
  readonly referenceOut: bigint;
  readonly priceImpactBps: number;
  readonly capUnits: bigint;
  /** Reference units that can still be credited under the cap */
  readonly capHeadroom: bigint;
  readonly fitsUnderCap: boolean;
}

// =============================================================================
// Withdrawals & admin
// =============================================================================

export interface WithdrawalReceipt {
  readonly withdrawalId: string;
  readonly user: Address;
  readonly amount: bigint;
  readonly balanceAfter: bigint;
}

export interface RescueReceipt {
  readonly asset: AssetId;
  readonly to: Address;
  readonly amount: bigint;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "INVALID_INPUT"
  | "SYSTEM_PAUSED"
  | "UNAUTHORIZED"
  | "ZERO_EFFECTIVE_INPUT"
  | "WRAP_FAILED"
  | "TRANSFER_FAILED"
  | "RESCUE_EXCEEDS_SURPLUS"
  | "REENTRANT_CALL";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(
    code: VaultErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
    this.details = details;
  }
}
