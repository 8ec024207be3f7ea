/**
 * Request/Response DTOs.
 *
 * Request bodies are validated with Zod. Amounts cross the wire as
 * base-unit decimal strings and become bigint after validation; responses
 * turn them back into strings.
 */

import { z } from "zod";
import { isAddress, isAssetId, isBaseUnitString } from "@capvault/types";
import type { LedgerTotals } from "@capvault/ledger";
import type {
  DepositQuote,
  DepositReceipt,
  RescueReceipt,
  WithdrawalReceipt,
} from "@capvault/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const BaseUnitsSchema = z
  .string()
  .refine(isBaseUnitString, "must be a base-unit integer string")
  .transform((v) => BigInt(v));

export const AddressSchema = z.string().refine(isAddress, "must be a valid address");

export const AssetIdSchema = z.string().refine(isAssetId, "must be a valid asset id");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Deposit & Withdrawal DTOs
// =============================================================================

export const DepositSchema = z.object({
  assetIn: AssetIdSchema,
  amountIn: BaseUnitsSchema,
  minAmountOut: BaseUnitsSchema.default("0"),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const NativeDepositSchema = z.object({
  amount: BaseUnitsSchema,
  minAmountOut: BaseUnitsSchema.default("0"),
});

export type NativeDepositDto = z.infer<typeof NativeDepositSchema>;

export const QuoteQuerySchema = z.object({
  assetIn: AssetIdSchema,
  amountIn: BaseUnitsSchema,
});

export type QuoteQuery = z.infer<typeof QuoteQuerySchema>;

export const WithdrawSchema = z.object({
  amount: BaseUnitsSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const SetCapSchema = z.object({
  /** New bank cap in cap units */
  cap: BaseUnitsSchema,
});

export type SetCapDto = z.infer<typeof SetCapSchema>;

export const RescueSchema = z.object({
  asset: AssetIdSchema,
  to: AddressSchema,
  amount: BaseUnitsSchema,
});

export type RescueDto = z.infer<typeof RescueSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export function depositReceiptDto(r: DepositReceipt) {
  return {
    depositId: r.depositId,
    user: r.user,
    assetIn: r.assetIn,
    amountIn: r.amountIn.toString(),
    amountReceived: r.amountReceived.toString(),
    referenceCredited: r.referenceCredited.toString(),
    capUnits: r.capUnits.toString(),
    balanceAfter: r.balanceAfter.toString(),
    path: r.path,
  };
}

export function depositQuoteDto(q: DepositQuote) {
  return {
    assetIn: q.assetIn,
    amountIn: q.amountIn.toString(),
    path: q.path,
    referenceOut: q.referenceOut.toString(),
    priceImpactBps: q.priceImpactBps,
    capUnits: q.capUnits.toString(),
    capHeadroom: q.capHeadroom.toString(),
    fitsUnderCap: q.fitsUnderCap,
  };
}

export function withdrawalReceiptDto(r: WithdrawalReceipt) {
  return {
    withdrawalId: r.withdrawalId,
    user: r.user,
    amount: r.amount.toString(),
    balanceAfter: r.balanceAfter.toString(),
  };
}

export function rescueReceiptDto(r: RescueReceipt) {
  return { asset: r.asset, to: r.to, amount: r.amount.toString() };
}

export interface VaultStatus {
  readonly totals: LedgerTotals;
  readonly capHeadroom: bigint;
  readonly surplus: bigint;
  readonly paused: boolean;
  readonly referenceAsset: string;
}

export function vaultStatusDto(s: VaultStatus) {
  return {
    referenceAsset: s.referenceAsset,
    totalDeposited: s.totals.totalDeposited.toString(),
    totalHeld: s.totals.totalHeld.toString(),
    bankCap: s.totals.bankCap.toString(),
    operationCount: s.totals.operationCount,
    capHeadroom: s.capHeadroom.toString(),
    surplus: s.surplus.toString(),
    paused: s.paused,
  };
}
