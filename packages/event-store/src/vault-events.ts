/**
 * @capvault/event-store — Vault Domain Event Definitions.
 *
 * Naming convention: `vault.<entity>.<action>`
 *
 * Amounts travel as base-unit decimal strings so that payloads survive
 * canonical JSON hashing.
 */

import { z } from "zod";
import { isAddress, isAssetId, isBaseUnitString } from "@capvault/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

export const VAULT_EVENTS = {
  DEPOSIT_COMPLETED: "vault.deposit.completed",
  DEPOSIT_STRANDED: "vault.deposit.stranded",
  WITHDRAWAL_COMPLETED: "vault.withdrawal.completed",
  CAP_UPDATED: "vault.cap.updated",
  RESCUE_COMPLETED: "vault.rescue.completed",
  PAUSED: "vault.paused",
  UNPAUSED: "vault.unpaused",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// =============================================================================
// Payload Schemas
// =============================================================================

const amount = z.string().refine(isBaseUnitString, "must be a base-unit decimal string");
const address = z.string().refine(isAddress, "must be a valid address");
const asset = z.string().refine(isAssetId, "must be a valid asset id");

export const DepositCompletedPayload = z.object({
  depositId: z.string().min(1),
  user: address,
  assetIn: asset,
  amountIn: amount,
  /** Input the vault actually received after any transfer fee */
  amountReceived: amount,
  referenceCredited: amount,
  path: z.enum(["direct-credit", "swap-then-credit"]),
});
export type DepositCompletedPayload = z.infer<typeof DepositCompletedPayload>;

export const DepositStrandedPayload = z.object({
  depositId: z.string().min(1),
  user: address,
  assetIn: asset,
  amountIn: amount,
  /** Asset left without a matching credit */
  strandedAsset: asset,
  strandedAmount: amount,
  /** Who holds the stranded amount: the vault, or the pool it was sent to */
  custodian: address,
  reason: z.string().min(1),
});
export type DepositStrandedPayload = z.infer<typeof DepositStrandedPayload>;

export const WithdrawalCompletedPayload = z.object({
  withdrawalId: z.string().min(1),
  user: address,
  amount,
  balanceAfter: amount,
});
export type WithdrawalCompletedPayload = z.infer<typeof WithdrawalCompletedPayload>;

export const CapUpdatedPayload = z.object({
  previous: amount,
  current: amount,
  updatedBy: address,
});
export type CapUpdatedPayload = z.infer<typeof CapUpdatedPayload>;

export const RescueCompletedPayload = z.object({
  asset,
  to: address,
  amount,
  rescuedBy: address,
});
export type RescueCompletedPayload = z.infer<typeof RescueCompletedPayload>;

export const PauseChangedPayload = z.object({
  by: address,
});
export type PauseChangedPayload = z.infer<typeof PauseChangedPayload>;

// =============================================================================
// Catalog
// =============================================================================

const VAULT_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.DEPOSIT_COMPLETED,
    version: 1,
    description: "A deposit was credited to a user's reference balance",
    source: "vault",
    payload: DepositCompletedPayload,
  },
  {
    type: VAULT_EVENTS.DEPOSIT_STRANDED,
    version: 1,
    description: "A deposit failed after its input reached vault custody",
    source: "vault",
    payload: DepositStrandedPayload,
  },
  {
    type: VAULT_EVENTS.WITHDRAWAL_COMPLETED,
    version: 1,
    description: "Reference balance was withdrawn to its owner",
    source: "vault",
    payload: WithdrawalCompletedPayload,
  },
  {
    type: VAULT_EVENTS.CAP_UPDATED,
    version: 1,
    description: "The bank cap was replaced",
    source: "admin",
    payload: CapUpdatedPayload,
  },
  {
    type: VAULT_EVENTS.RESCUE_COMPLETED,
    version: 1,
    description: "Unaccounted assets were moved out of vault custody",
    source: "admin",
    payload: RescueCompletedPayload,
  },
  {
    type: VAULT_EVENTS.PAUSED,
    version: 1,
    description: "Deposits and withdrawals were paused",
    source: "admin",
    payload: PauseChangedPayload,
  },
  {
    type: VAULT_EVENTS.UNPAUSED,
    version: 1,
    description: "Deposits and withdrawals were resumed",
    source: "admin",
    payload: PauseChangedPayload,
  },
];

/**
 * An EventCatalog with every vault event registered at version 1.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of VAULT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
