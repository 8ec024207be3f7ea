/**
 * Global error handler.
 *
 * Maps domain errors (VaultError, LedgerError, PoolError, AssetBookError,
 * EventStoreError) to HTTP statuses and the standard error envelope.
 * Anything else is a 500 whose message is not exposed.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError } from "@capvault/ledger";
import { AssetBookError, PoolError } from "@capvault/amm";
import { EventStoreError } from "@capvault/event-store";
import { VaultError } from "@capvault/vault";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 423 | 500 | 502;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Input
  INVALID_INPUT: 400,
  INVALID_ACCOUNT: 400,
  INVALID_AMOUNT: 400,
  ZERO_AMOUNT: 400,

  // Vault
  UNAUTHORIZED: 403,
  SYSTEM_PAUSED: 423,
  RESCUE_EXCEEDS_SURPLUS: 422,
  REENTRANT_CALL: 409,
  WRAP_FAILED: 502,
  TRANSFER_FAILED: 502,

  // Ledger
  CAP_EXCEEDED: 422,
  INSUFFICIENT_BALANCE: 422,
  ARITHMETIC_OVERFLOW: 422,

  // Pools
  PAIR_NOT_FOUND: 404,
  INSUFFICIENT_LIQUIDITY: 422,
  INSUFFICIENT_INPUT_AMOUNT: 422,
  ZERO_EFFECTIVE_INPUT: 422,
  INSUFFICIENT_OUTPUT_AMOUNT: 422,

  // Asset book
  UNKNOWN_ASSET: 404,
  INSUFFICIENT_FUNDS: 422,
};

interface DomainFailure {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, string>> | undefined;
}

function classify(err: Error): DomainFailure {
  if (
    err instanceof VaultError ||
    err instanceof LedgerError ||
    err instanceof PoolError
  ) {
    return {
      status: STATUS_MAP[err.code] ?? 500,
      code: err.code,
      message: err.message,
      details: err.details,
    };
  }
  if (err instanceof AssetBookError || err instanceof EventStoreError) {
    return { status: STATUS_MAP[err.code] ?? 500, code: err.code, message: err.message };
  }
  return { status: 500, code: "INTERNAL_ERROR", message: err.message };
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }
  const failure = classify(err);

  // Internal details stay in the logs.
  const message = failure.status === 500 ? "Internal server error" : failure.message;
  const details = failure.status === 500 ? undefined : failure.details;

  return c.json(createErrorEnvelope(failure.code, message, details), failure.status);
}
