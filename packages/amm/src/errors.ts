/**
 * @capvault/amm — Error types.
 */

/** Error codes raised by pools, the pool adapter and the swap math. */
export type PoolErrorCode =
  | "PAIR_NOT_FOUND"
  | "INVALID_POOL"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_INPUT_AMOUNT"
  | "ZERO_EFFECTIVE_INPUT"
  | "INSUFFICIENT_OUTPUT_AMOUNT"
  | "K_INVARIANT"
  | "LOCKED";

export class PoolError extends Error {
  public readonly code: PoolErrorCode;
  public readonly details: Readonly<Record<string, string>> | undefined;

  constructor(
    code: PoolErrorCode,
    message: string,
    details?: Readonly<Record<string, string>>,
  ) {
    super(message);
    this.name = "PoolError";
    this.code = code;
    this.details = details;
  }
}
