/**
 * Swap Calculator — constant-product math with a 0.3% input fee.
 *
 *   amountOut = floor(amountIn * 997 * reserveOut
 *                     / (reserveIn * 1000 + amountIn * 997))
 *
 * Pure and deterministic. Every intermediate is checked against uint256,
 * so an oversized input throws ARITHMETIC_OVERFLOW instead of wrapping.
 */

import { checkedAdd, checkedDiv, checkedMul, checkedSub } from "@capvault/ledger";
import { PoolError } from "./errors.js";

export const FEE_NUMERATOR = 997n;
export const FEE_DENOMINATOR = 1000n;

function assertReserves(reserveIn: bigint, reserveOut: bigint): void {
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new PoolError(
      "INSUFFICIENT_LIQUIDITY",
      `Pool has no liquidity (reserveIn=${reserveIn.toString()}, reserveOut=${reserveOut.toString()})`,
    );
  }
}

/**
 * Output received for `amountIn`, given the reserves before the swap.
 */
export function expectedOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountIn === 0n) {
    throw new PoolError("INSUFFICIENT_INPUT_AMOUNT", "Swap input must be greater than zero");
  }
  assertReserves(reserveIn, reserveOut);

  const amountInWithFee = checkedMul(amountIn, FEE_NUMERATOR);
  const numerator = checkedMul(amountInWithFee, reserveOut);
  const denominator = checkedAdd(checkedMul(reserveIn, FEE_DENOMINATOR), amountInWithFee);
  return checkedDiv(numerator, denominator);
}

/**
 * Smallest input that yields at least `amountOut`. Rounds up.
 */
export function requiredIn(amountOut: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountOut === 0n) {
    throw new PoolError("INSUFFICIENT_OUTPUT_AMOUNT", "Requested output must be greater than zero");
  }
  assertReserves(reserveIn, reserveOut);
  if (amountOut >= reserveOut) {
    throw new PoolError(
      "INSUFFICIENT_LIQUIDITY",
      `Requested output ${amountOut.toString()} drains the reserve of ${reserveOut.toString()}`,
    );
  }

  const numerator = checkedMul(checkedMul(reserveIn, amountOut), FEE_DENOMINATOR);
  const denominator = checkedMul(checkedSub(reserveOut, amountOut), FEE_NUMERATOR);
  return checkedAdd(checkedDiv(numerator, denominator), 1n);
}

export interface SwapQuote {
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  /** Output at the pre-trade spot price, before fee and slippage. */
  readonly spotOut: bigint;
  /** Shortfall of `amountOut` against `spotOut`, in basis points. */
  readonly priceImpactBps: number;
}

export function quoteSwap(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): SwapQuote {
  const amountOut = expectedOut(amountIn, reserveIn, reserveOut);
  const spotOut = checkedDiv(checkedMul(amountIn, reserveOut), reserveIn);
  const priceImpactBps =
    spotOut === 0n ? 0 : Number(((spotOut - amountOut) * 10_000n) / spotOut);
  return { amountIn, amountOut, spotOut, priceImpactBps };
}
