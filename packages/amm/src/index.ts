/**
 * @capvault/amm — Constant-product swaps against external pools.
 *
 * - Swap math (`expectedOut`, `requiredIn`, `quoteSwap`) with a 0.3% fee
 * - `PoolAdapter`, which measures what pools and assets actually move
 * - An in-process market (`./market`) for tests, the node and the demo
 */

// Swap math
export {
  expectedOut,
  requiredIn,
  quoteSwap,
  FEE_NUMERATOR,
  FEE_DENOMINATOR,
} from "./swap-calculator.js";
export type { SwapQuote } from "./swap-calculator.js";

// Pool adapter
export { PoolAdapter } from "./pool-adapter.js";
export type {
  PoolReserves,
  SwapParams,
  SwapResult,
  PoolAdapterOptions,
} from "./pool-adapter.js";

// Errors
export { PoolError } from "./errors.js";
export type { PoolErrorCode } from "./errors.js";

// In-process market
export * from "./market/index.js";
