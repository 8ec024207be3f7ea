/**
 * Asset Transfer Interfaces
 *
 * The boundary between the vault and whatever holds custody of assets
 * (a token contract, a bank core, an in-process simulation).
 *
 * Implementations may:
 * - deduct a fee during transfer (fee-on-transfer assets)
 * - return nothing meaningful from a transfer
 * - call back into the vault while a transfer is in flight
 *
 * Callers therefore measure success as a balance delta, never as a
 * return code.
 */

import type { Address, AssetId } from "./primitives.js";

/**
 * Asset custody and movement.
 *
 * All methods are async: a transfer is an external interaction and the
 * caller must not assume it completes without yielding.
 */
export interface AssetBook {
  /** Current balance of `holder` in `asset`, in base units. */
  balanceOf(asset: AssetId, holder: Address): Promise<bigint>;

  /**
   * Move `amount` of `asset` from `from` to `to` on behalf of a spender
   * that `from` has authorized. The recipient may receive less than
   * `amount`.
   */
  transferFrom(
    asset: AssetId,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void>;

  /**
   * Move `amount` of `asset` out of `from`'s own custody to `to`.
   * The recipient may receive less than `amount`.
   */
  transfer(
    asset: AssetId,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void>;
}

/**
 * Converts an inbound native-currency payment into a transferable asset.
 */
export interface NativeWrapper {
  /** The asset minted by wrapping. */
  readonly wrappedAsset: AssetId;

  /**
   * Take `amount` of native currency from `payer` and deliver the wrapped
   * equivalent to `recipient`. Returns the wrapped amount delivered.
   */
  wrap(payer: Address, amount: bigint, recipient: Address): Promise<bigint>;
}
