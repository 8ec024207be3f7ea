/**
 * @capvault/ledger — Unit Converter.
 *
 * Rescales reference-asset base units into cap units. With a 6-decimal
 * reference asset and an 8-decimal cap the factor is 100, so the
 * conversion is exact in this direction.
 */

import { checkedDiv, checkedMul } from "./money-math.js";

export interface UnitConverter {
  readonly nativeDecimals: number;
  readonly capDecimals: number;
  readonly scale: bigint;
  toCapUnits(amountNative: bigint): bigint;
  /** Floors: cap units below one native unit are dropped. */
  fromCapUnits(amountCap: bigint): bigint;
}

export const REFERENCE_DECIMALS = 6;
export const CAP_DECIMALS = 8;

export function createUnitConverter(
  nativeDecimals: number = REFERENCE_DECIMALS,
  capDecimals: number = CAP_DECIMALS,
): UnitConverter {
  if (
    !Number.isInteger(nativeDecimals) ||
    !Number.isInteger(capDecimals) ||
    nativeDecimals < 0 ||
    capDecimals < nativeDecimals
  ) {
    throw new RangeError(
      `Cap precision (${String(capDecimals)}) must be an integer >= reference precision (${String(nativeDecimals)})`,
    );
  }

  const scale = 10n ** BigInt(capDecimals - nativeDecimals);

  return {
    nativeDecimals,
    capDecimals,
    scale,
    toCapUnits: (amountNative) => checkedMul(amountNative, scale),
    fromCapUnits: (amountCap) => checkedDiv(amountCap, scale),
  };
}

const defaultConverter = createUnitConverter();

/** Convert 6-decimal reference units to 8-decimal cap units. */
export function toCapUnits(amountNative: bigint): bigint {
  return defaultConverter.toCapUnits(amountNative);
}
