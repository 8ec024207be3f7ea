/**
 * Shared vault fixtures: a seeded in-memory market and a vault on top.
 */

import { expect } from "vitest";
import {
  InMemoryAssetBook,
  InMemoryNativeWrapper,
  InMemoryPoolFactory,
} from "@capvault/amm";
import type { ConstantProductPool } from "@capvault/amm";
import { Vault } from "../src/vault.js";

export const VAULT = "vault";
export const ADMIN = "admin";
export const USDC = "usdc";
export const TKN = "tkn";
/** Skims 5% of every transfer. */
export const FOT = "fot";
export const ETH = "eth";
export const WETH = "weth";
/** Registered, but no pool trades it. */
export const ORPHAN = "orphan";

export const TS = "2024-01-15T10:00:00.000Z";

/** Whole reference units (6 decimals) to base units. */
export function usdc(whole: number): bigint {
  return BigInt(whole) * 1_000_000n;
}

/** Whole reference units expressed in 8-decimal cap units. */
export function capUnits(whole: number): bigint {
  return BigInt(whole) * 10n ** 8n;
}

export interface Harness {
  readonly vault: Vault;
  readonly book: InMemoryAssetBook;
  readonly factory: InMemoryPoolFactory;
  readonly tknPool: ConstantProductPool;
  readonly fotPool: ConstantProductPool;
  readonly wethPool: ConstantProductPool;
}

export interface HarnessOptions {
  /** Default: one million reference units. */
  readonly bankCap?: bigint;
  /** Default: true. */
  readonly native?: boolean;
}

/**
 * Every pool is seeded at 50,000 of the input side against 100,000 base
 * units of USDC, so 1,000 in quotes 1,955 out.
 */
export async function createHarness(options?: HarnessOptions): Promise<Harness> {
  const book = new InMemoryAssetBook();
  book.registerAsset({ id: USDC, symbol: "USDC", decimals: 6 });
  book.registerAsset({ id: TKN, symbol: "TKN", decimals: 18 });
  book.registerAsset({ id: FOT, symbol: "FOT", decimals: 18, transferFeeBps: 500 });
  book.registerAsset({ id: ETH, symbol: "ETH", decimals: 18 });
  book.registerAsset({ id: WETH, symbol: "WETH", decimals: 18 });
  book.registerAsset({ id: ORPHAN, symbol: "ORF", decimals: 18 });

  const factory = new InMemoryPoolFactory(book);
  const tknPool = factory.createPool(TKN, USDC);
  const fotPool = factory.createPool(FOT, USDC);
  const wethPool = factory.createPool(WETH, USDC);

  await seed(book, tknPool, TKN, 50_000n, 100_000n);
  await seed(book, fotPool, FOT, 50_000n, 100_000n);
  await seed(book, wethPool, WETH, 50_000n, 100_000n);

  const wrapper =
    options?.native === false
      ? undefined
      : new InMemoryNativeWrapper({ book, nativeAsset: ETH, wrappedAsset: WETH });

  const vault = new Vault(
    {
      vaultAddress: VAULT,
      referenceAsset: USDC,
      bankCap: options?.bankCap ?? capUnits(1_000_000),
      admins: [ADMIN],
    },
    { book, factory, wrapper, now: () => new Date(TS) },
  );

  return { vault, book, factory, tknPool, fotPool, wethPool };
}

async function seed(
  book: InMemoryAssetBook,
  pool: ConstantProductPool,
  asset: string,
  assetReserve: bigint,
  usdcReserve: bigint,
): Promise<void> {
  book.mint(asset, pool.address, assetReserve);
  book.mint(USDC, pool.address, usdcReserve);
  await pool.sync();
}

/** Await `promise` and assert it rejects with the given error class and code. */
export async function expectCode(
  promise: Promise<unknown>,
  errorClass: new (...args: never[]) => Error,
  code: string,
): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(errorClass);
  await expect(promise).rejects.toMatchObject({ code });
}

export function eventTypes(vault: Vault): string[] {
  return vault.events.readAll().map((e) => e.event.type);
}
