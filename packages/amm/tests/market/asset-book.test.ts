/**
 * Tests for InMemoryAssetBook.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  AssetBookError,
  DEFAULT_FEE_COLLECTOR,
  InMemoryAssetBook,
} from "../../src/market/asset-book.js";
import type { TransferRecord } from "../../src/market/asset-book.js";

describe("InMemoryAssetBook", () => {
  let book: InMemoryAssetBook;

  beforeEach(() => {
    book = new InMemoryAssetBook();
    book.registerAsset({ id: "usdc", symbol: "USDC", decimals: 6 });
    book.registerAsset({ id: "fot", symbol: "FOT", decimals: 18, transferFeeBps: 500 });
    book.mint("usdc", "alice", 1000n);
    book.mint("fot", "alice", 1000n);
  });

  // ─── Registration ─────────────────────────────────────────────────────

  it("lists registered assets", () => {
    expect(book.listAssets().map((a) => a.id)).toEqual(["usdc", "fot"]);
    expect(book.getAsset("fot")?.transferFeeBps).toBe(500);
    expect(book.getAsset("nope")).toBeUndefined();
  });

  it("rejects a duplicate asset", () => {
    expect(() => book.registerAsset({ id: "usdc", symbol: "USDC", decimals: 6 })).toThrow(
      expect.objectContaining({ code: "DUPLICATE_ASSET" }),
    );
  });

  it("rejects an out-of-range transfer fee", () => {
    expect(() =>
      book.registerAsset({ id: "bad", symbol: "BAD", decimals: 6, transferFeeBps: 10_001 }),
    ).toThrow(expect.objectContaining({ code: "INVALID_FEE" }));
    expect(() =>
      book.registerAsset({ id: "bad", symbol: "BAD", decimals: 6, transferFeeBps: 1.5 }),
    ).toThrow(AssetBookError);
  });

  it("rejects an unknown asset", async () => {
    await expect(book.balanceOf("nope", "alice")).rejects.toMatchObject({ code: "UNKNOWN_ASSET" });
  });

  // ─── Supply ───────────────────────────────────────────────────────────

  it("mints and burns", async () => {
    book.burn("usdc", "alice", 400n);
    expect(await book.balanceOf("usdc", "alice")).toBe(600n);
    expect(() => book.burn("usdc", "alice", 601n)).toThrow(
      expect.objectContaining({ code: "INSUFFICIENT_FUNDS" }),
    );
  });

  // ─── Transfers ────────────────────────────────────────────────────────

  it("moves the full amount of a plain asset", async () => {
    await book.transfer("usdc", "alice", "bob", 300n);
    expect(await book.balanceOf("usdc", "alice")).toBe(700n);
    expect(await book.balanceOf("usdc", "bob")).toBe(300n);
  });

  it("skims the transfer fee to the collector", async () => {
    await book.transferFrom("fot", "alice", "bob", 1000n);
    expect(await book.balanceOf("fot", "alice")).toBe(0n);
    expect(await book.balanceOf("fot", "bob")).toBe(950n);
    expect(await book.balanceOf("fot", DEFAULT_FEE_COLLECTOR)).toBe(50n);
  });

  it("rejects an overdraft without moving anything", async () => {
    await expect(book.transfer("usdc", "alice", "bob", 1001n)).rejects.toMatchObject({
      code: "INSUFFICIENT_FUNDS",
    });
    expect(await book.balanceOf("usdc", "alice")).toBe(1000n);
    expect(await book.balanceOf("usdc", "bob")).toBe(0n);
  });

  it("rejects a negative amount", async () => {
    await expect(book.transfer("usdc", "alice", "bob", -1n)).rejects.toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  // ─── Hooks ────────────────────────────────────────────────────────────

  it("calls the recipient's hook after balances move", async () => {
    const seen: bigint[] = [];
    const hook = vi.fn(async (transfer: TransferRecord) => {
      seen.push(await book.balanceOf(transfer.asset, transfer.to));
    });
    book.onReceive("bob", hook);

    await book.transfer("fot", "alice", "bob", 200n);

    expect(hook).toHaveBeenCalledWith({
      asset: "fot",
      from: "alice",
      to: "bob",
      requested: 200n,
      received: 190n,
      fee: 10n,
    });
    expect(seen).toEqual([190n]);
  });

  it("reverts the transfer when the hook throws", async () => {
    book.onReceive("bob", () => {
      throw new Error("rejected by recipient");
    });

    await expect(book.transfer("fot", "alice", "bob", 200n)).rejects.toThrow(
      "rejected by recipient",
    );
    expect(await book.balanceOf("fot", "alice")).toBe(1000n);
    expect(await book.balanceOf("fot", "bob")).toBe(0n);
    expect(await book.balanceOf("fot", DEFAULT_FEE_COLLECTOR)).toBe(0n);
  });

  it("keeps a transfer whose hook moved the funds on before throwing", async () => {
    const rejection = new Error("rejected by recipient");
    book.onReceive("bob", async (transfer) => {
      await book.transfer(transfer.asset, "bob", "carol", transfer.received);
      throw rejection;
    });

    const err = await book.transfer("usdc", "alice", "bob", 200n).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AssetBookError);
    expect(err).toMatchObject({ code: "ROLLBACK_FAILED" });
    expect(err instanceof AssetBookError ? err.cause : undefined).toBe(rejection);
    expect(await book.balanceOf("usdc", "alice")).toBe(800n);
    expect(await book.balanceOf("usdc", "bob")).toBe(0n);
    expect(await book.balanceOf("usdc", "carol")).toBe(200n);
  });

  it("keeps a fee-on-transfer whose hook spent part of the funds", async () => {
    book.onReceive("bob", async () => {
      await book.transfer("fot", "bob", "carol", 100n);
      throw new Error("rejected by recipient");
    });

    await expect(book.transfer("fot", "alice", "bob", 200n)).rejects.toMatchObject({
      code: "ROLLBACK_FAILED",
    });
    expect(await book.balanceOf("fot", "alice")).toBe(800n);
    expect(await book.balanceOf("fot", "bob")).toBe(90n);
    expect(await book.balanceOf("fot", "carol")).toBe(95n);
    expect(await book.balanceOf("fot", DEFAULT_FEE_COLLECTOR)).toBe(15n);
  });

  it("stops calling a removed hook", async () => {
    const hook = vi.fn();
    const remove = book.onReceive("bob", hook);
    remove();

    await book.transfer("usdc", "alice", "bob", 1n);
    expect(hook).not.toHaveBeenCalled();
  });
});
