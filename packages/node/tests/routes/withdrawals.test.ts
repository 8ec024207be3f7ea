/**
 * Tests for withdrawal routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../../src/app.js";
import type { ErrorBody } from "../setup.js";
import { ADMIN_KEY, OPERATOR_KEY, createTestApp, withKey } from "../setup.js";

let instance: AppInstance;

beforeEach(async () => {
  instance = await createTestApp();
  const res = await instance.app.request(
    withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", { assetIn: "usdc", amountIn: "500000000" }),
  );
  expect(res.status).toBe(201);
});

describe("POST /api/v1/withdrawals", () => {
  it("pays out reference balance to the caller", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/withdrawals", "POST", { amount: "200000000" }),
    );

    expect(res.status).toBe(201);
    const body: { data: unknown } = await res.json();
    expect(body.data).toEqual({
      withdrawalId: "wd-1",
      user: "alice",
      amount: "200000000",
      balanceAfter: "300000000",
    });
    expect(await instance.service.market.book.balanceOf("usdc", "alice")).toBe(700_000_000n);
  });

  it("returns 422 above the balance", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/withdrawals", "POST", { amount: "500000001" }),
    );

    expect(res.status).toBe(422);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("INSUFFICIENT_BALANCE");
  });

  it("returns 400 ZERO_AMOUNT for zero", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/withdrawals", "POST", { amount: "0" }),
    );

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("ZERO_AMOUNT");
  });

  it("returns 423 while the vault is paused", async () => {
    await instance.app.request(withKey(ADMIN_KEY, "/api/v1/admin/pause", "POST"));

    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/withdrawals", "POST", { amount: "1" }),
    );

    expect(res.status).toBe(423);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("SYSTEM_PAUSED");
  });
});
