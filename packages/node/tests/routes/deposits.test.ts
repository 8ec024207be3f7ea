/**
 * Tests for deposit routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../../src/app.js";
import type { ErrorBody } from "../setup.js";
import { OPERATOR_KEY, VIEWER_KEY, createTestApp, withKey } from "../setup.js";

let instance: AppInstance;

beforeEach(async () => {
  instance = await createTestApp();
});

interface ReceiptBody {
  readonly data: Record<string, string>;
}

describe("POST /api/v1/deposits", () => {
  it("credits a reference-asset deposit to the caller", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", {
        assetIn: "usdc",
        amountIn: "500000000",
      }),
    );

    expect(res.status).toBe(201);
    const body: ReceiptBody = await res.json();
    expect(body.data).toEqual({
      depositId: "dep-1",
      user: "alice",
      assetIn: "usdc",
      amountIn: "500000000",
      amountReceived: "500000000",
      referenceCredited: "500000000",
      capUnits: "50000000000",
      balanceAfter: "500000000",
      path: "direct-credit",
    });
    expect(instance.service.balanceOf("alice")).toBe(500_000_000n);
  });

  it("swaps a token deposit through its pool", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", {
        assetIn: "tkn",
        amountIn: "1000",
        minAmountOut: "1955",
      }),
    );

    expect(res.status).toBe(201);
    const body: ReceiptBody = await res.json();
    expect(body.data["referenceCredited"]).toBe("1955");
    expect(body.data["capUnits"]).toBe("195500");
    expect(body.data["path"]).toBe("swap-then-credit");
  });

  it("returns 422 when the estimate misses the minimum", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", {
        assetIn: "tkn",
        amountIn: "1000",
        minAmountOut: "1956",
      }),
    );

    expect(res.status).toBe(422);
    const body: ErrorBody = await res.json();
    expect(body.error).toEqual({
      code: "INSUFFICIENT_OUTPUT_AMOUNT",
      message: "Estimated output 1955 is below the minimum of 1956",
      details: { estimate: "1955", minAmountOut: "1956" },
    });
  });

  it("returns 404 for an asset no pool trades", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", { assetIn: "orphan", amountIn: "1" }),
    );

    expect(res.status).toBe(404);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("PAIR_NOT_FOUND");
  });

  it("returns 422 when the caller lacks the funds", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", {
        assetIn: "usdc",
        amountIn: "2000000000",
      }),
    );

    expect(res.status).toBe(422);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("INSUFFICIENT_FUNDS");
    expect(instance.service.balanceOf("alice")).toBe(0n);
  });

  it("returns 422 CAP_EXCEEDED above the bank cap", async () => {
    instance = await createTestApp({ bankCap: 10_000_000_000n });

    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", {
        assetIn: "usdc",
        amountIn: "500000000",
      }),
    );

    expect(res.status).toBe(422);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("CAP_EXCEEDED");
    expect(body.error.details).toEqual({ newTotal: "50000000000", cap: "10000000000" });
  });

  it("returns 400 INVALID_INPUT for a zero amount", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", { assetIn: "usdc", amountIn: "0" }),
    );

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("INVALID_INPUT");
  });

  it.each([["-5"], ["1.5"], ["abc"], [""]])("returns 400 for amountIn %j", async (amountIn) => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits", "POST", { assetIn: "usdc", amountIn }),
    );

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await instance.app.request(
      new Request("http://localhost/api/v1/deposits", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Api-Key": OPERATOR_KEY },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.message).toBe("Invalid JSON in request body");
  });

  it("returns 403 for a read-only key", async () => {
    const res = await instance.app.request(
      withKey(VIEWER_KEY, "/api/v1/deposits", "POST", { assetIn: "usdc", amountIn: "1" }),
    );

    expect(res.status).toBe(403);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("FORBIDDEN");
  });
});

describe("POST /api/v1/deposits/native", () => {
  it("wraps and deposits native currency", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits/native", "POST", {
        amount: "1000",
        minAmountOut: "1955",
      }),
    );

    expect(res.status).toBe(201);
    const body: ReceiptBody = await res.json();
    expect(body.data["assetIn"]).toBe("weth");
    expect(body.data["referenceCredited"]).toBe("1955");
  });

  it("returns 502 WRAP_FAILED when the wrap fails", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/deposits/native", "POST", { amount: "5000" }),
    );

    expect(res.status).toBe(502);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("WRAP_FAILED");
  });
});

describe("GET /api/v1/deposits/quote", () => {
  it("quotes a swapped deposit", async () => {
    const res = await instance.app.request(
      withKey(VIEWER_KEY, "/api/v1/deposits/quote?assetIn=tkn&amountIn=1000"),
    );

    expect(res.status).toBe(200);
    const body: { data: unknown } = await res.json();
    expect(body.data).toEqual({
      assetIn: "tkn",
      amountIn: "1000",
      path: "swap-then-credit",
      referenceOut: "1955",
      priceImpactBps: 225,
      capUnits: "195500",
      capHeadroom: "1000000000000",
      fitsUnderCap: true,
    });
  });

  it("returns 400 without an amount", async () => {
    const res = await instance.app.request(withKey(VIEWER_KEY, "/api/v1/deposits/quote?assetIn=tkn"));

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});
