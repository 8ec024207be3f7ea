/**
 * Tests for the domain error → HTTP mapping.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError } from "@capvault/ledger";
import { AssetBookError, PoolError } from "@capvault/amm";
import { VaultError } from "@capvault/vault";
import { handleError } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ErrorBody } from "../setup.js";

function appThrowing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it.each([
    [new VaultError("SYSTEM_PAUSED", "paused"), 423],
    [new VaultError("UNAUTHORIZED", "no"), 403],
    [new VaultError("TRANSFER_FAILED", "failed"), 502],
    [new LedgerError("CAP_EXCEEDED", "over"), 422],
    [new LedgerError("ZERO_AMOUNT", "zero"), 400],
    [new PoolError("PAIR_NOT_FOUND", "none"), 404],
    [new AssetBookError("INSUFFICIENT_FUNDS", "poor"), 422],
    [new VaultError("REENTRANT_CALL", "nested"), 409],
  ])("maps %s to %i", async (err, status) => {
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(status);
    const body: ErrorBody = await res.json();
    expect(body.error.code).toBe(err.code);
    expect(body.error.message).toBe(err.message);
  });

  it("passes domain details through", async () => {
    const res = await appThrowing(
      new LedgerError("INSUFFICIENT_BALANCE", "short", { balance: "1", requested: "2" }),
    ).request("/boom");

    const body: ErrorBody = await res.json();
    expect(body.error.details).toEqual({ balance: "1", requested: "2" });
  });

  it("hides the message of an unexpected error", async () => {
    const res = await appThrowing(new Error("db password leaked")).request("/boom");

    expect(res.status).toBe(500);
    const body: ErrorBody = await res.json();
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });

  it("lets an HTTPException build its own response", async () => {
    const res = await appThrowing(new HTTPException(418, { message: "teapot" })).request("/boom");

    expect(res.status).toBe(418);
    expect(await res.text()).toBe("teapot");
  });
});
