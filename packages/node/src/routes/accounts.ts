/**
 * Read-only vault state.
 *
 * GET /api/v1/accounts/:address — Reference balance of one account
 * GET /api/v1/totals            — Ledger totals, cap headroom, surplus
 */

import { Hono } from "hono";
import { isAddress } from "@capvault/types";
import type { AppEnv } from "../types/api-contract.js";
import { vaultStatusDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts/:address", requirePermission("read"), (c) => {
    const address = c.req.param("address");
    if (!isAddress(address)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid address: "${address}"`),
        400,
      );
    }

    const balance = c.get("service").balanceOf(address);
    return c.json({ data: { address, balance: balance.toString() } });
  });

  routes.get("/totals", requirePermission("read"), async (c) => {
    const status = await c.get("service").status();
    return c.json({ data: vaultStatusDto(status) });
  });

  return routes;
}
