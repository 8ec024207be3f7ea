/**
 * POST /api/v1/withdrawals — Withdraw reference balance to the
 * authenticated address.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { WithdrawSchema, withdrawalReceiptDto } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createWithdrawalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("write"), validateBody(WithdrawSchema), async (c) => {
    const { amount } = c.get("validatedBody");
    const receipt = await c.get("service").withdraw(c.get("auth").address, amount);
    return c.json({ data: withdrawalReceiptDto(receipt) }, 201);
  });

  return routes;
}
