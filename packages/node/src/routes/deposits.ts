/**
 * Deposit routes. The authenticated address is the depositor.
 *
 * POST /api/v1/deposits        — Deposit a token
 * POST /api/v1/deposits/native — Wrap and deposit native currency
 * GET  /api/v1/deposits/quote  — Preview a deposit without moving funds
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  NativeDepositSchema,
  QuoteQuerySchema,
  depositQuoteDto,
  depositReceiptDto,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("write"), validateBody(DepositSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c
      .get("service")
      .depositToken(c.get("auth").address, body.assetIn, body.amountIn, body.minAmountOut);
    return c.json({ data: depositReceiptDto(receipt) }, 201);
  });

  routes.post(
    "/native",
    requirePermission("write"),
    validateBody(NativeDepositSchema),
    async (c) => {
      const body = c.get("validatedBody");
      const receipt = await c
        .get("service")
        .depositNative(c.get("auth").address, body.amount, body.minAmountOut);
      return c.json({ data: depositReceiptDto(receipt) }, 201);
    },
  );

  routes.get("/quote", requirePermission("read"), async (c) => {
    const queryResult = QuoteQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { assetIn, amountIn } = queryResult.data;
    const quote = await c.get("service").quoteDeposit(assetIn, amountIn);
    return c.json({ data: depositQuoteDto(quote) });
  });

  return routes;
}
