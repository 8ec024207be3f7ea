/**
 * Administrative routes. Need the `admin` permission on the key and the
 * admin role on the key's vault address.
 *
 * PUT  /api/v1/admin/cap     — Replace the bank cap
 * POST /api/v1/admin/pause   — Stop deposits and withdrawals
 * POST /api/v1/admin/unpause — Resume them
 * POST /api/v1/admin/rescue  — Move unaccounted assets out of custody
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RescueSchema, SetCapSchema, rescueReceiptDto } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.put("/cap", validateBody(SetCapSchema), (c) => {
    const { cap } = c.get("validatedBody");
    const change = c.get("service").setBankCap(c.get("auth").address, cap);
    return c.json({
      data: { previous: change.previous.toString(), current: change.current.toString() },
    });
  });

  routes.post("/pause", (c) => {
    const service = c.get("service");
    service.pause(c.get("auth").address);
    return c.json({ data: { paused: service.vault.isPaused() } });
  });

  routes.post("/unpause", (c) => {
    const service = c.get("service");
    service.unpause(c.get("auth").address);
    return c.json({ data: { paused: service.vault.isPaused() } });
  });

  routes.post("/rescue", validateBody(RescueSchema), async (c) => {
    const body = c.get("validatedBody");
    const receipt = await c
      .get("service")
      .rescue(c.get("auth").address, body.asset, body.to, body.amount);
    return c.json({ data: rescueReceiptDto(receipt) });
  });

  return routes;
}
