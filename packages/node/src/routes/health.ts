/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: event hash chain intact
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultService } from "../services/vault-service.js";

export function createHealthRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyEvents();
    const timestamp = new Date().toISOString();

    if (!integrity.valid) {
      return c.json(
        {
          status: "not_ready",
          eventStore: {
            status: "down",
            lastVerifiedPosition: integrity.lastVerifiedPosition,
            errors: integrity.errors.length,
          },
          timestamp,
        },
        503,
      );
    }

    return c.json({
      status: "ready",
      eventStore: { status: "ok", events: integrity.lastVerifiedPosition },
      paused: service.vault.isPaused(),
      timestamp,
    });
  });

  return routes;
}
