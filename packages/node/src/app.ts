/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one
 * VaultService. Kept apart from main.ts so tests build the app without
 * starting an HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { VaultService } from "./services/vault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, openAccess } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createDepositRoutes } from "./routes/deposits.js";
import { createWithdrawalRoutes } from "./routes/withdrawals.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: VaultService;
  /** Request logger. Omit to disable request logging. */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When omitted, the API runs in open mode. */
  readonly auth?: AuthConfig | undefined;
  /** Address open-mode requests act as without X-Caller-Address. */
  readonly openCaller?: string | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", openAccess(options.openCaller ?? "anonymous"));
  }
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/withdrawals", createWithdrawalRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1", createAccountRoutes());

  app.notFound((c) =>
    c.json({ error: { code: "NOT_FOUND", message: `No route for ${c.req.method} ${c.req.path}` } }, 404),
  );

  return { app, service };
}
