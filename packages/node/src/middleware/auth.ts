/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header, looked up in the configured key registry.
 * On success, sets `c.set("auth", authContext)`; otherwise responds 401.
 *
 * `openAccess` stands in when the node runs without keys: it trusts the
 * X-Caller-Address header and grants the admin role.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress } from "@capvault/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, Permission, ApiKeyRecord } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Address";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
    }

    const auth: AuthContext = {
      type: "api-key",
      identity: record.key,
      role: record.role,
      address: record.address,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode for development and tests.
 */
export function openAccess(defaultCaller: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER) ?? defaultCaller;
    if (!isAddress(caller)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid ${CALLER_HEADER}: "${caller}"`),
        400,
      );
    }
    c.set("auth", { type: "open", identity: caller, role: "admin", address: caller });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER authMiddleware or openAccess. Returns 403 if the
 * authenticated role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
