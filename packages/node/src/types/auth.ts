/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key in the X-Api-Key header. Each key
 * carries a role and the vault address its requests act as.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@capvault/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 *
 * `open` is used when the node runs without API keys: every caller is an
 * admin-role client acting as the address in X-Caller-Address.
 */
export interface AuthContext {
  readonly type: "api-key" | "open";
  readonly identity: string;
  readonly role: Role;
  readonly address: Address;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
