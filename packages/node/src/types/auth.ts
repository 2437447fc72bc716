/**
 * Authentication and authorization types.
 *
 * API keys carry a role. Each role maps to the capabilities the domain
 * packages check and to the HTTP permissions the routes check.
 *
 * - administrator: parameters, pause flags, breaker reset, emergency withdraw
 * - keeper: the epoch tick only
 * - depositor: deposits and redemptions as its own actor
 * - viewer: reads
 */

import { createContext, type CallContext, type Capability } from "@pegvault/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "administrator" | "keeper" | "depositor" | "viewer";

export type Permission = "read" | "write" | "tick" | "admin";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  depositor: ["read", "write"],
  keeper: ["read", "tick"],
  administrator: ["read", "admin"],
};

export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  viewer: [],
  depositor: [],
  keeper: ["keeper"],
  administrator: ["administrator"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "anonymous";
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly actor: string;
}

/**
 * The domain-level context for a request. The request ID doubles as the
 * correlation ID of every audit event the request produces.
 */
export function toCallContext(auth: AuthContext, requestId: string): CallContext {
  return createContext(auth.identity, ROLE_CAPABILITIES[auth.role], requestId);
}
