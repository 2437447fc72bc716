/**
 * Capabilities
 *
 * Mutating entry points take an explicit CallContext instead of looking the
 * caller up in a role registry. Whoever wires the system decides which
 * contexts exist; the core only checks what it is handed.
 *
 * - administrator: parameters, pause flags, emergency withdraw, breaker reset
 * - keeper: the epoch tick, nothing else
 * - orchestrator: the vault's right to move capital through the strategy
 */

import { AccessError } from "./errors.js";

export type Capability = "administrator" | "keeper" | "orchestrator";

export const CAPABILITIES: readonly Capability[] = ["administrator", "keeper", "orchestrator"];

const CAPABILITY_NAMES: ReadonlySet<string> = new Set(CAPABILITIES);

export interface CallContext {
  /** Holder or service identity performing the call */
  readonly actor: string;
  readonly capabilities: ReadonlySet<Capability>;
  /** Groups audit events produced by one request or tick */
  readonly correlationId?: string;
}

export function createContext(
  actor: string,
  capabilities: readonly Capability[] = [],
  correlationId?: string,
): CallContext {
  return {
    actor,
    capabilities: new Set(capabilities),
    ...(correlationId !== undefined ? { correlationId } : {}),
  };
}

export function hasCapability(ctx: CallContext, capability: Capability): boolean {
  return ctx.capabilities.has(capability);
}

/**
 * Throws AccessError("Unauthorized") unless the context carries `capability`.
 */
export function requireCapability(
  ctx: CallContext,
  capability: Capability,
  operation: string,
): void {
  if (!ctx.capabilities.has(capability)) {
    throw new AccessError(
      "Unauthorized",
      `${operation} requires the ${capability} capability (actor "${ctx.actor}")`,
      { actor: ctx.actor, capability, operation },
    );
  }
}

export function isCapability(value: unknown): value is Capability {
  return typeof value === "string" && CAPABILITY_NAMES.has(value);
}
