/**
 * Runtime Type Guards
 *
 * Narrowing functions for values read back from disk or received over HTTP.
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { AssetSpec } from "./asset.js";

const EVENT_SOURCES = new Set<string>(["vault", "reserve", "keeper", "admin"]);

const INTEGER_STRING = /^-?\d+$/;

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    (v.causationId === undefined || typeof v.causationId === "string") &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

export function isAssetSpec(value: unknown): value is AssetSpec {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

/**
 * True for a base-10 integer string such as "1000000" or "-5".
 */
export function isIntegerString(value: unknown): value is string {
  return typeof value === "string" && INTEGER_STRING.test(value);
}
