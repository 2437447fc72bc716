/**
 * @pegvault/event-store — Event construction.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@pegvault/types";

export interface EventOptions {
  readonly actor: string;
  readonly source: EventSource;
  readonly correlationId?: string;
  readonly causationId?: string;
  readonly timestamp?: Date;
}

/**
 * Build a DomainEvent with a fresh id. Optional metadata is omitted rather
 * than set to undefined so the record hashes the same after a JSON round trip.
 */
export function createEvent(
  type: string,
  payload: Readonly<Record<string, unknown>>,
  options: EventOptions,
): DomainEvent {
  const eventId = randomUUID();
  return {
    type,
    metadata: {
      eventId,
      timestamp: (options.timestamp ?? new Date()).toISOString(),
      actor: options.actor,
      correlationId: options.correlationId ?? eventId,
      source: options.source,
      ...(options.causationId !== undefined ? { causationId: options.causationId } : {}),
    },
    payload,
  };
}
