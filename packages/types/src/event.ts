/**
 * Event Types
 *
 * Every committed state change in the treasury is described by a DomainEvent
 * appended to the audit journal. Rolled-back operations emit nothing.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payload amounts are decimal strings in the asset's smallest unit
 * - No UPDATE, no DELETE, only new events
 */

export type EventSource = "vault" | "reserve" | "keeper" | "admin";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups events from one request or epoch tick */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type` (e.g. "vault.deposited").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
