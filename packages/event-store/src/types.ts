/**
 * @pegvault/event-store — Core types.
 *
 * The audit journal is an append-only sequence of hash-chained records.
 * Records are grouped into streams ("vault", "reserve", ...) but chained
 * globally, so removing or reordering anything anywhere breaks verification.
 */

import type { DomainEvent } from "@pegvault/types";

// =============================================================================
// Records
// =============================================================================

export interface JournalRecord {
  readonly event: DomainEvent;

  /** Stream the event belongs to */
  readonly streamId: string;

  /** 1-based position within the stream */
  readonly version: number;

  /** 1-based position across all streams */
  readonly position: number;

  /** ISO 8601 timestamp of the append */
  readonly appendedAt: string;

  /** Hash of the record before this one (GENESIS_HASH for the first) */
  readonly previousHash: string;

  /** SHA-256 over the canonical JSON of every other field */
  readonly hash: string;
}

export type UnhashedRecord = Omit<JournalRecord, "hash">;

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly records: readonly JournalRecord[];
}

export interface ReadOptions {
  /** First version to include (default 1) */
  readonly fromVersion?: number;
  readonly limit?: number;
}

export interface ReadAllOptions {
  /** First global position to include (default 1) */
  readonly fromPosition?: number;
  readonly limit?: number;
  /** Only include these event types */
  readonly types?: readonly string[];
  /** Newest first */
  readonly reverse?: boolean;
}

export interface IntegrityReport {
  readonly valid: boolean;
  readonly checked: number;
  /** Position of the first record that failed verification */
  readonly brokenAt?: number;
  readonly reason?: string;
}

export type JournalListener = (record: JournalRecord) => void;

/**
 * Append-only, hash-chained event store.
 */
export interface EventStore {
  /**
   * Append events to a stream. When `expectedVersion` is given the append
   * fails unless the stream is exactly at that version.
   */
  append(streamId: string, events: readonly DomainEvent[], expectedVersion?: number): AppendResult;

  read(streamId: string, options?: ReadOptions): readonly JournalRecord[];

  readAll(options?: ReadAllOptions): readonly JournalRecord[];

  /** Number of events in the stream (0 when absent) */
  streamVersion(streamId: string): number;

  /** Number of events in the journal */
  globalPosition(): number;

  /** Hash of the newest record, GENESIS_HASH when empty */
  headHash(): string;

  verifyIntegrity(): IntegrityReport;

  /** Called synchronously after each durable append; returns an unsubscribe */
  subscribe(listener: JournalListener): () => void;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "EMPTY_APPEND"
  | "INVALID_EVENT"
  | "INVALID_STREAM_ID"
  | "VERSION_CONFLICT"
  | "CORRUPT_JOURNAL"
  | "SNAPSHOT_INTEGRITY";

export class EventStoreError extends Error {
  readonly code: EventStoreErrorCode;
  readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
