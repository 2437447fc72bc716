/**
 * @pegvault/event-store — Shared journal index.
 *
 * Keeps the chain head, per-stream versions and the record list in memory.
 * Subclasses decide how a batch becomes durable by implementing `persist`;
 * the in-memory index is only updated after `persist` returns.
 */

import { isDomainEvent, type DomainEvent } from "@pegvault/types";
import { GENESIS_HASH, sealRecord, verifyChain } from "./hash-chain.js";
import type {
  AppendResult,
  EventStore,
  IntegrityReport,
  JournalListener,
  JournalRecord,
  ReadAllOptions,
  ReadOptions,
} from "./types.js";
import { EventStoreError } from "./types.js";

const STREAM_ID = /^[A-Za-z0-9][A-Za-z0-9._:-]{0,127}$/;

export abstract class JournalBase implements EventStore {
  private readonly records: JournalRecord[] = [];
  private readonly streams = new Map<string, JournalRecord[]>();
  private readonly listeners = new Set<JournalListener>();
  private head = GENESIS_HASH;

  /** Make `records` durable. Throwing aborts the append. */
  protected abstract persist(records: readonly JournalRecord[]): void;

  append(streamId: string, events: readonly DomainEvent[], expectedVersion?: number): AppendResult {
    if (!STREAM_ID.test(streamId)) {
      throw new EventStoreError("INVALID_STREAM_ID", `Invalid stream id: "${streamId}"`, streamId);
    }
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const current = this.streamVersion(streamId);
    if (expectedVersion !== undefined && expectedVersion !== current) {
      throw new EventStoreError(
        "VERSION_CONFLICT",
        `Stream "${streamId}" is at version ${String(current)}, expected ${String(expectedVersion)}`,
        streamId,
      );
    }

    const appendedAt = new Date().toISOString();
    const batch: JournalRecord[] = [];
    let previousHash = this.head;

    events.forEach((event, i) => {
      const record = sealRecord({
        event: toPlainEvent(event, streamId),
        streamId,
        version: current + i + 1,
        position: this.records.length + i + 1,
        appendedAt,
        previousHash,
      });
      batch.push(record);
      previousHash = record.hash;
    });

    this.persist(batch);
    this.index(batch);

    for (const record of batch) {
      for (const listener of this.listeners) {
        listener(record);
      }
    }

    return {
      streamId,
      fromVersion: current + 1,
      toVersion: current + batch.length,
      records: batch,
    };
  }

  read(streamId: string, options: ReadOptions = {}): readonly JournalRecord[] {
    const stream = this.streams.get(streamId) ?? [];
    const from = Math.max(options.fromVersion ?? 1, 1);
    const selected = stream.slice(from - 1);
    return options.limit !== undefined ? selected.slice(0, options.limit) : selected;
  }

  readAll(options: ReadAllOptions = {}): readonly JournalRecord[] {
    const from = Math.max(options.fromPosition ?? 1, 1);
    let selected = this.records.slice(from - 1);
    if (options.types !== undefined) {
      const types = new Set(options.types);
      selected = selected.filter((r) => types.has(r.event.type));
    }
    if (options.reverse === true) {
      selected = selected.reverse();
    }
    return options.limit !== undefined ? selected.slice(0, options.limit) : selected;
  }

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this.records.length;
  }

  headHash(): string {
    return this.head;
  }

  verifyIntegrity(): IntegrityReport {
    return verifyChain(this.records);
  }

  subscribe(listener: JournalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Add already-durable records to the index (used when loading) */
  protected index(records: readonly JournalRecord[]): void {
    for (const record of records) {
      this.records.push(record);
      let stream = this.streams.get(record.streamId);
      if (stream === undefined) {
        stream = [];
        this.streams.set(record.streamId, stream);
      }
      stream.push(record);
      this.head = record.hash;
    }
  }
}

/**
 * The record is hashed exactly as it will be read back from disk, so the
 * event goes through a JSON round trip first (bigints are rejected here).
 */
function toPlainEvent(event: DomainEvent, streamId: string): DomainEvent {
  let plain: unknown;
  try {
    plain = JSON.parse(JSON.stringify(event));
  } catch (err) {
    throw new EventStoreError(
      "INVALID_EVENT",
      `Event "${event.type}" is not JSON-serializable: ${err instanceof Error ? err.message : String(err)}`,
      streamId,
    );
  }
  if (!isDomainEvent(plain)) {
    throw new EventStoreError("INVALID_EVENT", `Malformed event "${event.type}"`, streamId);
  }
  return plain;
}
