/**
 * @pegvault/event-store — Audit journal and state snapshots.
 *
 * - Append-only, hash-chained journal (in-memory and JSONL)
 * - Integrity verification from genesis
 * - Versioned, hash-checked snapshots (in-memory and file)
 */

// Types
export type {
  JournalRecord,
  UnhashedRecord,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  IntegrityReport,
  JournalListener,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { GENESIS_HASH, sha256Hex, hashRecord, sealRecord, verifyChain } from "./hash-chain.js";

// Journals
export { JournalBase } from "./journal.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export type { JsonlEventStoreOptions, RecoveryReport } from "./jsonl-store.js";
export { JsonlEventStore } from "./jsonl-store.js";

// Snapshots
export type { StoredSnapshot, SnapshotStore, FileSnapshotStoreOptions } from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeSnapshotHash,
  verifySnapshot,
} from "./snapshot-store.js";

// Events
export type { EventOptions } from "./events.js";
export { createEvent } from "./events.js";
