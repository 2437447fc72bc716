/**
 * @pegvault/event-store — Snapshot store.
 *
 * Durable point-in-time state of a component (vault ledger, reserve
 * position). Each save gets the next version for its stream and a SHA-256
 * of the canonical state; loads recompute the hash and refuse tampered
 * snapshots.
 *
 * File layout: <dir>/<streamId>/<version, zero-padded>.json
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { join } from "node:path";
import { canonicalize } from "json-canonicalize";
import { sha256Hex } from "./hash-chain.js";
import { EventStoreError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface StoredSnapshot {
  readonly streamId: string;
  /** Increments by one per save */
  readonly version: number;
  readonly takenAt: string;
  /** JSON-compatible state; callers validate its shape on load */
  readonly state: unknown;
  readonly stateHash: string;
}

export interface SnapshotStore {
  save(streamId: string, state: unknown): StoredSnapshot;

  /** Latest verified snapshot of the stream */
  load(streamId: string): StoredSnapshot | undefined;

  /** Number of snapshots kept for the stream */
  count(streamId: string): number;
}

export function computeSnapshotHash(state: unknown): string {
  return sha256Hex(canonicalize(state));
}

export function verifySnapshot(snapshot: StoredSnapshot): boolean {
  return computeSnapshotHash(snapshot.state) === snapshot.stateHash;
}

function seal(streamId: string, version: number, state: unknown): StoredSnapshot {
  // JSON round trip drops undefined fields so the hash matches what is read back.
  const plain: unknown = JSON.parse(JSON.stringify(state));
  return {
    streamId,
    version,
    takenAt: new Date().toISOString(),
    state: plain,
    stateHash: computeSnapshotHash(plain),
  };
}

// =============================================================================
// In-memory
// =============================================================================

export class InMemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, StoredSnapshot[]>();

  save(streamId: string, state: unknown): StoredSnapshot {
    const list = this.snapshots.get(streamId) ?? [];
    const snapshot = seal(streamId, list.length + 1, state);
    list.push(snapshot);
    this.snapshots.set(streamId, list);
    return snapshot;
  }

  load(streamId: string): StoredSnapshot | undefined {
    const list = this.snapshots.get(streamId);
    const latest = list?.[list.length - 1];
    if (latest !== undefined && !verifySnapshot(latest)) {
      throw new EventStoreError("SNAPSHOT_INTEGRITY", `Snapshot hash mismatch for "${streamId}"`, streamId);
    }
    return latest;
  }

  count(streamId: string): number {
    return this.snapshots.get(streamId)?.length ?? 0;
  }
}

// =============================================================================
// File
// =============================================================================

export interface FileSnapshotStoreOptions {
  readonly directory: string;
  /** Snapshots kept per stream (default 10) */
  readonly retain?: number;
}

const VERSION_WIDTH = 12;

export class FileSnapshotStore implements SnapshotStore {
  private readonly directory: string;
  private readonly retain: number;

  constructor(options: FileSnapshotStoreOptions) {
    this.directory = options.directory;
    this.retain = Math.max(1, options.retain ?? 10);
    mkdirSync(this.directory, { recursive: true });
  }

  save(streamId: string, state: unknown): StoredSnapshot {
    const dir = this.streamDir(streamId);
    mkdirSync(dir, { recursive: true });

    const versions = this.versions(streamId);
    const snapshot = seal(streamId, (versions[versions.length - 1] ?? 0) + 1, state);
    const target = join(dir, fileName(snapshot.version));
    const temp = `${target}.tmp`;

    const fd = openSync(temp, "w");
    try {
      writeSync(fd, JSON.stringify(snapshot), null, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(temp, target);

    this.prune(streamId, [...versions, snapshot.version]);
    return snapshot;
  }

  load(streamId: string): StoredSnapshot | undefined {
    const versions = this.versions(streamId);
    const latest = versions[versions.length - 1];
    if (latest === undefined) return undefined;

    const path = join(this.streamDir(streamId), fileName(latest));
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf-8"));
    } catch {
      throw new EventStoreError("SNAPSHOT_INTEGRITY", `Unreadable snapshot ${path}`, streamId);
    }
    if (!isStoredSnapshot(parsed) || parsed.streamId !== streamId || !verifySnapshot(parsed)) {
      throw new EventStoreError("SNAPSHOT_INTEGRITY", `Snapshot hash mismatch in ${path}`, streamId);
    }
    return parsed;
  }

  count(streamId: string): number {
    return this.versions(streamId).length;
  }

  private streamDir(streamId: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(streamId) || streamId.startsWith(".")) {
      throw new EventStoreError("INVALID_STREAM_ID", `Invalid snapshot stream id: "${streamId}"`, streamId);
    }
    return join(this.directory, streamId);
  }

  private versions(streamId: string): number[] {
    const dir = this.streamDir(streamId);
    if (!existsSync(dir)) return [];
    return readdirSync(dir)
      .filter((name) => /^\d+\.json$/.test(name))
      .map((name) => Number.parseInt(name, 10))
      .sort((a, b) => a - b);
  }

  private prune(streamId: string, versions: readonly number[]): void {
    const excess = versions.length - this.retain;
    for (const version of versions.slice(0, Math.max(0, excess))) {
      unlinkSync(join(this.streamDir(streamId), fileName(version)));
    }
  }
}

function fileName(version: number): string {
  return `${String(version).padStart(VERSION_WIDTH, "0")}.json`;
}

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.streamId === "string" &&
    Number.isInteger(v.version) &&
    typeof v.takenAt === "string" &&
    "state" in v &&
    typeof v.stateHash === "string"
  );
}
