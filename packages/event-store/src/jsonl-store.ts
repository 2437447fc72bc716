/**
 * @pegvault/event-store — JSONL journal.
 *
 * One sealed record per line. Each append is a single write followed by
 * fsync before the in-memory index moves.
 *
 * Recovery on open:
 * - A trailing line without its newline is an interrupted append that was
 *   never acknowledged; it is cut off and the file truncated to the last
 *   complete record
 * - Any complete line that fails to parse, or a broken hash chain, is
 *   corruption and opening fails with CORRUPT_JOURNAL
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@pegvault/types";
import { verifyChain } from "./hash-chain.js";
import { JournalBase } from "./journal.js";
import type { JournalRecord } from "./types.js";
import { EventStoreError } from "./types.js";

export interface JsonlEventStoreOptions {
  /** Path to the .jsonl file; parent directories are created */
  readonly filePath: string;
}

export interface RecoveryReport {
  /** Bytes of an interrupted trailing append that were discarded */
  readonly truncatedBytes: number;
}

export class JsonlEventStore extends JournalBase {
  readonly filePath: string;
  readonly recovery: RecoveryReport;

  constructor(options: JsonlEventStoreOptions) {
    super();
    this.filePath = options.filePath;
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.recovery = this.load();
  }

  protected persist(records: readonly JournalRecord[]): void {
    const data = records.map((r) => `${JSON.stringify(r)}\n`).join("");
    const fd = openSync(this.filePath, "a");
    try {
      writeSync(fd, data, null, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private load(): RecoveryReport {
    if (!existsSync(this.filePath)) {
      return { truncatedBytes: 0 };
    }

    const content = readFileSync(this.filePath, "utf-8");
    const lastNewline = content.lastIndexOf("\n");
    const complete = content.slice(0, lastNewline + 1);
    const torn = content.slice(lastNewline + 1);

    const records: JournalRecord[] = [];
    complete.split("\n").forEach((line, i) => {
      if (line.trim() === "") return;
      records.push(parseLine(line, i + 1, this.filePath));
    });

    const report = verifyChain(records);
    if (!report.valid) {
      throw new EventStoreError(
        "CORRUPT_JOURNAL",
        `Hash chain broken at position ${String(report.brokenAt)} in ${this.filePath}: ${report.reason ?? "unknown"}`,
      );
    }

    let truncatedBytes = 0;
    if (torn.length > 0) {
      truncatedBytes = Buffer.byteLength(torn, "utf-8");
      truncateSync(this.filePath, Buffer.byteLength(complete, "utf-8"));
    }

    this.index(records);
    return { truncatedBytes };
  }
}

function parseLine(line: string, lineNumber: number, filePath: string): JournalRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new EventStoreError(
      "CORRUPT_JOURNAL",
      `Unparseable record on line ${String(lineNumber)} of ${filePath}`,
    );
  }
  if (!isJournalRecord(parsed)) {
    throw new EventStoreError(
      "CORRUPT_JOURNAL",
      `Malformed record on line ${String(lineNumber)} of ${filePath}`,
    );
  }
  return parsed;
}

function isJournalRecord(value: unknown): value is JournalRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDomainEvent(v.event) &&
    typeof v.streamId === "string" &&
    Number.isInteger(v.version) &&
    Number.isInteger(v.position) &&
    typeof v.appendedAt === "string" &&
    typeof v.previousHash === "string" &&
    typeof v.hash === "string"
  );
}
