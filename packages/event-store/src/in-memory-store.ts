/**
 * @pegvault/event-store — In-memory journal.
 *
 * Same chain and query semantics as the JSONL journal, nothing on disk.
 * Used by tests and by paper-mode runs without a data directory.
 */

import { JournalBase } from "./journal.js";
import type { JournalRecord } from "./types.js";

export class InMemoryEventStore extends JournalBase {
  protected persist(_records: readonly JournalRecord[]): void {
    // nothing to flush
  }
}
