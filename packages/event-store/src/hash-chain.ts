/**
 * @pegvault/event-store — Hash chain.
 *
 * hash(n) = SHA-256(canonical JSON of record n without its hash), where the
 * record carries hash(n − 1) as `previousHash`. RFC 8785 canonicalization
 * makes the digest independent of key order.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { IntegrityReport, JournalRecord, UnhashedRecord } from "./types.js";

export const GENESIS_HASH = "genesis";

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export function hashRecord(record: UnhashedRecord): string {
  return sha256Hex(canonicalize(record));
}

export function sealRecord(record: UnhashedRecord): JournalRecord {
  return { ...record, hash: hashRecord(record) };
}

/**
 * Walk the chain from genesis. Stops at the first broken link.
 */
export function verifyChain(records: readonly JournalRecord[]): IntegrityReport {
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;

  for (const record of records) {
    if (record.position !== expectedPosition) {
      return {
        valid: false,
        checked: expectedPosition - 1,
        brokenAt: record.position,
        reason: `expected position ${String(expectedPosition)}, found ${String(record.position)}`,
      };
    }
    if (record.previousHash !== previousHash) {
      return {
        valid: false,
        checked: expectedPosition - 1,
        brokenAt: record.position,
        reason: "previousHash does not match the preceding record",
      };
    }
    const { hash, ...unhashed } = record;
    if (hashRecord(unhashed) !== hash) {
      return {
        valid: false,
        checked: expectedPosition - 1,
        brokenAt: record.position,
        reason: "record content does not match its hash",
      };
    }
    previousHash = hash;
    expectedPosition++;
  }

  return { valid: true, checked: records.length };
}
