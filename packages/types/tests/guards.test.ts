/**
 * Tests for runtime type guards.
 */

import { describe, it, expect } from "vitest";
import {
  isDomainEvent,
  isEventMetadata,
  isAssetSpec,
  isIntegerString,
} from "../src/guards.js";

function metadata(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    eventId: "evt-1",
    timestamp: "2026-01-01T00:00:00.000Z",
    actor: "keeper",
    correlationId: "tick-1",
    source: "vault",
    ...overrides,
  };
}

describe("isEventMetadata", () => {
  it("accepts well-formed metadata", () => {
    expect(isEventMetadata(metadata())).toBe(true);
  });

  it("accepts an optional causationId", () => {
    expect(isEventMetadata(metadata({ causationId: "evt-0" }))).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata(metadata({ source: "observer" }))).toBe(false);
  });

  it("rejects a numeric timestamp", () => {
    expect(isEventMetadata(metadata({ timestamp: 1700000000 }))).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts an event with an object payload", () => {
    expect(
      isDomainEvent({ type: "vault.deposited", metadata: metadata(), payload: { assets: "1" } }),
    ).toBe(true);
  });

  it("rejects an empty type", () => {
    expect(isDomainEvent({ type: "", metadata: metadata(), payload: {} })).toBe(false);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "x", metadata: metadata(), payload: null })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isDomainEvent("vault.deposited")).toBe(false);
    expect(isDomainEvent(null)).toBe(false);
  });
});

describe("isAssetSpec", () => {
  it("accepts an id with integer decimals", () => {
    expect(isAssetSpec({ id: "USDC", decimals: 6 })).toBe(true);
  });

  it("rejects fractional or negative decimals", () => {
    expect(isAssetSpec({ id: "USDC", decimals: 6.5 })).toBe(false);
    expect(isAssetSpec({ id: "USDC", decimals: -1 })).toBe(false);
  });
});

describe("isIntegerString", () => {
  it("accepts base-10 integers", () => {
    expect(isIntegerString("1000000")).toBe(true);
    expect(isIntegerString("-5")).toBe(true);
  });

  it("rejects decimals and non-strings", () => {
    expect(isIntegerString("1.5")).toBe(false);
    expect(isIntegerString(15)).toBe(false);
    expect(isIntegerString("")).toBe(false);
  });
});
