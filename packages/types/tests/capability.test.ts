import { describe, it, expect } from "vitest";
import {
  createContext,
  hasCapability,
  requireCapability,
  isCapability,
} from "../src/capability.js";
import { AccessError, TreasuryError, hasErrorCode, isTreasuryError } from "../src/errors.js";

describe("createContext", () => {
  it("collects capabilities into a set", () => {
    const ctx = createContext("ops", ["administrator", "keeper"]);
    expect(ctx.actor).toBe("ops");
    expect(hasCapability(ctx, "administrator")).toBe(true);
    expect(hasCapability(ctx, "orchestrator")).toBe(false);
  });

  it("omits correlationId unless given", () => {
    expect("correlationId" in createContext("alice")).toBe(false);
    expect(createContext("alice", [], "req-1").correlationId).toBe("req-1");
  });
});

describe("requireCapability", () => {
  it("passes when the capability is present", () => {
    expect(() =>
      requireCapability(createContext("keeper-1", ["keeper"]), "keeper", "rebalanceYield"),
    ).not.toThrow();
  });

  it("throws AccessError Unauthorized when missing", () => {
    const ctx = createContext("alice");
    try {
      requireCapability(ctx, "administrator", "setTargetPrice");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AccessError);
      expect(err).toBeInstanceOf(TreasuryError);
      expect(isTreasuryError(err)).toBe(true);
      expect(hasErrorCode(err, "Unauthorized")).toBe(true);
      if (err instanceof AccessError) {
        expect(err.kind).toBe("access");
        expect(err.message).toBe(
          'setTargetPrice requires the administrator capability (actor "alice")',
        );
      }
    }
  });
});

describe("isCapability", () => {
  it("recognizes the three capability classes", () => {
    expect(isCapability("administrator")).toBe(true);
    expect(isCapability("keeper")).toBe(true);
    expect(isCapability("orchestrator")).toBe(true);
    expect(isCapability("viewer")).toBe(false);
  });
});
