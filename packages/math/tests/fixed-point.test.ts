/**
 * Tests for fixed-point helpers.
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@pegvault/types";
import {
  mulDiv,
  applyBps,
  bpsOf,
  scaleDecimals,
  parseUnits,
  formatUnits,
  minBigInt,
  maxBigInt,
} from "../src/fixed-point.js";

// ─── mulDiv ──────────────────────────────────────────────────────────────

describe("mulDiv", () => {
  it("truncates by default", () => {
    expect(mulDiv(10n, 10n, 3n)).toBe(33n);
  });

  it("rounds up on request when there is a remainder", () => {
    expect(mulDiv(10n, 10n, 3n, "up")).toBe(34n);
  });

  it("does not round up an exact quotient", () => {
    expect(mulDiv(10n, 9n, 3n, "up")).toBe(30n);
  });

  it("keeps full precision for large intermediates", () => {
    const big = 2n ** 200n;
    expect(mulDiv(big, big, big)).toBe(big);
  });

  it("rejects division by zero", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(ValidationError);
  });

  it("rejects negative operands", () => {
    expect(() => mulDiv(-1n, 1n, 1n)).toThrow("mulDiv: operands must be non-negative");
  });
});

// ─── bps ─────────────────────────────────────────────────────────────────

describe("applyBps / bpsOf", () => {
  it("applies basis points", () => {
    expect(applyBps(1_000_000n, 7_000n)).toBe(700_000n);
    expect(applyBps(999n, 100n)).toBe(9n);
    expect(applyBps(999n, 100n, "up")).toBe(10n);
  });

  it("computes a share in basis points", () => {
    expect(bpsOf(25n, 100n)).toBe(2_500n);
  });

  it("returns zero for an empty whole", () => {
    expect(bpsOf(25n, 0n)).toBe(0n);
  });
});

// ─── scaleDecimals ───────────────────────────────────────────────────────

describe("scaleDecimals", () => {
  it("widens the scale exactly", () => {
    expect(scaleDecimals(97_000n, 0, 8)).toBe(9_700_000_000_000n);
  });

  it("narrows with truncation", () => {
    expect(scaleDecimals(123_456_789n, 8, 6)).toBe(1_234_567n);
  });

  it("narrows rounding up on request", () => {
    expect(scaleDecimals(123_456_789n, 8, 6, "up")).toBe(1_234_568n);
  });
});

// ─── decimal strings ─────────────────────────────────────────────────────

describe("parseUnits", () => {
  it("parses whole and fractional amounts", () => {
    expect(parseUnits("100", 6)).toBe(100_000_000n);
    expect(parseUnits("0.5", 6)).toBe(500_000n);
    expect(parseUnits(" 97000.12345678 ", 8)).toBe(9_700_012_345_678n);
  });

  it("rejects too many decimal places", () => {
    expect(() => parseUnits("1.0000001", 6)).toThrow(
      'Amount "1.0000001" has 7 decimal places, at most 6 allowed',
    );
  });

  it("rejects negative and malformed input", () => {
    expect(() => parseUnits("-1", 6)).toThrow(ValidationError);
    expect(() => parseUnits("1e6", 6)).toThrow(ValidationError);
    expect(() => parseUnits("", 6)).toThrow(ValidationError);
  });
});

describe("formatUnits", () => {
  it("drops trailing zeros", () => {
    expect(formatUnits(100_500_000n, 6)).toBe("100.5");
    expect(formatUnits(100_000_000n, 6)).toBe("100");
  });

  it("pads small fractions", () => {
    expect(formatUnits(1n, 6)).toBe("0.000001");
  });

  it("keeps the sign", () => {
    expect(formatUnits(-1_500_000n, 6)).toBe("-1.5");
  });

  it("handles zero decimals", () => {
    expect(formatUnits(42n, 0)).toBe("42");
  });

  it("inverts parseUnits", () => {
    expect(formatUnits(parseUnits("1234.000321", 6), 6)).toBe("1234.000321");
  });
});

describe("minBigInt / maxBigInt", () => {
  it("picks the smaller and larger value", () => {
    expect(minBigInt(3n, 7n)).toBe(3n);
    expect(maxBigInt(3n, 7n)).toBe(7n);
  });
});
