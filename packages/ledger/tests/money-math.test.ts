/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Number ↔ scaled bigint conversion, rounding and validation
 * - Positive-amount checks used by every mutation
 * - Two-decimal display rounding
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  toScaled,
  fromScaled,
  roundToScaled,
  assertPositiveAmount,
  formatMoney,
  isWithinRange,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("rejects more fractional digits than decimals", () => {
    expect(() => parseAmount("1.234", 2)).toThrow(LedgerError);
  });

  it("rejects malformed input", () => {
    expect(() => parseAmount("12abc", 2)).toThrow("Invalid amount format");
    expect(() => parseAmount("", 2)).toThrow(LedgerError);
    expect(() => parseAmount("1e5", 2)).toThrow(LedgerError);
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with decimals", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("pads small values", () => {
    expect(formatAmount(5n, 6)).toBe("0.000005");
  });

  it("formats negatives", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats with zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── toScaled / fromScaled ───────────────────────────────────────────────

describe("toScaled", () => {
  it("scales a whole number", () => {
    expect(toScaled(1000, 6)).toBe(1_000_000_000n);
  });

  it("scales a decimal number exactly", () => {
    expect(toScaled(100.5, 2)).toBe(10050n);
    expect(toScaled(0.1, 6)).toBe(100_000n);
  });

  it("keeps the sign", () => {
    expect(toScaled(-5, 2)).toBe(-500n);
  });

  it("rounds a number needing more decimals than configured", () => {
    expect(toScaled(1.005, 2)).toBe(101n);
    expect(toScaled(1.004, 2)).toBe(100n);
  });

  it("absorbs binary noise from float arithmetic", () => {
    expect(toScaled(0.1 + 0.2, 6)).toBe(300_000n);
  });

  it("rejects non-finite numbers", () => {
    expect(() => toScaled(Number.NaN, 2)).toThrow("finite");
    expect(() => toScaled(Number.POSITIVE_INFINITY, 2)).toThrow("finite");
  });

  it("rejects numbers beyond the safe scaled range", () => {
    expect(() => toScaled(1e16, 2)).toThrow("out of range");
  });

  it("throws INVALID_AMOUNT codes", () => {
    try {
      toScaled(Number.NaN, 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect(err).toMatchObject({ code: "INVALID_AMOUNT" });
    }
  });
});

describe("roundToScaled", () => {
  it("rounds the half away from zero", () => {
    expect(roundToScaled(2.5, 0)).toBe(3n);
    expect(roundToScaled(-2.5, 0)).toBe(-3n);
    expect(roundToScaled(99.995, 2)).toBe(10000n);
  });

  it("truncates below the half", () => {
    expect(roundToScaled(12.344, 2)).toBe(1234n);
    expect(roundToScaled(-12.344, 2)).toBe(-1234n);
  });

  it("handles exponent notation", () => {
    expect(roundToScaled(1e-7, 6)).toBe(0n);
    expect(roundToScaled(5e-7, 8)).toBe(50n);
  });
});

describe("fromScaled", () => {
  it("converts back to a number", () => {
    expect(fromScaled(10050n, 2)).toBe(100.5);
    expect(fromScaled(100_000n, 6)).toBe(0.1);
  });
});

describe("isWithinRange", () => {
  it("accepts the largest safe integer", () => {
    expect(isWithinRange(BigInt(Number.MAX_SAFE_INTEGER))).toBe(true);
  });

  it("rejects one more than the largest safe integer", () => {
    expect(isWithinRange(BigInt(Number.MAX_SAFE_INTEGER) + 1n)).toBe(false);
  });
});

// ─── assertPositiveAmount ────────────────────────────────────────────────

describe("assertPositiveAmount", () => {
  it("returns the scaled amount", () => {
    expect(assertPositiveAmount(25, 2, "deposit")).toBe(2500n);
  });

  it("rejects zero", () => {
    expect(() => assertPositiveAmount(0, 2, "deposit")).toThrow(
      "Invalid deposit: amount must be positive, got 0",
    );
  });

  it("rejects negatives", () => {
    expect(() => assertPositiveAmount(-10, 2, "withdrawal")).toThrow(
      "Invalid withdrawal: amount must be positive, got -10",
    );
  });

  it("rounds a fractional amount", () => {
    expect(assertPositiveAmount(0.1 + 0.2, 2, "deposit")).toBe(30n);
  });

  it("rejects a positive amount that rounds to zero", () => {
    expect(() => assertPositiveAmount(0.001, 2, "deposit")).toThrow(
      "Invalid deposit: amount 0.001 rounds to zero at 2 decimal places",
    );
  });
});

// ─── formatMoney ─────────────────────────────────────────────────────────

describe("formatMoney", () => {
  it("renders two decimals", () => {
    expect(formatMoney(1000)).toBe("1000.00");
    expect(formatMoney(0.5)).toBe("0.50");
    expect(formatMoney(4200)).toBe("4200.00");
  });

  it("truncates below the half", () => {
    expect(formatMoney(12.344)).toBe("12.34");
    expect(formatMoney(0.001)).toBe("0.00");
  });

  it("rounds the half away from zero", () => {
    expect(formatMoney(1.005)).toBe("1.01");
    expect(formatMoney(99.995)).toBe("100.00");
  });

  it("renders negatives", () => {
    expect(formatMoney(-4.2)).toBe("-4.20");
  });

  it("falls back for exponent notation", () => {
    expect(formatMoney(1e-7)).toBe("0.00");
  });
});
