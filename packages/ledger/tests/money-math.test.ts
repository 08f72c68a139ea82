/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount scaling
 * - Normalisation of caller input
 * - Arithmetic and comparison
 * - Percentages for budget reports
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  normalizeAmount,
  addAmounts,
  subtractAmounts,
  sumAmounts,
  compareAmounts,
  isZeroAmount,
  zeroAmount,
  percentOf,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 2)).toBe(10000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads a short fractional part", () => {
    expect(parseAmount("7.5", 2)).toBe(750n);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseAmount(" 3.10 ", 2)).toBe(310n);
  });

  it("rejects more decimal places than the ledger allows", () => {
    expect(() => parseAmount("1.234", 2)).toThrow(LedgerError);
    expect(() => parseAmount("1.234", 2)).toThrow("has 3 decimal places, but the ledger allows 2");
  });

  it.each(["abc", "", "1.", ".5", "1,000.00", "--1", "1e3"])("rejects %j", (input) => {
    try {
      parseAmount(input, 2);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.code).toBe("InvalidAmount");
      }
    }
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with the ledger's decimals", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("pads small values", () => {
    expect(formatAmount(5n, 2)).toBe("0.05");
    expect(formatAmount(-5n, 2)).toBe("-0.05");
  });

  it("formats zero", () => {
    expect(formatAmount(0n, 2)).toBe("0.00");
  });

  it("formats without a fractional part when decimals is 0", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── normalizeAmount ─────────────────────────────────────────────────────

describe("normalizeAmount", () => {
  it("canonicalises strings", () => {
    expect(normalizeAmount("3.5", 2)).toBe("3.50");
    expect(normalizeAmount("0012", 2)).toBe("12.00");
  });

  it("accepts numbers by their shortest decimal form", () => {
    expect(normalizeAmount(0.1, 2)).toBe("0.10");
    expect(normalizeAmount(12, 2)).toBe("12.00");
    expect(normalizeAmount(-250, 2)).toBe("-250.00");
  });

  it("rejects non-finite numbers", () => {
    expect(() => normalizeAmount(Number.NaN, 2)).toThrow("Amount must be finite, got NaN");
    expect(() => normalizeAmount(Number.POSITIVE_INFINITY, 2)).toThrow(
      "Amount must be finite, got Infinity",
    );
  });

  it("rejects numbers that print in exponent form", () => {
    expect(() => normalizeAmount(1e-7, 2)).toThrow(LedgerError);
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds", () => {
    expect(addAmounts("1.10", "2.25", 2)).toBe("3.35");
  });

  it("subtracts into negatives", () => {
    expect(subtractAmounts("1.00", "2.50", 2)).toBe("-1.50");
  });

  it("sums a list", () => {
    expect(sumAmounts(["1.00", "2.00", "0.50"], 2)).toBe("3.50");
  });

  it("sums an empty list to zero", () => {
    expect(sumAmounts([], 2)).toBe("0.00");
  });

  it("has no floating point drift", () => {
    expect(addAmounts("0.10", "0.20", 2)).toBe("0.30");
  });

  it("compares", () => {
    expect(compareAmounts("1.00", "2.00", 2)).toBe(-1);
    expect(compareAmounts("2.00", "2", 2)).toBe(0);
    expect(compareAmounts("-1.00", "-2.00", 2)).toBe(1);
  });

  it("recognises zero", () => {
    expect(isZeroAmount("0.00", 2)).toBe(true);
    expect(isZeroAmount("-0.00", 2)).toBe(true);
    expect(isZeroAmount("0.01", 2)).toBe(false);
  });

  it("builds a zero of the right width", () => {
    expect(zeroAmount(3)).toBe("0.000");
  });
});

// ─── percentOf ───────────────────────────────────────────────────────────

describe("percentOf", () => {
  it("returns a whole percentage", () => {
    expect(percentOf("150.00", "200.00", 2)).toBe(75);
  });

  it("rounds to two decimals", () => {
    expect(percentOf("1.00", "3.00", 2)).toBe(33.33);
  });

  it("can exceed 100", () => {
    expect(percentOf("250.00", "200.00", 2)).toBe(125);
  });

  it("can be negative", () => {
    expect(percentOf("-50.00", "100.00", 2)).toBe(-50);
  });
});
