/**
 * @pocketbook/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on stored amounts
 * - A single currency: every amount carries the ledger's decimals
 * - Amounts must be valid decimal strings
 */

import type { Amount, AmountInput } from "@pocketbook/types";
import { LedgerError } from "./types.js";

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=2 → 10000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("InvalidAmount", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "InvalidAmount",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the ledger allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): Amount {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Normalise caller input to a canonical amount string.
 * Numbers must be finite; their shortest decimal form is parsed
 * exactly like a string, so 0.1 stays 0.10 and 1e-7 is rejected.
 */
export function normalizeAmount(input: AmountInput, decimals: number): Amount {
  if (typeof input === "number" && !Number.isFinite(input)) {
    throw new LedgerError("InvalidAmount", `Amount must be finite, got ${String(input)}`);
  }
  return formatAmount(parseAmount(String(input), decimals), decimals);
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function addAmounts(a: Amount, b: Amount, decimals: number): Amount {
  return formatAmount(parseAmount(a, decimals) + parseAmount(b, decimals), decimals);
}

export function subtractAmounts(a: Amount, b: Amount, decimals: number): Amount {
  return formatAmount(parseAmount(a, decimals) - parseAmount(b, decimals), decimals);
}

/**
 * Sum a list of amounts. An empty list sums to zero.
 */
export function sumAmounts(amounts: readonly Amount[], decimals: number): Amount {
  let total = 0n;
  for (const amount of amounts) {
    total += parseAmount(amount, decimals);
  }
  return formatAmount(total, decimals);
}

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: Amount, b: Amount, decimals: number): -1 | 0 | 1 {
  const va = parseAmount(a, decimals);
  const vb = parseAmount(b, decimals);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function isZeroAmount(amount: Amount, decimals: number): boolean {
  return parseAmount(amount, decimals) === 0n;
}

export function zeroAmount(decimals: number): Amount {
  return formatAmount(0n, decimals);
}

/**
 * Percentage of `part` in `whole`, rounded to two decimals.
 * The caller guarantees `whole` is non-zero.
 */
export function percentOf(part: Amount, whole: Amount, decimals: number): number {
  const ratio = Number(parseAmount(part, decimals)) / Number(parseAmount(whole, decimals));
  return Math.round(ratio * 100 * 100) / 100;
}
