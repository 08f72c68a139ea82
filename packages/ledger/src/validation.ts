/**
 * @pocketbook/ledger — Primitive validation.
 *
 * Each check takes an untrusted value and returns a verdict.
 * Checks never throw: malformed input is an ordinary failed verdict
 * carrying a human-readable reason.
 */

import type {
  AccountCategory,
  AccountId,
  Amount,
  DateString,
  ErrorKind,
  YearMonth,
} from "@pocketbook/types";
import { isAccountCategory } from "@pocketbook/types";
import { formatAmount, normalizeAmount, parseAmount } from "./money-math.js";
import { daysInMonth } from "./period.js";
import { LedgerError } from "./types.js";

export type Verdict<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly reason: string };

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const PERIOD_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export const MAX_ACCOUNT_NAME_LENGTH = 120;

/**
 * Largest magnitude of any amount, in minor units. Stores keep amounts
 * as 64-bit integers; this bound leaves room for sums over many postings.
 */
export const MAX_AMOUNT_MINOR_UNITS = BigInt(Number.MAX_SAFE_INTEGER);

function pass<T>(value: T): Verdict<T> {
  return { valid: true, value };
}

function reject<T>(reason: string): Verdict<T> {
  return { valid: false, reason };
}

// ─── Dates ───────────────────────────────────────────────────────────────

/**
 * A real calendar date in YYYY-MM-DD form. "2025-02-30" fails.
 */
export function validateDate(value: unknown): Verdict<DateString> {
  if (typeof value !== "string") {
    return reject("Date must be a string in YYYY-MM-DD format");
  }
  const match = DATE_PATTERN.exec(value);
  if (match === null) {
    return reject(`Invalid date "${value}": expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return reject(`Invalid date "${value}": not a calendar date`);
  }
  return pass(value);
}

export function validatePeriod(value: unknown): Verdict<YearMonth> {
  if (typeof value !== "string" || !PERIOD_PATTERN.test(value)) {
    return reject(`Invalid period "${String(value)}": expected YYYY-MM`);
  }
  return pass(value);
}


// ─── Amounts ─────────────────────────────────────────────────────────────

function validateAmount(
  value: unknown,
  decimals: number,
  accept: (scaled: bigint) => boolean,
  rule: string,
): Verdict<Amount> {
  if (typeof value !== "string" && typeof value !== "number") {
    return reject("Amount must be a number or a decimal string");
  }
  let amount: Amount;
  try {
    amount = normalizeAmount(value, decimals);
  } catch (err: unknown) {
    if (err instanceof LedgerError) {
      return reject(err.message);
    }
    throw err;
  }
  const scaled = parseAmount(amount, decimals);
  const magnitude = scaled < 0n ? -scaled : scaled;
  if (magnitude > MAX_AMOUNT_MINOR_UNITS) {
    return reject(
      `Amount ${amount} exceeds the largest supported amount ${formatAmount(MAX_AMOUNT_MINOR_UNITS, decimals)}`,
    );
  }
  if (!accept(scaled)) {
    return reject(`Amount ${amount} must be ${rule}`);
  }
  return pass(amount);
}

/** Finite and strictly positive. Used for postings. */
export function validatePositiveAmount(value: unknown, decimals: number): Verdict<Amount> {
  return validateAmount(value, decimals, (v) => v > 0n, "greater than zero");
}

/** Finite and zero or more. Used for budgets. */
export function validateNonNegativeAmount(value: unknown, decimals: number): Verdict<Amount> {
  return validateAmount(value, decimals, (v) => v >= 0n, "zero or greater");
}

/** Finite, any sign. Used for opening balances. */
export function validateSignedAmount(value: unknown, decimals: number): Verdict<Amount> {
  return validateAmount(value, decimals, () => true, "finite");
}

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * One of the five categories. Matching is case-insensitive:
 * the value is trimmed and lower-cased first.
 */
export function validateCategory(value: unknown): Verdict<AccountCategory> {
  if (typeof value !== "string") {
    return reject("Account type must be a string");
  }
  const folded = value.trim().toLowerCase();
  if (!isAccountCategory(folded)) {
    return reject(
      `Invalid account type "${value}": expected asset, liability, equity, income or expense`,
    );
  }
  return pass(folded);
}

export function validateAccountName(value: unknown): Verdict<string> {
  if (typeof value !== "string") {
    return reject("Account name must be a string");
  }
  const name = value.trim();
  if (name === "") {
    return reject("Account name must not be empty");
  }
  if (name.length > MAX_ACCOUNT_NAME_LENGTH) {
    return reject(`Account name exceeds ${String(MAX_ACCOUNT_NAME_LENGTH)} characters`);
  }
  return pass(name);
}

/** A positive safe integer. */
export function validateId(value: unknown): Verdict<AccountId> {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    return reject(`Invalid identifier "${String(value)}": expected a positive integer`);
  }
  return pass(value);
}

// ─── Assertion ───────────────────────────────────────────────────────────

/**
 * Unwrap a verdict inside a service operation.
 * Throws LedgerError with the given kind if the verdict failed.
 */
export function expectValid<T>(verdict: Verdict<T>, kind: ErrorKind = "InvalidInput"): T {
  if (!verdict.valid) {
    throw new LedgerError(kind, verdict.reason);
  }
  return verdict.value;
}
