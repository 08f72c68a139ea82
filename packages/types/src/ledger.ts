/**
 * Ledger Types
 *
 * Core records of a single-currency personal ledger.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Identifiers are positive integers assigned by the store
 * - Dates are calendar dates (YYYY-MM-DD), periods are months (YYYY-MM)
 */

/**
 * The five fundamental account categories in double-entry accounting.
 */
export type AccountCategory =
  | "asset"
  | "liability"
  | "equity"
  | "income"
  | "expense";

/** Store-assigned account identifier. */
export type AccountId = number;

/** Store-assigned transaction identifier. */
export type TransactionId = number;

/** A calendar date in `YYYY-MM-DD` form. */
export type DateString = string;

/** A calendar month in `YYYY-MM` form. */
export type YearMonth = string;

/**
 * A canonical decimal amount (e.g. "1150.00").
 * Always carries exactly the ledger's configured number of decimals.
 */
export type Amount = string;

/**
 * An amount as callers may supply it: a decimal string or a finite number.
 * Normalised to {@link Amount} during validation.
 */
export type AmountInput = string | number;

/**
 * An account in the chart of accounts.
 * The (name, category) pair is unique.
 */
export interface Account {
  readonly id: AccountId;
  readonly name: string;
  readonly category: AccountCategory;

  /**
   * Opening balance in the account's normal direction.
   * Negative denotes a contra balance.
   */
  readonly openingBalance: Amount;

  /** ISO 8601 timestamp */
  readonly createdAt: string;
}

/**
 * A double-entry posting: one debited account, one credited account,
 * one strictly positive amount.
 */
export interface Transaction {
  readonly id: TransactionId;
  readonly date: DateString;
  readonly amount: Amount;
  readonly debitAccountId: AccountId;
  readonly creditAccountId: AccountId;
  readonly notes: string;

  /** The posting this one reverses, if it is a reversal. */
  readonly reversalOf: TransactionId | null;

  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * A monthly budget for one category account.
 * Unique per (accountId, period).
 */
export interface Budget {
  readonly accountId: AccountId;
  readonly period: YearMonth;
  readonly amount: Amount;
}

/**
 * A locked month. Transactions dated inside it cannot be
 * modified or deleted.
 */
export interface PeriodLock {
  readonly period: YearMonth;
  readonly lockedAt: string;
}
