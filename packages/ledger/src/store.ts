/**
 * @pocketbook/ledger — Ledger Store interface.
 *
 * The persistence boundary for the ledger services. Implementations
 * hold accounts, transactions, budgets and period locks, and must
 * guarantee:
 *
 * - (name, category) is unique among accounts
 * - (accountId, period) is unique among budgets
 * - Transactions and budgets only reference existing accounts
 * - transaction(fn) applies everything fn wrote, or nothing
 *
 * Amounts cross this boundary as canonical decimal strings carrying
 * exactly `decimals` fractional digits.
 */

import type {
  Account,
  AccountCategory,
  AccountId,
  Amount,
  Budget,
  DateString,
  PeriodLock,
  Transaction,
  TransactionId,
  YearMonth,
} from "@pocketbook/types";
import type { DateRange, PostingTotals } from "./types.js";

// =============================================================================
// Rows
// =============================================================================

export interface NewAccount {
  readonly name: string;
  readonly category: AccountCategory;
  readonly openingBalance: Amount;
  readonly createdAt: string;
}

export interface NewTransaction {
  readonly date: DateString;
  readonly amount: Amount;
  readonly debitAccountId: AccountId;
  readonly creditAccountId: AccountId;
  readonly notes: string;
  readonly reversalOf: TransactionId | null;
  readonly createdAt: string;
}

/**
 * Replacement values for an existing transaction.
 */
export interface TransactionPatch {
  readonly date: DateString;
  readonly amount: Amount;
  readonly debitAccountId: AccountId;
  readonly creditAccountId: AccountId;
  readonly notes: string;
  readonly updatedAt: string;
}

/**
 * Store-level transaction filter. Results are ordered by date,
 * then by id (insertion order).
 */
export interface TransactionFilter extends DateRange {
  /** Matches postings on either side. */
  readonly accountId?: AccountId | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "UNIQUE_VIOLATION"
  | "FOREIGN_KEY_VIOLATION"
  | "NOT_FOUND";

/**
 * Constraint violation raised by a store. Anything else a store
 * throws is a storage fault.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
  }
}

// =============================================================================
// Store Interface
// =============================================================================

export interface LedgerStore {
  /** Fractional digits of every amount held by this store. */
  readonly decimals: number;

  /**
   * Run fn as one atomic unit of work.
   * If fn throws, nothing it wrote is kept and the error is rethrown.
   */
  transaction<T>(fn: () => T): T;

  // ─── Accounts ─────────────────────────────────────────────────────

  /** @throws {StoreError} UNIQUE_VIOLATION if (name, category) exists */
  insertAccount(account: NewAccount): Account;
  getAccount(id: AccountId): Account | undefined;
  findAccount(name: string, category: AccountCategory): Account | undefined;
  /** All accounts, or those of one category, in id order. */
  listAccounts(category?: AccountCategory): readonly Account[];
  /** @throws {StoreError} NOT_FOUND */
  updateOpeningBalance(id: AccountId, amount: Amount): void;

  // ─── Transactions ─────────────────────────────────────────────────

  /** @throws {StoreError} FOREIGN_KEY_VIOLATION for unknown accounts */
  insertTransaction(transaction: NewTransaction): Transaction;
  getTransaction(id: TransactionId): Transaction | undefined;
  /** @throws {StoreError} NOT_FOUND or FOREIGN_KEY_VIOLATION */
  updateTransaction(id: TransactionId, patch: TransactionPatch): Transaction;
  /** Returns false if no such transaction existed. */
  deleteTransaction(id: TransactionId): boolean;
  queryTransactions(filter?: TransactionFilter): readonly Transaction[];

  /**
   * Debit and credit totals for one account over a date range.
   */
  postingTotals(accountId: AccountId, range?: DateRange): PostingTotals;

  /**
   * Totals for every account with at least one posting in range.
   */
  postingTotalsByAccount(range?: DateRange): ReadonlyMap<AccountId, PostingTotals>;

  // ─── Budgets ──────────────────────────────────────────────────────

  /** Insert or replace. @throws {StoreError} FOREIGN_KEY_VIOLATION */
  upsertBudget(budget: Budget): void;
  /** Insert unless a row exists. Returns whether a row was written. */
  insertBudgetIfAbsent(budget: Budget): boolean;
  getBudget(accountId: AccountId, period: YearMonth): Budget | undefined;
  /** Budgets of one period, in account id order. */
  listBudgets(period: YearMonth): readonly Budget[];

  // ─── Period Locks ─────────────────────────────────────────────────

  /** Returns false if the period was already locked. */
  insertPeriodLock(lock: PeriodLock): boolean;
  /** Returns false if the period was not locked. */
  deletePeriodLock(period: YearMonth): boolean;
  getPeriodLock(period: YearMonth): PeriodLock | undefined;
  listPeriodLocks(): readonly PeriodLock[];
}
