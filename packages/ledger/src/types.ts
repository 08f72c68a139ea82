/**
 * @pocketbook/ledger — Internal types for the ledger services.
 *
 * These extend the shared @pocketbook/types with structures used
 * by the account, transaction and budget services.
 *
 * Rules:
 * - All types are readonly
 * - Rule violations throw LedgerError inside the package and
 *   surface as Failure envelopes at each service operation
 */

import type {
  AccountCategory,
  AccountId,
  Amount,
  AmountInput,
  DateString,
  ErrorKind,
  YearMonth,
} from "@pocketbook/types";

// ─── Balance Rules ───────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account categories to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountCategory, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

/** Position of each category when listing the chart. */
export const CATEGORY_ORDER: Readonly<Record<AccountCategory, number>> = {
  asset: 0,
  liability: 1,
  equity: 2,
  income: 3,
  expense: 4,
} as const;

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Structured error from the ledger services.
 * Thrown internally, converted to a Failure at the operation boundary.
 */
export class LedgerError extends Error {
  public readonly code: ErrorKind;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(code: ErrorKind, message: string, details?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Balances ────────────────────────────────────────────────────────────

/**
 * Debit and credit totals over a set of postings.
 */
export interface PostingTotals {
  readonly debits: Amount;
  readonly credits: Amount;
}

/**
 * Inclusive date range. Either bound may be open.
 */
export interface DateRange {
  readonly from?: DateString | undefined;
  readonly to?: DateString | undefined;
}

/**
 * Current balance of one account.
 */
export interface AccountBalance {
  readonly accountId: AccountId;
  readonly name: string;
  readonly category: AccountCategory;
  readonly openingBalance: Amount;
  readonly totalDebits: Amount;
  readonly totalCredits: Amount;
  /** Net balance in the account's normal direction, opening included. */
  readonly balance: Amount;
}

export interface BalanceOptions {
  /** Only count postings dated on or before this date. */
  readonly asOf?: DateString | undefined;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: AccountId;
  readonly name: string;
  readonly category: AccountCategory;
  readonly debitBalance: Amount;
  readonly creditBalance: Amount;
}

/**
 * Trial balance over all postings (opening balances excluded).
 * Total debits MUST equal total credits.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly totalDebits: Amount;
  readonly totalCredits: Amount;
  readonly balanced: boolean;
}

/**
 * Balance-sheet summary. Net worth is total assets minus total
 * liabilities; equity, income and expense accounts are not counted.
 */
export interface FinancialOverview {
  readonly totalAssets: Amount;
  readonly totalLiabilities: Amount;
  readonly netWorth: Amount;
}

// ─── Chart Import ────────────────────────────────────────────────────────

/**
 * A candidate chart row from an external source. Fields are
 * unchecked until the row is validated.
 */
export interface ChartRowInput {
  readonly name: unknown;
  readonly type: unknown;
}

export interface ImportRowError {
  /** 1-based position of the row in the input sequence. */
  readonly row: number;
  readonly message: string;
}

/**
 * Outcome of a chart import. `status: "empty"` means the input
 * held no valid accounts at all.
 */
export interface ImportResult {
  readonly status: "imported" | "empty";
  readonly added: number;
  readonly skipped: number;
  readonly errors: readonly ImportRowError[];
}

export interface SeedResult {
  readonly added: number;
  readonly existing: number;
}

export interface AccountFilter {
  /** One of the five category names; anything else fails validation. */
  readonly category?: string | undefined;
}

// ─── Transactions ────────────────────────────────────────────────────────

export interface TransactionInput {
  readonly date: DateString;
  readonly amount: AmountInput;
  readonly debitAccountId: AccountId;
  readonly creditAccountId: AccountId;
  readonly notes?: string | undefined;
}

/**
 * The closed set of mutable transaction fields.
 */
export interface TransactionUpdate {
  readonly date?: DateString | undefined;
  readonly amount?: AmountInput | undefined;
  readonly debitAccountId?: AccountId | undefined;
  readonly creditAccountId?: AccountId | undefined;
  readonly notes?: string | undefined;
}

export interface ReversalInput {
  readonly date: DateString;
  readonly notes?: string | undefined;
}

export interface SearchQuery {
  /** Case-insensitive match over notes and account names. */
  readonly text?: string | undefined;
  readonly from?: DateString | undefined;
  readonly to?: DateString | undefined;
  /** Either side of the posting. */
  readonly accountId?: AccountId | undefined;
  readonly limit?: number | undefined;
  readonly offset?: number | undefined;
}

// ─── Budgets ─────────────────────────────────────────────────────────────

export interface CopyForwardResult {
  /** Rows created in the target period. */
  readonly copied: number;
  /** Rows already present in the target period and left untouched. */
  readonly kept: number;
}

/**
 * Percentage of budget consumed. Not applicable when nothing was budgeted.
 */
export type PctOfBudget =
  | { readonly kind: "percent"; readonly value: number }
  | { readonly kind: "not_applicable" };

export interface BudgetVsActualRow {
  readonly accountId: AccountId;
  readonly category: string;
  readonly budgeted: Amount;
  readonly actual: Amount;
  readonly variance: Amount;
  readonly pctOfBudget: PctOfBudget;
}

export interface BudgetVsActualReport {
  readonly period: YearMonth;
  readonly rows: readonly BudgetVsActualRow[];
}

// ─── Service Options ─────────────────────────────────────────────────────

/**
 * Emitted once per mutating operation.
 */
export interface MutationLogEntry {
  readonly operation: string;
  readonly ok: boolean;
  readonly errorKind?: ErrorKind | undefined;
  readonly durationMs: number;
}

export interface LedgerOptions {
  /** Clock used for createdAt/updatedAt/lockedAt stamps. */
  readonly now?: (() => Date) | undefined;
  /** Called after each mutating operation with its outcome. */
  readonly onMutation?: ((entry: MutationLogEntry) => void) | undefined;
  /** Default page size for searches. */
  readonly searchLimit?: number | undefined;
}
