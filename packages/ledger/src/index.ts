/**
 * @pocketbook/ledger — Personal double-entry bookkeeping.
 *
 * Accounts, postings, monthly budgets and period locks over a
 * pluggable LedgerStore. Enforces:
 * - Every posting debits one account and credits another by the same amount
 * - Expense accounts are never credited, income accounts never debited
 * - Locked months reject changes; reversals are the way to correct them
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Every service operation returns a Result envelope. Only storage
 * faults and programming errors escape as exceptions.
 */

// Composition
export { createLedger } from "./ledger.js";
export type { Ledger } from "./ledger.js";

// Services
export { LedgerService } from "./service.js";
export { AccountService } from "./accounts.js";
export { TransactionService, DEFAULT_SEARCH_LIMIT, TRANSACTION_CSV_FIELDS } from "./transactions.js";
export { BudgetService, BUDGET_REPORT_CSV_FIELDS, formatPctOfBudget } from "./budgets.js";
export type { BudgetLine } from "./budgets.js";

// Storage
export { StoreError } from "./store.js";
export type {
  LedgerStore,
  NewAccount,
  NewTransaction,
  TransactionPatch,
  TransactionFilter,
  StoreErrorCode,
} from "./store.js";
export { InMemoryLedgerStore } from "./in-memory-store.js";

// Balance computation
export {
  normalMovement,
  computeAccountBalance,
  computeTrialBalance,
  computeFinancialOverview,
} from "./balance-calculator.js";

// Money arithmetic
export {
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
} from "./money-math.js";

// Validation
export {
  validateDate,
  validatePeriod,
  validatePositiveAmount,
  validateNonNegativeAmount,
  validateSignedAmount,
  validateCategory,
  validateAccountName,
  validateId,
  MAX_ACCOUNT_NAME_LENGTH,
  MAX_AMOUNT_MINOR_UNITS,
} from "./validation.js";
export type { Verdict } from "./validation.js";

// Chart sources and CSV
export { loadDefaultChart, parseChartCsv, parseChartJson, validateChartRow } from "./chart-import.js";
export type { ChartRow } from "./chart-import.js";
export { readCsv, writeCsv } from "./csv.js";
export type { CsvTable } from "./csv.js";
export { periodOf, periodRange, daysInMonth } from "./period.js";

// Types
export type {
  NormalBalance,
  PostingTotals,
  DateRange,
  AccountBalance,
  BalanceOptions,
  TrialBalanceLine,
  TrialBalance,
  FinancialOverview,
  ChartRowInput,
  ImportRowError,
  ImportResult,
  SeedResult,
  AccountFilter,
  TransactionInput,
  TransactionUpdate,
  ReversalInput,
  SearchQuery,
  CopyForwardResult,
  PctOfBudget,
  BudgetVsActualRow,
  BudgetVsActualReport,
  MutationLogEntry,
  LedgerOptions,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE, CATEGORY_ORDER } from "./types.js";
