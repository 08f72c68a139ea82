/**
 * @pocketbook/types — Shared domain types for the Pocketbook ledger.
 *
 * These types are used across all Pocketbook packages:
 * - Ledger records (accounts, transactions, budgets, period locks)
 * - The uniform result envelope and its error kinds
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Ledger records
export type {
  AccountCategory,
  AccountId,
  TransactionId,
  DateString,
  YearMonth,
  Amount,
  AmountInput,
  Account,
  Transaction,
  Budget,
  PeriodLock,
} from "./ledger.js";

// Result envelope
export type {
  ErrorKind,
  ErrorDetail,
  Success,
  Failure,
  Result,
} from "./result.js";

export { success, failure } from "./result.js";

// Runtime type guards
export {
  ACCOUNT_CATEGORIES,
  isAccountCategory,
  isErrorKind,
} from "./guards.js";
