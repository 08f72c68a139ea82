/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain values read at system
 * boundaries (import files, database rows, command-line input).
 */

import type { AccountCategory } from "./ledger.js";
import type { ErrorKind } from "./result.js";

// =============================================================================
// Ledger guards
// =============================================================================

/**
 * Account categories in chart order.
 */
export const ACCOUNT_CATEGORIES: readonly AccountCategory[] = [
  "asset",
  "liability",
  "equity",
  "income",
  "expense",
] as const;

const CATEGORY_SET = new Set<string>(ACCOUNT_CATEGORIES);

export function isAccountCategory(value: unknown): value is AccountCategory {
  return typeof value === "string" && CATEGORY_SET.has(value);
}

// =============================================================================
// Result guards
// =============================================================================

const ERROR_KINDS = new Set<string>([
  "InvalidInput",
  "InvalidAmount",
  "InvalidPosting",
  "NotFound",
  "PeriodLocked",
  "DuplicateAccount",
  "InvalidField",
]);

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === "string" && ERROR_KINDS.has(value);
}
