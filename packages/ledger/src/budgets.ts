/**
 * @pocketbook/ledger — Budget & reporting service.
 *
 * Budgets are monthly targets keyed by (account, period). Reports
 * compare them with the account's actual movement in that month.
 *
 * Rules:
 * - One budget per (account, period); setting it again replaces it
 * - Copying forward never overwrites a budget already in the target
 * - Actual = net movement in the account's normal direction over
 *   postings dated inside the period (opening balance excluded)
 */

import type {
  AccountCategory,
  AccountId,
  Amount,
  AmountInput,
  Budget,
  Result,
  YearMonth,
} from "@pocketbook/types";
import type { AccountService } from "./accounts.js";
import { normalMovement } from "./balance-calculator.js";
import { writeCsv } from "./csv.js";
import { compareAmounts, isZeroAmount, percentOf, subtractAmounts } from "./money-math.js";
import { periodRange } from "./period.js";
import { LedgerService } from "./service.js";
import type { LedgerStore } from "./store.js";
import type {
  BudgetVsActualReport,
  BudgetVsActualRow,
  CopyForwardResult,
  LedgerOptions,
  PctOfBudget,
} from "./types.js";
import { LedgerError } from "./types.js";
import { expectValid, validateNonNegativeAmount, validatePeriod } from "./validation.js";

export const BUDGET_REPORT_CSV_FIELDS = [
  "category",
  "budgeted",
  "actual",
  "variance",
  "pct_of_budget",
] as const;

/**
 * A budget with its account resolved.
 */
export interface BudgetLine extends Budget {
  readonly name: string;
  readonly category: AccountCategory;
}

function byName(a: { readonly name: string }, b: { readonly name: string }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function formatPctOfBudget(pct: PctOfBudget): string {
  return pct.kind === "percent" ? pct.value.toFixed(2) : "n/a";
}

export class BudgetService extends LedgerService {
  private readonly _accounts: AccountService;

  constructor(store: LedgerStore, accounts: AccountService, options?: LedgerOptions) {
    super(store, options);
    this._accounts = accounts;
  }

  // ─── Budgets ─────────────────────────────────────────────────────────

  setBudget(accountId: AccountId, period: YearMonth, amount: AmountInput): Result<Budget> {
    return this.mutate("setBudget", () => {
      const account = this._accounts.requireAccount(accountId);
      const budget: Budget = {
        accountId: account.id,
        period: expectValid(validatePeriod(period)),
        amount: expectValid(validateNonNegativeAmount(amount, this.decimals), "InvalidAmount"),
      };
      this.store.upsertBudget(budget);
      return budget;
    });
  }

  /** Budgets of one month, ordered by account name. */
  getBudgets(period: YearMonth): Result<readonly BudgetLine[]> {
    return this.query(() => this._lines(expectValid(validatePeriod(period))));
  }

  /**
   * Copy every budget of `fromPeriod` into `toPeriod`, keeping any
   * budget the target month already has.
   */
  copyBudgetForward(fromPeriod: YearMonth, toPeriod: YearMonth): Result<CopyForwardResult> {
    return this.mutate("copyBudgetForward", () => {
      const from = expectValid(validatePeriod(fromPeriod));
      const to = expectValid(validatePeriod(toPeriod));
      if (from === to) {
        throw new LedgerError("InvalidInput", `Cannot copy budgets of ${from} onto itself`);
      }

      let copied = 0;
      let kept = 0;
      for (const budget of this.store.listBudgets(from)) {
        if (this.store.insertBudgetIfAbsent({ ...budget, period: to })) {
          copied++;
        } else {
          kept++;
        }
      }
      return { copied, kept };
    });
  }

  // ─── Reports ─────────────────────────────────────────────────────────

  /**
   * Budget against actual for every budgeted account in the month.
   * Rows are ordered by variance ascending, so the largest overspend
   * comes first; ties fall back to the account name.
   */
  budgetVsActual(period: YearMonth): Result<BudgetVsActualReport> {
    return this.query(() => {
      const month = expectValid(validatePeriod(period));
      return { period: month, rows: this._report(month) };
    });
  }

  /** The budget-vs-actual rows as CSV. */
  budgetReportCsv(period: YearMonth): Result<string> {
    return this.query(() => {
      const rows = this._report(expectValid(validatePeriod(period)));
      return writeCsv(
        BUDGET_REPORT_CSV_FIELDS,
        rows.map((row) => [
          row.category,
          row.budgeted,
          row.actual,
          row.variance,
          formatPctOfBudget(row.pctOfBudget),
        ]),
      );
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _lines(period: YearMonth): BudgetLine[] {
    return this.store
      .listBudgets(period)
      .map((budget) => {
        const account = this._accounts.requireAccount(budget.accountId);
        return { ...budget, name: account.name, category: account.category };
      })
      .sort(byName);
  }

  private _report(period: YearMonth): BudgetVsActualRow[] {
    const range = periodRange(period);
    return this._lines(period)
      .map((line) => this._row(line, this._actual(line, range)))
      .sort((a, b) => {
        const byVariance = compareAmounts(a.variance, b.variance, this.decimals);
        if (byVariance !== 0) return byVariance;
        return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
      });
  }

  private _actual(line: BudgetLine, range: ReturnType<typeof periodRange>): Amount {
    const totals = this.store.postingTotals(line.accountId, range);
    return normalMovement(line.category, totals, this.decimals);
  }

  private _row(line: BudgetLine, actual: Amount): BudgetVsActualRow {
    const pctOfBudget: PctOfBudget = isZeroAmount(line.amount, this.decimals)
      ? { kind: "not_applicable" }
      : { kind: "percent", value: percentOf(actual, line.amount, this.decimals) };
    return {
      accountId: line.accountId,
      category: line.name,
      budgeted: line.amount,
      actual,
      variance: subtractAmounts(line.amount, actual, this.decimals),
      pctOfBudget,
    };
  }
}
