/**
 * @pocketbook/ledger — Account service.
 *
 * Manages the chart of accounts: seeding, import, manual additions,
 * opening balances and balance computation.
 *
 * Rules:
 * - (name, category) is unique; re-adding a pair never duplicates it
 * - Accounts are never deleted
 * - Opening balances may be zero or negative; they are expressed in the
 *   account's normal direction and added unchanged to its movement
 */

import type {
  Account,
  AccountId,
  AmountInput,
  Result,
} from "@pocketbook/types";
import {
  computeAccountBalance,
  computeFinancialOverview,
  computeTrialBalance,
} from "./balance-calculator.js";
import type { ChartRow } from "./chart-import.js";
import {
  loadDefaultChart,
  parseChartCsv,
  parseChartJson,
  validateChartRow,
} from "./chart-import.js";
import { zeroAmount } from "./money-math.js";
import { LedgerService } from "./service.js";
import type {
  AccountBalance,
  AccountFilter,
  BalanceOptions,
  ChartRowInput,
  FinancialOverview,
  ImportResult,
  ImportRowError,
  SeedResult,
  TrialBalance,
} from "./types.js";
import { CATEGORY_ORDER, LedgerError } from "./types.js";
import {
  expectValid,
  validateAccountName,
  validateCategory,
  validateDate,
  validateId,
  validateSignedAmount,
} from "./validation.js";

function compareAccounts(a: Account, b: Account): number {
  const byCategory = CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category];
  if (byCategory !== 0) return byCategory;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export class AccountService extends LedgerService {
  // ─── Chart Lifecycle ─────────────────────────────────────────────────

  /**
   * Seed the built-in chart. Idempotent: pairs already present are
   * counted as existing and left alone.
   */
  initializeDefaultChart(): Result<SeedResult> {
    return this.mutate("initializeDefaultChart", () => {
      let added = 0;
      let existing = 0;
      for (const row of loadDefaultChart()) {
        if (this._insertIfAbsent(row)) {
          added++;
        } else {
          existing++;
        }
      }
      return { added, existing };
    });
  }

  /**
   * Import candidate rows. Each row is validated and written on its
   * own, so a bad row never aborts the batch and a storage fault
   * keeps the rows committed before it.
   *
   * Malformed rows and duplicates both count as skipped; only
   * malformed rows are listed in `errors`.
   */
  importChart(rows: readonly ChartRowInput[]): Result<ImportResult> {
    return this.mutate(
      "importChart",
      () => {
        let added = 0;
        let valid = 0;
        const errors: ImportRowError[] = [];

        rows.forEach((input, index) => {
          const verdict = validateChartRow(input);
          if (!verdict.valid) {
            errors.push({ row: index + 1, message: verdict.reason });
            return;
          }
          valid++;
          if (this.store.transaction(() => this._insertIfAbsent(verdict.value))) {
            added++;
          }
        });

        return {
          status: valid === 0 ? "empty" : "imported",
          added,
          skipped: rows.length - added,
          errors,
        };
      },
      false,
    );
  }

  /** Import a CSV document with header `name,type`. */
  importChartCsv(text: string): Result<ImportResult> {
    const rows = this.query(() => parseChartCsv(text));
    return rows.ok ? this.importChart(rows.value) : rows;
  }

  /** Import a JSON array of `{ name, type }` objects. */
  importChartJson(text: string): Result<ImportResult> {
    const rows = this.query(() => parseChartJson(text));
    return rows.ok ? this.importChart(rows.value) : rows;
  }

  /**
   * Add one account by hand.
   */
  addAccount(name: unknown, category: unknown): Result<Account> {
    return this.mutate("addAccount", () => {
      const row: ChartRow = {
        name: expectValid(validateAccountName(name)),
        category: expectValid(validateCategory(category)),
      };
      if (this.store.findAccount(row.name, row.category) !== undefined) {
        throw new LedgerError(
          "DuplicateAccount",
          `Account "${row.name}" (${row.category}) already exists`,
        );
      }
      return this._insert(row);
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getAccount(id: AccountId): Result<Account> {
    return this.query(() => this.requireAccount(id));
  }

  /**
   * Accounts ordered by category (asset, liability, equity, income,
   * expense) then by name.
   */
  listAccounts(filter?: AccountFilter): Result<readonly Account[]> {
    return this.query(() => {
      const category =
        filter?.category === undefined ? undefined : expectValid(validateCategory(filter.category));
      return [...this.store.listAccounts(category)].sort(compareAccounts);
    });
  }

  // ─── Balances ────────────────────────────────────────────────────────

  /**
   * Overwrite an account's opening balance.
   */
  setOpeningBalance(accountId: AccountId, amount: AmountInput): Result<Account> {
    return this.mutate("setOpeningBalance", () => {
      const account = this.requireAccount(accountId);
      const opening = expectValid(validateSignedAmount(amount, this.decimals), "InvalidAmount");
      this.store.updateOpeningBalance(account.id, opening);
      return { ...account, openingBalance: opening };
    });
  }

  /**
   * Balance in the account's normal direction:
   * asset/expense: opening + debits − credits;
   * liability/equity/income: opening + credits − debits.
   */
  getBalance(accountId: AccountId, options?: BalanceOptions): Result<AccountBalance> {
    return this.query(() => {
      const account = this.requireAccount(accountId);
      const asOf = options?.asOf === undefined ? undefined : expectValid(validateDate(options.asOf));
      const totals = this.store.postingTotals(account.id, { to: asOf });
      return computeAccountBalance(account, totals, this.decimals);
    });
  }

  /**
   * Total assets, total liabilities and net worth, each balance taken
   * with the same convention as getBalance.
   */
  financialOverview(options?: BalanceOptions): Result<FinancialOverview> {
    return this.query(() => {
      const asOf = options?.asOf === undefined ? undefined : expectValid(validateDate(options.asOf));
      return computeFinancialOverview(
        this.store.listAccounts(),
        this.store.postingTotalsByAccount({ to: asOf }),
        this.decimals,
      );
    });
  }

  /**
   * Trial balance over every posting in the ledger.
   */
  trialBalance(): Result<TrialBalance> {
    return this.query(() => {
      const accounts = [...this.store.listAccounts()].sort(compareAccounts);
      return computeTrialBalance(accounts, this.store.postingTotalsByAccount(), this.decimals);
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Resolve an account or throw. Used by the other services.
   */
  requireAccount(id: unknown): Account {
    const accountId = expectValid(validateId(id));
    const account = this.store.getAccount(accountId);
    if (account === undefined) {
      throw new LedgerError("NotFound", `Unknown account: ${String(accountId)}`);
    }
    return account;
  }

  private _insertIfAbsent(row: ChartRow): boolean {
    if (this.store.findAccount(row.name, row.category) !== undefined) {
      return false;
    }
    this._insert(row);
    return true;
  }

  private _insert(row: ChartRow): Account {
    return this.store.insertAccount({
      name: row.name,
      category: row.category,
      openingBalance: zeroAmount(this.decimals),
      createdAt: this.timestamp(),
    });
  }
}
