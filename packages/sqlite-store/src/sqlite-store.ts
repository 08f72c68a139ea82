/**
 * @pocketbook/sqlite-store — SQLite-backed LedgerStore.
 *
 * Persists the ledger in a single SQLite file through better-sqlite3.
 * All access is synchronous; the store holds one connection for its
 * lifetime and is closed explicitly.
 *
 * Properties:
 * - Foreign keys are enforced (PRAGMA foreign_keys = ON)
 * - Integers are read as bigint, so minor-unit sums never lose precision
 * - transaction() nests through savepoints
 * - SQLite constraint failures surface as StoreError
 */

import Database from "better-sqlite3";
import type {
  Account,
  AccountCategory,
  AccountId,
  Amount,
  Budget,
  PeriodLock,
  Transaction,
  TransactionId,
  YearMonth,
} from "@pocketbook/types";
import { isAccountCategory } from "@pocketbook/types";
import { StoreError, formatAmount, parseAmount } from "@pocketbook/ledger";
import type {
  DateRange,
  LedgerStore,
  NewAccount,
  NewTransaction,
  PostingTotals,
  StoreErrorCode,
  TransactionFilter,
  TransactionPatch,
} from "@pocketbook/ledger";
import { bindDecimals, migrate } from "./schema.js";

// =============================================================================
// Rows
// =============================================================================

interface AccountRow {
  id: bigint;
  name: string;
  category: string;
  opening_balance: bigint;
  created_at: string;
}

interface TransactionRow {
  id: bigint;
  date: string;
  amount: bigint;
  debit_account_id: bigint;
  credit_account_id: bigint;
  notes: string;
  reversal_of: bigint | null;
  created_at: string;
  updated_at: string;
}

interface BudgetRow {
  account_id: bigint;
  period: string;
  amount: bigint;
}

interface PeriodLockRow {
  period: string;
  locked_at: string;
}

interface TotalsRow {
  account_id: bigint;
  debits: bigint;
  credits: bigint;
}

interface RangeParams {
  from: string | null;
  to: string | null;
}

const TRANSACTION_COLUMNS =
  "id, date, amount, debit_account_id, credit_account_id, notes, reversal_of, created_at, updated_at";

const CONSTRAINT_CODES: Readonly<Record<string, StoreErrorCode>> = {
  SQLITE_CONSTRAINT_UNIQUE: "UNIQUE_VIOLATION",
  SQLITE_CONSTRAINT_PRIMARYKEY: "UNIQUE_VIOLATION",
  SQLITE_CONSTRAINT_FOREIGNKEY: "FOREIGN_KEY_VIOLATION",
};

function rangeParams(range: DateRange | undefined): RangeParams {
  return { from: range?.from ?? null, to: range?.to ?? null };
}

// =============================================================================
// Store
// =============================================================================

export interface SqliteLedgerStoreOptions {
  /** Fractional digits of every amount. Default: 2. */
  readonly decimals?: number;
}

export class SqliteLedgerStore implements LedgerStore {
  readonly decimals: number;
  private readonly db: Database.Database;

  /**
   * Open (or create) a ledger file. ":memory:" gives a private
   * in-process database.
   */
  static open(filename: string, options?: SqliteLedgerStoreOptions): SqliteLedgerStore {
    return new SqliteLedgerStore(new Database(filename), options);
  }

  constructor(db: Database.Database, options?: SqliteLedgerStoreOptions) {
    this.db = db;
    this.decimals = options?.decimals ?? 2;
    this.db.pragma("foreign_keys = ON");
    this.db.defaultSafeIntegers(true);
    migrate(this.db);
    bindDecimals(this.db, this.decimals);
  }

  get rawDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  // ─── Unit of Work ───────────────────────────────────────────────────

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  insertAccount(account: NewAccount): Account {
    const row = this._write(() =>
      this.db
        .prepare<[string, string, bigint, string], AccountRow>(
          `INSERT INTO accounts (name, category, opening_balance, created_at)
           VALUES (?, ?, ?, ?)
           RETURNING id, name, category, opening_balance, created_at`,
        )
        .get(account.name, account.category, this._minor(account.openingBalance), account.createdAt),
    );
    return this._account(this._returned(row, "account"));
  }

  getAccount(id: AccountId): Account | undefined {
    const row = this.db
      .prepare<[bigint], AccountRow>(
        "SELECT id, name, category, opening_balance, created_at FROM accounts WHERE id = ?",
      )
      .get(BigInt(id));
    return row === undefined ? undefined : this._account(row);
  }

  findAccount(name: string, category: AccountCategory): Account | undefined {
    const row = this.db
      .prepare<[string, string], AccountRow>(
        `SELECT id, name, category, opening_balance, created_at FROM accounts
         WHERE name = ? AND category = ?`,
      )
      .get(name, category);
    return row === undefined ? undefined : this._account(row);
  }

  listAccounts(category?: AccountCategory): readonly Account[] {
    return this.db
      .prepare<{ category: string | null }, AccountRow>(
        `SELECT id, name, category, opening_balance, created_at FROM accounts
         WHERE @category IS NULL OR category = @category
         ORDER BY id`,
      )
      .all({ category: category ?? null })
      .map((row) => this._account(row));
  }

  updateOpeningBalance(id: AccountId, amount: Amount): void {
    const result = this.db
      .prepare<[bigint, bigint]>("UPDATE accounts SET opening_balance = ? WHERE id = ?")
      .run(this._minor(amount), BigInt(id));
    if (result.changes === 0) {
      throw new StoreError("NOT_FOUND", `Unknown account: ${String(id)}`);
    }
  }

  // ─── Transactions ───────────────────────────────────────────────────

  insertTransaction(transaction: NewTransaction): Transaction {
    const row = this._write(() =>
      this.db
        .prepare<
          [string, bigint, bigint, bigint, string, bigint | null, string, string],
          TransactionRow
        >(
          `INSERT INTO transactions
             (date, amount, debit_account_id, credit_account_id, notes, reversal_of, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           RETURNING ${TRANSACTION_COLUMNS}`,
        )
        .get(
          transaction.date,
          this._minor(transaction.amount),
          BigInt(transaction.debitAccountId),
          BigInt(transaction.creditAccountId),
          transaction.notes,
          transaction.reversalOf === null ? null : BigInt(transaction.reversalOf),
          transaction.createdAt,
          transaction.createdAt,
        ),
    );
    return this._transaction(this._returned(row, "transaction"));
  }

  getTransaction(id: TransactionId): Transaction | undefined {
    const row = this.db
      .prepare<[bigint], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`,
      )
      .get(BigInt(id));
    return row === undefined ? undefined : this._transaction(row);
  }

  updateTransaction(id: TransactionId, patch: TransactionPatch): Transaction {
    const row = this._write(() =>
      this.db
        .prepare<[string, bigint, bigint, bigint, string, string, bigint], TransactionRow>(
          `UPDATE transactions
           SET date = ?, amount = ?, debit_account_id = ?, credit_account_id = ?,
               notes = ?, updated_at = ?
           WHERE id = ?
           RETURNING ${TRANSACTION_COLUMNS}`,
        )
        .get(
          patch.date,
          this._minor(patch.amount),
          BigInt(patch.debitAccountId),
          BigInt(patch.creditAccountId),
          patch.notes,
          patch.updatedAt,
          BigInt(id),
        ),
    );
    if (row === undefined) {
      throw new StoreError("NOT_FOUND", `Unknown transaction: ${String(id)}`);
    }
    return this._transaction(row);
  }

  deleteTransaction(id: TransactionId): boolean {
    const result = this.db
      .prepare<[bigint]>("DELETE FROM transactions WHERE id = ?")
      .run(BigInt(id));
    return result.changes > 0;
  }

  queryTransactions(filter?: TransactionFilter): readonly Transaction[] {
    return this.db
      .prepare<RangeParams & { account: bigint | null }, TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions
         WHERE (@from IS NULL OR date >= @from)
           AND (@to IS NULL OR date <= @to)
           AND (@account IS NULL OR debit_account_id = @account OR credit_account_id = @account)
         ORDER BY date, id`,
      )
      .all({
        ...rangeParams(filter),
        account: filter?.accountId === undefined ? null : BigInt(filter.accountId),
      })
      .map((row) => this._transaction(row));
  }

  postingTotals(accountId: AccountId, range?: DateRange): PostingTotals {
    return (
      this.postingTotalsByAccount(range).get(accountId) ?? {
        debits: formatAmount(0n, this.decimals),
        credits: formatAmount(0n, this.decimals),
      }
    );
  }

  postingTotalsByAccount(range?: DateRange): ReadonlyMap<AccountId, PostingTotals> {
    const rows = this.db
      .prepare<RangeParams, TotalsRow>(
        `SELECT account_id, SUM(debit) AS debits, SUM(credit) AS credits
         FROM (
           SELECT debit_account_id AS account_id, amount AS debit, 0 AS credit, date
           FROM transactions
           UNION ALL
           SELECT credit_account_id AS account_id, 0 AS debit, amount AS credit, date
           FROM transactions
         )
         WHERE (@from IS NULL OR date >= @from) AND (@to IS NULL OR date <= @to)
         GROUP BY account_id`,
      )
      .all(rangeParams(range));

    const totals = new Map<AccountId, PostingTotals>();
    for (const row of rows) {
      totals.set(Number(row.account_id), {
        debits: formatAmount(row.debits, this.decimals),
        credits: formatAmount(row.credits, this.decimals),
      });
    }
    return totals;
  }

  // ─── Budgets ────────────────────────────────────────────────────────

  upsertBudget(budget: Budget): void {
    this._write(() =>
      this.db
        .prepare<[bigint, string, bigint]>(
          `INSERT INTO budgets (account_id, period, amount) VALUES (?, ?, ?)
           ON CONFLICT (account_id, period) DO UPDATE SET amount = excluded.amount`,
        )
        .run(BigInt(budget.accountId), budget.period, this._minor(budget.amount)),
    );
  }

  insertBudgetIfAbsent(budget: Budget): boolean {
    const result = this._write(() =>
      this.db
        .prepare<[bigint, string, bigint]>(
          `INSERT INTO budgets (account_id, period, amount) VALUES (?, ?, ?)
           ON CONFLICT (account_id, period) DO NOTHING`,
        )
        .run(BigInt(budget.accountId), budget.period, this._minor(budget.amount)),
    );
    return result.changes > 0;
  }

  getBudget(accountId: AccountId, period: YearMonth): Budget | undefined {
    const row = this.db
      .prepare<[bigint, string], BudgetRow>(
        "SELECT account_id, period, amount FROM budgets WHERE account_id = ? AND period = ?",
      )
      .get(BigInt(accountId), period);
    return row === undefined ? undefined : this._budget(row);
  }

  listBudgets(period: YearMonth): readonly Budget[] {
    return this.db
      .prepare<[string], BudgetRow>(
        "SELECT account_id, period, amount FROM budgets WHERE period = ? ORDER BY account_id",
      )
      .all(period)
      .map((row) => this._budget(row));
  }

  // ─── Period Locks ───────────────────────────────────────────────────

  insertPeriodLock(lock: PeriodLock): boolean {
    const result = this.db
      .prepare<[string, string]>(
        "INSERT INTO period_locks (period, locked_at) VALUES (?, ?) ON CONFLICT (period) DO NOTHING",
      )
      .run(lock.period, lock.lockedAt);
    return result.changes > 0;
  }

  deletePeriodLock(period: YearMonth): boolean {
    return (
      this.db.prepare<[string]>("DELETE FROM period_locks WHERE period = ?").run(period).changes > 0
    );
  }

  getPeriodLock(period: YearMonth): PeriodLock | undefined {
    const row = this.db
      .prepare<[string], PeriodLockRow>(
        "SELECT period, locked_at FROM period_locks WHERE period = ?",
      )
      .get(period);
    return row === undefined ? undefined : { period: row.period, lockedAt: row.locked_at };
  }

  listPeriodLocks(): readonly PeriodLock[] {
    return this.db
      .prepare<[], PeriodLockRow>("SELECT period, locked_at FROM period_locks ORDER BY period")
      .all()
      .map((row) => ({ period: row.period, lockedAt: row.locked_at }));
  }

  // ─── Private ────────────────────────────────────────────────────────

  /** Run a write, translating constraint failures into StoreError. */
  private _write<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof Database.SqliteError) {
        const code = CONSTRAINT_CODES[err.code];
        if (code !== undefined) {
          throw new StoreError(code, err.message);
        }
      }
      throw err;
    }
  }

  private _returned<T>(row: T | undefined, what: string): T {
    if (row === undefined) {
      throw new Error(`INSERT did not return the new ${what}`);
    }
    return row;
  }

  private _minor(amount: Amount): bigint {
    return parseAmount(amount, this.decimals);
  }

  private _account(row: AccountRow): Account {
    if (!isAccountCategory(row.category)) {
      throw new Error(`Account ${String(row.id)} has unknown category "${row.category}"`);
    }
    return {
      id: Number(row.id),
      name: row.name,
      category: row.category,
      openingBalance: formatAmount(row.opening_balance, this.decimals),
      createdAt: row.created_at,
    };
  }

  private _transaction(row: TransactionRow): Transaction {
    return {
      id: Number(row.id),
      date: row.date,
      amount: formatAmount(row.amount, this.decimals),
      debitAccountId: Number(row.debit_account_id),
      creditAccountId: Number(row.credit_account_id),
      notes: row.notes,
      reversalOf: row.reversal_of === null ? null : Number(row.reversal_of),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private _budget(row: BudgetRow): Budget {
    return {
      accountId: Number(row.account_id),
      period: row.period,
      amount: formatAmount(row.amount, this.decimals),
    };
  }
}
