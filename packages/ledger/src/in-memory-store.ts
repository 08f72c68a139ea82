/**
 * @pocketbook/ledger — In-memory LedgerStore implementation.
 *
 * Stores rows in plain maps. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Properties:
 * - Constraint checks mirror the relational schema
 * - transaction() snapshots every table and restores it on throw
 * - Aggregates use bigint arithmetic
 */

import type {
  Account,
  AccountCategory,
  AccountId,
  Budget,
  PeriodLock,
  Transaction,
  TransactionId,
  YearMonth,
} from "@pocketbook/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  LedgerStore,
  NewAccount,
  NewTransaction,
  TransactionFilter,
  TransactionPatch,
} from "./store.js";
import { StoreError } from "./store.js";
import type { DateRange, PostingTotals } from "./types.js";

interface Tables {
  accounts: Map<AccountId, Account>;
  transactions: Map<TransactionId, Transaction>;
  budgets: Map<string, Budget>;
  locks: Map<YearMonth, PeriodLock>;
  nextAccountId: number;
  nextTransactionId: number;
}

function budgetKey(accountId: AccountId, period: YearMonth): string {
  return `${String(accountId)}::${period}`;
}

function inRange(date: string, range: DateRange | undefined): boolean {
  if (range?.from !== undefined && date < range.from) return false;
  if (range?.to !== undefined && date > range.to) return false;
  return true;
}

/**
 * In-memory ledger store.
 *
 * Maps iterate in insertion order, which for accounts and
 * transactions is also id order.
 */
export class InMemoryLedgerStore implements LedgerStore {
  readonly decimals: number;

  private _tables: Tables = {
    accounts: new Map(),
    transactions: new Map(),
    budgets: new Map(),
    locks: new Map(),
    nextAccountId: 1,
    nextTransactionId: 1,
  };

  constructor(options?: { readonly decimals?: number }) {
    this.decimals = options?.decimals ?? 2;
  }

  // ─── Unit of Work ───────────────────────────────────────────────────

  transaction<T>(fn: () => T): T {
    const saved: Tables = {
      accounts: new Map(this._tables.accounts),
      transactions: new Map(this._tables.transactions),
      budgets: new Map(this._tables.budgets),
      locks: new Map(this._tables.locks),
      nextAccountId: this._tables.nextAccountId,
      nextTransactionId: this._tables.nextTransactionId,
    };
    try {
      return fn();
    } catch (err: unknown) {
      this._tables = saved;
      throw err;
    }
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  insertAccount(account: NewAccount): Account {
    if (this.findAccount(account.name, account.category) !== undefined) {
      throw new StoreError(
        "UNIQUE_VIOLATION",
        `Account "${account.name}" (${account.category}) already exists`,
      );
    }
    const stored: Account = { id: this._tables.nextAccountId++, ...account };
    this._tables.accounts.set(stored.id, stored);
    return stored;
  }

  getAccount(id: AccountId): Account | undefined {
    return this._tables.accounts.get(id);
  }

  findAccount(name: string, category: AccountCategory): Account | undefined {
    for (const account of this._tables.accounts.values()) {
      if (account.name === name && account.category === category) {
        return account;
      }
    }
    return undefined;
  }

  listAccounts(category?: AccountCategory): readonly Account[] {
    const all = [...this._tables.accounts.values()];
    return category === undefined ? all : all.filter((a) => a.category === category);
  }

  updateOpeningBalance(id: AccountId, amount: string): void {
    const account = this._tables.accounts.get(id);
    if (account === undefined) {
      throw new StoreError("NOT_FOUND", `Unknown account: ${String(id)}`);
    }
    this._tables.accounts.set(id, { ...account, openingBalance: amount });
  }

  // ─── Transactions ───────────────────────────────────────────────────

  insertTransaction(transaction: NewTransaction): Transaction {
    this._assertAccounts(transaction.debitAccountId, transaction.creditAccountId);
    const stored: Transaction = {
      id: this._tables.nextTransactionId++,
      ...transaction,
      updatedAt: transaction.createdAt,
    };
    this._tables.transactions.set(stored.id, stored);
    return stored;
  }

  getTransaction(id: TransactionId): Transaction | undefined {
    return this._tables.transactions.get(id);
  }

  updateTransaction(id: TransactionId, patch: TransactionPatch): Transaction {
    const existing = this._tables.transactions.get(id);
    if (existing === undefined) {
      throw new StoreError("NOT_FOUND", `Unknown transaction: ${String(id)}`);
    }
    this._assertAccounts(patch.debitAccountId, patch.creditAccountId);
    const updated: Transaction = { ...existing, ...patch };
    this._tables.transactions.set(id, updated);
    return updated;
  }

  deleteTransaction(id: TransactionId): boolean {
    return this._tables.transactions.delete(id);
  }

  queryTransactions(filter?: TransactionFilter): readonly Transaction[] {
    const accountId = filter?.accountId;
    return [...this._tables.transactions.values()]
      .filter((t) => inRange(t.date, filter))
      .filter(
        (t) =>
          accountId === undefined ||
          t.debitAccountId === accountId ||
          t.creditAccountId === accountId,
      )
      .sort((a, b) => (a.date === b.date ? a.id - b.id : a.date < b.date ? -1 : 1));
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
    const sums = new Map<AccountId, { debits: bigint; credits: bigint }>();
    const bucket = (id: AccountId): { debits: bigint; credits: bigint } => {
      let entry = sums.get(id);
      if (entry === undefined) {
        entry = { debits: 0n, credits: 0n };
        sums.set(id, entry);
      }
      return entry;
    };

    for (const t of this._tables.transactions.values()) {
      if (!inRange(t.date, range)) continue;
      const amount = parseAmount(t.amount, this.decimals);
      bucket(t.debitAccountId).debits += amount;
      bucket(t.creditAccountId).credits += amount;
    }

    const totals = new Map<AccountId, PostingTotals>();
    for (const [id, sum] of sums) {
      totals.set(id, {
        debits: formatAmount(sum.debits, this.decimals),
        credits: formatAmount(sum.credits, this.decimals),
      });
    }
    return totals;
  }

  // ─── Budgets ────────────────────────────────────────────────────────

  upsertBudget(budget: Budget): void {
    this._assertAccounts(budget.accountId);
    this._tables.budgets.set(budgetKey(budget.accountId, budget.period), budget);
  }

  insertBudgetIfAbsent(budget: Budget): boolean {
    const key = budgetKey(budget.accountId, budget.period);
    if (this._tables.budgets.has(key)) {
      return false;
    }
    this.upsertBudget(budget);
    return true;
  }

  getBudget(accountId: AccountId, period: YearMonth): Budget | undefined {
    return this._tables.budgets.get(budgetKey(accountId, period));
  }

  listBudgets(period: YearMonth): readonly Budget[] {
    return [...this._tables.budgets.values()]
      .filter((b) => b.period === period)
      .sort((a, b) => a.accountId - b.accountId);
  }

  // ─── Period Locks ───────────────────────────────────────────────────

  insertPeriodLock(lock: PeriodLock): boolean {
    if (this._tables.locks.has(lock.period)) {
      return false;
    }
    this._tables.locks.set(lock.period, lock);
    return true;
  }

  deletePeriodLock(period: YearMonth): boolean {
    return this._tables.locks.delete(period);
  }

  getPeriodLock(period: YearMonth): PeriodLock | undefined {
    return this._tables.locks.get(period);
  }

  listPeriodLocks(): readonly PeriodLock[] {
    return [...this._tables.locks.values()].sort((a, b) =>
      a.period < b.period ? -1 : a.period > b.period ? 1 : 0,
    );
  }

  // ─── Private ────────────────────────────────────────────────────────

  private _assertAccounts(...ids: AccountId[]): void {
    for (const id of ids) {
      if (!this._tables.accounts.has(id)) {
        throw new StoreError(
          "FOREIGN_KEY_VIOLATION",
          `Referenced account does not exist: ${String(id)}`,
        );
      }
    }
  }
}
