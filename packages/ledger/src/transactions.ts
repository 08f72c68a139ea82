/**
 * @pocketbook/ledger — Transaction service.
 *
 * Records double-entry postings: one amount, one debited account,
 * one credited account. A posting moves through
 * Draft → Posted → (Modified → Posted)* → Deleted.
 *
 * Rules (checked in this order when posting):
 * 1. Debit and credit accounts must differ
 * 2. Both accounts must exist
 * 3. Date must be a calendar date, amount strictly positive
 * 4. Expense accounts are never credited, income accounts never debited
 * 5. The date must fall in an open period
 *
 * Reversals are the correction path for locked periods: the original
 * may be locked, the reversing posting may not. Rule 4 does not apply
 * to a reversal, neither when it is posted nor when it is modified.
 * A transaction that has been reversed cannot be deleted while its
 * reversal exists.
 */

import { z } from "zod";
import type {
  Account,
  AccountId,
  Amount,
  DateString,
  PeriodLock,
  Result,
  Transaction,
  TransactionId,
  YearMonth,
} from "@pocketbook/types";
import type { AccountService } from "./accounts.js";
import { writeCsv } from "./csv.js";
import { periodOf } from "./period.js";
import { LedgerService } from "./service.js";
import type { LedgerStore } from "./store.js";
import type {
  LedgerOptions,
  ReversalInput,
  SearchQuery,
  TransactionInput,
} from "./types.js";
import { LedgerError } from "./types.js";
import {
  expectValid,
  validateDate,
  validateId,
  validatePeriod,
  validatePositiveAmount,
} from "./validation.js";

export const DEFAULT_SEARCH_LIMIT = 200;

export const TRANSACTION_CSV_FIELDS = [
  "date",
  "amount",
  "debit_account",
  "credit_account",
  "notes",
] as const;

/**
 * The closed set of fields a modification may carry. Values are
 * checked later against the merged record.
 */
const TransactionUpdateSchema = z
  .object({
    date: z.unknown(),
    amount: z.unknown(),
    debitAccountId: z.unknown(),
    creditAccountId: z.unknown(),
    notes: z.unknown(),
  })
  .partial()
  .strict();

/** Unchecked posting fields, as supplied or as merged for a modification. */
interface PostingCandidate {
  readonly date: unknown;
  readonly amount: unknown;
  readonly debitAccountId: unknown;
  readonly creditAccountId: unknown;
  readonly notes?: unknown;
}

interface ValidPosting {
  readonly date: DateString;
  readonly amount: Amount;
  readonly debit: Account;
  readonly credit: Account;
  readonly notes: string;
}

export class TransactionService extends LedgerService {
  private readonly _accounts: AccountService;
  private readonly _searchLimit: number;

  constructor(store: LedgerStore, accounts: AccountService, options?: LedgerOptions) {
    super(store, options);
    this._accounts = accounts;
    this._searchLimit = options?.searchLimit ?? DEFAULT_SEARCH_LIMIT;
  }

  // ─── Posting ─────────────────────────────────────────────────────────

  addTransaction(input: TransactionInput): Result<Transaction> {
    return this.mutate("addTransaction", () => {
      const posting = this._validatePosting(input);
      this._assertOpen(posting.date);
      return this.store.insertTransaction({
        date: posting.date,
        amount: posting.amount,
        debitAccountId: posting.debit.id,
        creditAccountId: posting.credit.id,
        notes: posting.notes,
        reversalOf: null,
        createdAt: this.timestamp(),
      });
    });
  }

  /**
   * Change whitelisted fields of a posting. The merged record must
   * pass the posting rules again, and neither the old nor the new
   * date may sit in a locked period. An empty update changes nothing.
   */
  modifyTransaction(id: TransactionId, fields: unknown): Result<Transaction> {
    return this.mutate("modifyTransaction", () => {
      const existing = this._requireTransaction(id);
      const update = this._parseUpdate(fields);
      this._assertOpen(existing.date);

      const changed = Object.values(update).some((value) => value !== undefined);
      if (!changed) {
        return existing;
      }

      const posting = this._validatePosting(
        {
          date: update.date ?? existing.date,
          amount: update.amount ?? existing.amount,
          debitAccountId: update.debitAccountId ?? existing.debitAccountId,
          creditAccountId: update.creditAccountId ?? existing.creditAccountId,
          notes: update.notes ?? existing.notes,
        },
        existing.reversalOf !== null,
      );
      this._assertOpen(posting.date);

      return this.store.updateTransaction(existing.id, {
        date: posting.date,
        amount: posting.amount,
        debitAccountId: posting.debit.id,
        creditAccountId: posting.credit.id,
        notes: posting.notes,
        updatedAt: this.timestamp(),
      });
    });
  }

  /**
   * Remove a posting from an open period. Returns the removed record.
   * A reversed posting stays until its reversal is deleted.
   */
  deleteTransaction(id: TransactionId): Result<Transaction> {
    return this.mutate("deleteTransaction", () => {
      const existing = this._requireTransaction(id);
      this._assertOpen(existing.date);

      const reversal = this._findReversal(existing);
      if (reversal !== undefined) {
        throw new LedgerError(
          "InvalidPosting",
          `Transaction ${String(existing.id)} was reversed by ${String(reversal.id)}; delete the reversal first`,
          { reversalId: reversal.id },
        );
      }

      this.store.deleteTransaction(existing.id);
      return existing;
    });
  }

  /**
   * Post the mirror image of an existing transaction: debit and credit
   * swapped, same amount. A transaction can be reversed once.
   */
  reverseTransaction(id: TransactionId, input: ReversalInput): Result<Transaction> {
    return this.mutate("reverseTransaction", () => {
      const original = this._requireTransaction(id);
      const date = expectValid(validateDate(input.date));
      const notes = this._validateNotes(input.notes ?? `Reversal of #${String(original.id)}`);

      const previous = this._findReversal(original);
      if (previous !== undefined) {
        throw new LedgerError(
          "InvalidPosting",
          `Transaction ${String(original.id)} was already reversed by ${String(previous.id)}`,
          { reversalId: previous.id },
        );
      }

      this._assertOpen(date);
      return this.store.insertTransaction({
        date,
        amount: original.amount,
        debitAccountId: original.creditAccountId,
        creditAccountId: original.debitAccountId,
        notes,
        reversalOf: original.id,
        createdAt: this.timestamp(),
      });
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getTransaction(id: TransactionId): Result<Transaction> {
    return this.query(() => this._requireTransaction(id));
  }

  /**
   * Postings matching every given criterion, ordered by date then by
   * insertion order.
   */
  searchTransactions(query?: SearchQuery): Result<readonly Transaction[]> {
    return this.query(() => this._search(query ?? {}, this._searchLimit));
  }

  /**
   * Search results as CSV with account names resolved. Unlike
   * searchTransactions, no page size applies unless one is given.
   */
  exportTransactionsCsv(query?: SearchQuery): Result<string> {
    return this.query(() => {
      const transactions = this._search(query ?? {}, undefined);
      const names = this._accountNames();
      return writeCsv(
        TRANSACTION_CSV_FIELDS,
        transactions.map((t) => [
          t.date,
          t.amount,
          names.get(t.debitAccountId) ?? "",
          names.get(t.creditAccountId) ?? "",
          t.notes,
        ]),
      );
    });
  }

  // ─── Period Locks ────────────────────────────────────────────────────

  /** Lock a month against changes. Locking twice keeps the first lock. */
  lockPeriod(period: YearMonth): Result<PeriodLock> {
    return this.mutate("lockPeriod", () => {
      const value = expectValid(validatePeriod(period));
      const lock: PeriodLock = { period: value, lockedAt: this.timestamp() };
      if (this.store.insertPeriodLock(lock)) {
        return lock;
      }
      return this.store.getPeriodLock(value) ?? lock;
    });
  }

  /** Reopen a month. Resolves to false if it was not locked. */
  unlockPeriod(period: YearMonth): Result<boolean> {
    return this.mutate("unlockPeriod", () =>
      this.store.deletePeriodLock(expectValid(validatePeriod(period))),
    );
  }

  isPeriodLocked(period: YearMonth): Result<boolean> {
    return this.query(
      () => this.store.getPeriodLock(expectValid(validatePeriod(period))) !== undefined,
    );
  }

  listLockedPeriods(): Result<readonly PeriodLock[]> {
    return this.query(() =>
      [...this.store.listPeriodLocks()].sort((a, b) => (a.period < b.period ? -1 : 1)),
    );
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _validatePosting(candidate: PostingCandidate, reversal = false): ValidPosting {
    if (candidate.debitAccountId === candidate.creditAccountId) {
      throw new LedgerError(
        "InvalidPosting",
        "Debit and credit accounts must be different",
        { accountId: candidate.debitAccountId },
      );
    }

    const debit = this._accounts.requireAccount(candidate.debitAccountId);
    const credit = this._accounts.requireAccount(candidate.creditAccountId);
    const date = expectValid(validateDate(candidate.date));
    const amount = expectValid(validatePositiveAmount(candidate.amount, this.decimals));
    const notes = this._validateNotes(candidate.notes);

    if (reversal) {
      return { date, amount, debit, credit, notes };
    }
    if (credit.category === "expense") {
      throw new LedgerError(
        "InvalidPosting",
        `Expense account "${credit.name}" cannot be credited`,
        { accountId: credit.id },
      );
    }
    if (debit.category === "income") {
      throw new LedgerError(
        "InvalidPosting",
        `Income account "${debit.name}" cannot be debited`,
        { accountId: debit.id },
      );
    }

    return { date, amount, debit, credit, notes };
  }

  private _validateNotes(notes: unknown): string {
    if (notes === undefined) return "";
    if (typeof notes !== "string") {
      throw new LedgerError("InvalidInput", "Notes must be a string");
    }
    return notes;
  }

  private _parseUpdate(fields: unknown): z.infer<typeof TransactionUpdateSchema> {
    const parsed = TransactionUpdateSchema.safeParse(fields);
    if (parsed.success) {
      return parsed.data;
    }
    const unknownKeys = parsed.error.issues.flatMap((issue) =>
      issue.code === "unrecognized_keys" ? issue.keys : [],
    );
    if (unknownKeys.length > 0) {
      throw new LedgerError(
        "InvalidField",
        `Fields cannot be modified: ${unknownKeys.join(", ")}`,
        { fields: unknownKeys },
      );
    }
    throw new LedgerError("InvalidInput", "Modification must be an object of fields");
  }

  private _assertOpen(date: DateString): void {
    const period = periodOf(date);
    if (this.store.getPeriodLock(period) !== undefined) {
      throw new LedgerError("PeriodLocked", `Period ${period} is locked`, { period });
    }
  }

  private _requireTransaction(id: unknown): Transaction {
    const transactionId = expectValid(validateId(id));
    const transaction = this.store.getTransaction(transactionId);
    if (transaction === undefined) {
      throw new LedgerError("NotFound", `Unknown transaction: ${String(transactionId)}`);
    }
    return transaction;
  }

  private _findReversal(original: Transaction): Transaction | undefined {
    return this.store.queryTransactions().find((t) => t.reversalOf === original.id);
  }

  private _accountNames(): ReadonlyMap<AccountId, string> {
    return new Map(this.store.listAccounts().map((a) => [a.id, a.name]));
  }

  private _search(query: SearchQuery, defaultLimit: number | undefined): readonly Transaction[] {
    const from = query.from === undefined ? undefined : expectValid(validateDate(query.from));
    const to = query.to === undefined ? undefined : expectValid(validateDate(query.to));
    const accountId =
      query.accountId === undefined ? undefined : this._accounts.requireAccount(query.accountId).id;
    const limit = query.limit ?? defaultLimit;
    const offset = query.offset ?? 0;

    if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 0)) {
      throw new LedgerError("InvalidInput", `Invalid limit "${String(limit)}"`);
    }
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new LedgerError("InvalidInput", `Invalid offset "${String(offset)}"`);
    }

    let matches = this.store.queryTransactions({ from, to, accountId });

    const needle = query.text?.trim().toLowerCase() ?? "";
    if (needle !== "") {
      const names = this._accountNames();
      const hit = (value: string | undefined): boolean =>
        value !== undefined && value.toLowerCase().includes(needle);
      matches = matches.filter(
        (t) =>
          hit(t.notes) || hit(names.get(t.debitAccountId)) || hit(names.get(t.creditAccountId)),
      );
    }

    return limit === undefined ? matches.slice(offset) : matches.slice(offset, offset + limit);
  }
}
