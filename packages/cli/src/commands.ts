/**
 * @pocketbook/cli — Command table.
 *
 * Each command is a function of the ledger services and its parsed
 * arguments that returns the lines to print, inside the same Result
 * envelope the services use. Nothing here touches process state, so
 * commands run unchanged against an in-memory ledger in tests.
 */

import type { ChalkInstance } from "chalk";
import type { AccountId, Result, Transaction } from "@pocketbook/types";
import { success } from "@pocketbook/types";
import { formatPctOfBudget } from "@pocketbook/ledger";
import type { Ledger, SearchQuery } from "@pocketbook/ledger";

// =============================================================================
// Types
// =============================================================================

export interface FileAccess {
  read(path: string): string;
  write(path: string, text: string): void;
}

export interface CommandContext {
  readonly ledger: Ledger;
  readonly color: ChalkInstance;
  readonly files: FileAccess;
}

/**
 * Flags shared by every command. Values stay strings until a service
 * validates them.
 */
export const OPTIONS = {
  category: { type: "string" },
  "as-of": { type: "string" },
  notes: { type: "string" },
  date: { type: "string" },
  amount: { type: "string" },
  debit: { type: "string" },
  credit: { type: "string" },
  text: { type: "string" },
  from: { type: "string" },
  to: { type: "string" },
  account: { type: "string" },
  limit: { type: "string" },
  offset: { type: "string" },
  out: { type: "string" },
  csv: { type: "boolean" },
} as const;

type StringFlag = {
  [K in keyof typeof OPTIONS]: (typeof OPTIONS)[K]["type"] extends "string" ? K : never;
}[keyof typeof OPTIONS];

export type Flags = { readonly [K in StringFlag]?: string | undefined } & {
  readonly csv?: boolean | undefined;
};

type Lines = readonly string[];

export interface Command {
  readonly usage: string;
  readonly summary: string;
  readonly arity: number;
  run(ctx: CommandContext, args: readonly string[], flags: Flags): Result<Lines>;
}

// =============================================================================
// Helpers
// =============================================================================

function render<T>(result: Result<T>, fn: (value: T) => Lines): Result<Lines> {
  return result.ok ? success(fn(result.value)) : result;
}

/** Parse an id argument. Malformed text becomes NaN and fails validation downstream. */
function id(text: string | undefined): AccountId {
  return text === undefined || text.trim() === "" ? Number.NaN : Number(text);
}

function optionalNumber(text: string | undefined): number | undefined {
  return text === undefined ? undefined : Number(text);
}

function searchQuery(flags: Flags): SearchQuery {
  return {
    text: flags.text,
    from: flags.from,
    to: flags.to,
    accountId: flags.account === undefined ? undefined : id(flags.account),
    limit: optionalNumber(flags.limit),
    offset: optionalNumber(flags.offset),
  };
}

function accountNames(ctx: CommandContext): Result<ReadonlyMap<AccountId, string>> {
  const accounts = ctx.ledger.accounts.listAccounts();
  return accounts.ok ? success(new Map(accounts.value.map((a) => [a.id, a.name]))) : accounts;
}

function transactionLine(t: Transaction, names: ReadonlyMap<AccountId, string>): string {
  const debit = names.get(t.debitAccountId) ?? `#${String(t.debitAccountId)}`;
  const credit = names.get(t.creditAccountId) ?? `#${String(t.creditAccountId)}`;
  const columns = [
    `#${String(t.id)}`.padEnd(6),
    t.date,
    t.amount.padStart(12),
    `${debit} <- ${credit}`,
  ];
  if (t.notes !== "") columns.push(t.notes);
  return columns.join("  ");
}

function pathExtension(path: string): string {
  const dot = path.lastIndexOf(".");
  return dot === -1 ? "" : path.slice(dot + 1).toLowerCase();
}

// =============================================================================
// Commands
// =============================================================================

export const COMMANDS: Readonly<Record<string, Command>> = {
  init: {
    usage: "init",
    summary: "Seed the built-in chart of accounts",
    arity: 0,
    run: (ctx) =>
      render(ctx.ledger.accounts.initializeDefaultChart(), (r) => [
        `Added ${String(r.added)} accounts (${String(r.existing)} already present)`,
      ]),
  },

  accounts: {
    usage: "accounts [--category c]",
    summary: "List the chart of accounts",
    arity: 0,
    run: (ctx, _args, flags) =>
      render(
        ctx.ledger.accounts.listAccounts(
          flags.category === undefined ? undefined : { category: flags.category },
        ),
        (accounts) =>
          accounts.map(
            (a) => `${String(a.id).padStart(4)}  ${a.category.padEnd(9)}  ${a.name}`,
          ),
      ),
  },

  "add-account": {
    usage: "add-account <name> <category>",
    summary: "Add one account",
    arity: 2,
    run: (ctx, [name, category]) =>
      render(ctx.ledger.accounts.addAccount(name, category), (a) => [
        `Added account #${String(a.id)} ${a.name} (${a.category})`,
      ]),
  },

  import: {
    usage: "import <file.csv|file.json>",
    summary: "Import accounts from a CSV (name,type) or JSON file",
    arity: 1,
    run: (ctx, [path = ""]) => {
      const text = ctx.files.read(path);
      const result =
        pathExtension(path) === "json"
          ? ctx.ledger.accounts.importChartJson(text)
          : ctx.ledger.accounts.importChartCsv(text);
      return render(result, (r) => [
        r.status === "empty"
          ? ctx.color.yellow("No valid accounts found")
          : `Imported ${String(r.added)} accounts, skipped ${String(r.skipped)}`,
        ...r.errors.map((e) => ctx.color.yellow(`  row ${String(e.row)}: ${e.message}`)),
      ]);
    },
  },

  opening: {
    usage: "opening <accountId> <amount>",
    summary: "Set an account's opening balance",
    arity: 2,
    run: (ctx, [accountId, amount = ""]) =>
      render(ctx.ledger.accounts.setOpeningBalance(id(accountId), amount), (a) => [
        `Opening balance of ${a.name} set to ${a.openingBalance}`,
      ]),
  },

  balance: {
    usage: "balance <accountId> [--as-of date]",
    summary: "Show an account's balance",
    arity: 1,
    run: (ctx, [accountId], flags) =>
      render(ctx.ledger.accounts.getBalance(id(accountId), { asOf: flags["as-of"] }), (b) => [
        `${ctx.color.bold(b.name)} (${b.category}): ${b.balance}`,
        `  opening ${b.openingBalance}  debits ${b.totalDebits}  credits ${b.totalCredits}`,
      ]),
  },

  dashboard: {
    usage: "dashboard [--as-of date]",
    summary: "Total assets, total liabilities and net worth",
    arity: 0,
    run: (ctx, _args, flags) =>
      render(ctx.ledger.accounts.financialOverview({ asOf: flags["as-of"] }), (o) => {
        const netWorth = o.netWorth.padStart(14);
        return [
          `${"Total assets".padEnd(18)}${o.totalAssets.padStart(14)}`,
          `${"Total liabilities".padEnd(18)}${o.totalLiabilities.padStart(14)}`,
          `${ctx.color.bold("Net worth".padEnd(18))}${o.netWorth.startsWith("-") ? ctx.color.red(netWorth) : netWorth}`,
        ];
      }),
  },

  post: {
    usage: "post <date> <amount> <debitId> <creditId> [--notes t]",
    summary: "Record a transaction",
    arity: 4,
    run: (ctx, [date = "", amount = "", debit, credit], flags) =>
      render(
        ctx.ledger.transactions.addTransaction({
          date,
          amount,
          debitAccountId: id(debit),
          creditAccountId: id(credit),
          notes: flags.notes,
        }),
        (t) => [`Posted transaction #${String(t.id)}`],
      ),
  },

  modify: {
    usage: "modify <id> [--date d] [--amount a] [--debit id] [--credit id] [--notes t]",
    summary: "Change fields of a transaction",
    arity: 1,
    run: (ctx, [transactionId], flags) => {
      const fields: Record<string, unknown> = {};
      if (flags.date !== undefined) fields["date"] = flags.date;
      if (flags.amount !== undefined) fields["amount"] = flags.amount;
      if (flags.debit !== undefined) fields["debitAccountId"] = id(flags.debit);
      if (flags.credit !== undefined) fields["creditAccountId"] = id(flags.credit);
      if (flags.notes !== undefined) fields["notes"] = flags.notes;
      return render(ctx.ledger.transactions.modifyTransaction(id(transactionId), fields), (t) => [
        `Updated transaction #${String(t.id)}`,
      ]);
    },
  },

  delete: {
    usage: "delete <id>",
    summary: "Delete a transaction",
    arity: 1,
    run: (ctx, [transactionId]) =>
      render(ctx.ledger.transactions.deleteTransaction(id(transactionId)), (t) => [
        `Deleted transaction #${String(t.id)}`,
      ]),
  },

  reverse: {
    usage: "reverse <id> <date> [--notes t]",
    summary: "Post the reversal of a transaction",
    arity: 2,
    run: (ctx, [transactionId, date = ""], flags) =>
      render(
        ctx.ledger.transactions.reverseTransaction(id(transactionId), { date, notes: flags.notes }),
        (t) => [`Posted reversal #${String(t.id)} of #${String(t.reversalOf)}`],
      ),
  },

  search: {
    usage: "search [--text t] [--from d] [--to d] [--account id] [--limit n] [--offset n]",
    summary: "Find transactions",
    arity: 0,
    run: (ctx, _args, flags) => {
      const names = accountNames(ctx);
      if (!names.ok) return names;
      return render(ctx.ledger.transactions.searchTransactions(searchQuery(flags)), (found) =>
        found.length === 0
          ? ["No transactions found"]
          : found.map((t) => transactionLine(t, names.value)),
      );
    },
  },

  export: {
    usage: "export [--out file] [search flags]",
    summary: "Export transactions as CSV",
    arity: 0,
    run: (ctx, _args, flags) =>
      render(ctx.ledger.transactions.exportTransactionsCsv(searchQuery(flags)), (csv) => {
        if (flags.out === undefined) {
          return csv.split("\n");
        }
        ctx.files.write(flags.out, `${csv}\n`);
        return [`Exported ${String(csv.split("\n").length - 1)} transactions to ${flags.out}`];
      }),
  },

  lock: {
    usage: "lock <YYYY-MM>",
    summary: "Lock a month against changes",
    arity: 1,
    run: (ctx, [period = ""]) =>
      render(ctx.ledger.transactions.lockPeriod(period), (lock) => [
        `Locked ${lock.period} (since ${lock.lockedAt})`,
      ]),
  },

  unlock: {
    usage: "unlock <YYYY-MM>",
    summary: "Reopen a locked month",
    arity: 1,
    run: (ctx, [period = ""]) =>
      render(ctx.ledger.transactions.unlockPeriod(period), (wasLocked) => [
        wasLocked ? `Unlocked ${period}` : `${period} was not locked`,
      ]),
  },

  locks: {
    usage: "locks",
    summary: "List locked months",
    arity: 0,
    run: (ctx) =>
      render(ctx.ledger.transactions.listLockedPeriods(), (locks) =>
        locks.length === 0
          ? ["No locked periods"]
          : locks.map((l) => `${l.period}  locked ${l.lockedAt}`),
      ),
  },

  budget: {
    usage: "budget <accountId> <YYYY-MM> <amount>",
    summary: "Set a monthly budget",
    arity: 3,
    run: (ctx, [accountId, period = "", amount = ""]) =>
      render(ctx.ledger.budgets.setBudget(id(accountId), period, amount), (b) => [
        `Budget for account #${String(b.accountId)} in ${b.period} set to ${b.amount}`,
      ]),
  },

  budgets: {
    usage: "budgets <YYYY-MM>",
    summary: "List the budgets of a month",
    arity: 1,
    run: (ctx, [period = ""]) =>
      render(ctx.ledger.budgets.getBudgets(period), (lines) =>
        lines.length === 0
          ? [`No budgets for ${period}`]
          : lines.map((b) => `${b.name.padEnd(24)}  ${b.amount.padStart(12)}`),
      ),
  },

  "copy-budget": {
    usage: "copy-budget <from> <to>",
    summary: "Copy a month's budgets forward, keeping existing ones",
    arity: 2,
    run: (ctx, [from = "", to = ""]) =>
      render(ctx.ledger.budgets.copyBudgetForward(from, to), (r) => [
        `Copied ${String(r.copied)} budgets from ${from} to ${to} (${String(r.kept)} kept)`,
      ]),
  },

  report: {
    usage: "report <YYYY-MM> [--csv]",
    summary: "Budget against actual for a month",
    arity: 1,
    run: (ctx, [period = ""], flags) => {
      if (flags.csv === true) {
        return render(ctx.ledger.budgets.budgetReportCsv(period), (csv) => csv.split("\n"));
      }
      return render(ctx.ledger.budgets.budgetVsActual(period), (report) => [
        ctx.color.bold(
          `${"Category".padEnd(24)}  ${"Budgeted".padStart(12)}  ${"Actual".padStart(12)}  ${"Variance".padStart(12)}  ${"%".padStart(7)}`,
        ),
        ...report.rows.map((row) => {
          const variance = row.variance.padStart(12);
          return [
            row.category.padEnd(24),
            row.budgeted.padStart(12),
            row.actual.padStart(12),
            row.variance.startsWith("-") ? ctx.color.red(variance) : variance,
            formatPctOfBudget(row.pctOfBudget).padStart(7),
          ].join("  ");
        }),
      ]);
    },
  },

  "trial-balance": {
    usage: "trial-balance",
    summary: "Debit and credit totals per account",
    arity: 0,
    run: (ctx) =>
      render(ctx.ledger.accounts.trialBalance(), (trial) => [
        ...trial.lines.map(
          (l) => `${l.name.padEnd(24)}  ${l.debitBalance.padStart(12)}  ${l.creditBalance.padStart(12)}`,
        ),
        ctx.color.bold(
          `${"Total".padEnd(24)}  ${trial.totalDebits.padStart(12)}  ${trial.totalCredits.padStart(12)}`,
        ),
        trial.balanced ? ctx.color.green("Balanced") : ctx.color.red("Out of balance"),
      ]),
  },
};
