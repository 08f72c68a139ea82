/**
 * Tests for the command table and dispatcher, run against an
 * in-memory ledger with colour disabled.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Chalk } from "chalk";
import { InMemoryLedgerStore, createLedger } from "@pocketbook/ledger";
import type { Ledger } from "@pocketbook/ledger";
import { runCli } from "../src/cli.js";
import type { CommandContext } from "../src/commands.js";

const TS = "2025-10-01T09:00:00.000Z";

interface Harness {
  readonly ledger: Ledger;
  readonly out: string[];
  readonly err: string[];
  readonly written: Map<string, string>;
  run(...argv: string[]): number;
}

function createHarness(files: Readonly<Record<string, string>> = {}): Harness {
  const ledger = createLedger(new InMemoryLedgerStore(), { now: () => new Date(TS) });
  const out: string[] = [];
  const err: string[] = [];
  const written = new Map<string, string>();
  const ctx: CommandContext = {
    ledger,
    color: new Chalk({ level: 0 }),
    files: {
      read: (path) => {
        const text = files[path];
        if (text === undefined) throw new Error(`ENOENT: ${path}`);
        return text;
      },
      write: (path, text) => {
        written.set(path, text);
      },
    },
  };
  return {
    ledger,
    out,
    err,
    written,
    run: (...argv) => {
      out.length = 0;
      err.length = 0;
      return runCli(argv, ctx, { out: (line) => out.push(line), err: (line) => err.push(line) });
    },
  };
}

/** Cash (1, asset), Salary (2, income), Groceries (3, expense) and two postings. */
function createPostedHarness(): Harness {
  const h = createHarness();
  h.run("add-account", "Cash", "asset");
  h.run("add-account", "Salary", "income");
  h.run("add-account", "Groceries", "expense");
  h.run("post", "2025-10-01", "1000", "1", "2", "--notes", "October pay");
  h.run("post", "2025-10-03", "45.5", "3", "1", "--notes", "Market");
  return h;
}

// =============================================================================
// Dispatch
// =============================================================================

describe("dispatch", () => {
  it("prints help and succeeds", () => {
    const h = createHarness();
    expect(h.run("help")).toBe(0);
    expect(h.out[0]).toBe("Usage: pocketbook <command> [arguments] [options]");
    expect(h.out.some((line) => line.includes("trial-balance") && line.includes("Debit and credit totals per account"))).toBe(true);
  });

  it("shows help when no command is given", () => {
    const h = createHarness();
    expect(h.run()).toBe(0);
    expect(h.out[0]).toBe("Usage: pocketbook <command> [arguments] [options]");
  });

  it("rejects an unknown command", () => {
    const h = createHarness();
    expect(h.run("frobnicate")).toBe(1);
    expect(h.err).toEqual([
      'error: unknown command "frobnicate"',
      'Run "pocketbook help" for the list of commands.',
    ]);
  });

  it("does not treat inherited object keys as commands", () => {
    const h = createHarness();
    expect(h.run("constructor")).toBe(1);
    expect(h.err[0]).toBe('error: unknown command "constructor"');
  });

  it("rejects an unknown option", () => {
    const h = createHarness();
    expect(h.run("accounts", "--bogus")).toBe(1);
    expect(h.err[0]).toMatch(/^error: Unknown option '--bogus'/);
  });

  it("checks the number of arguments", () => {
    const h = createHarness();
    expect(h.run("add-account", "Cash")).toBe(1);
    expect(h.err).toEqual([
      "error: expected 2 argument(s), got 1",
      "Usage: pocketbook add-account <name> <category>",
    ]);
  });

  it("reports a domain failure with its kind", () => {
    const h = createHarness();
    h.run("add-account", "Cash", "asset");
    expect(h.run("add-account", "Cash", "asset")).toBe(1);
    expect(h.err).toEqual(['error: DuplicateAccount: Account "Cash" (asset) already exists']);
    expect(h.out).toEqual([]);
  });

  it("lets file faults propagate", () => {
    const h = createHarness();
    expect(() => h.run("import", "missing.csv")).toThrow("ENOENT: missing.csv");
  });
});

// =============================================================================
// Accounts
// =============================================================================

describe("account commands", () => {
  it("adds and lists accounts", () => {
    const h = createHarness();
    expect(h.run("add-account", "Cash", "asset")).toBe(0);
    expect(h.out).toEqual(["Added account #1 Cash (asset)"]);

    h.run("add-account", "Rent", "expense");
    expect(h.run("accounts", "--category", "asset")).toBe(0);
    expect(h.out).toEqual(["   1  asset      Cash"]);
  });

  it("rejects an unknown category filter", () => {
    const h = createHarness();
    expect(h.run("accounts", "--category", "cash")).toBe(1);
    expect(h.err).toEqual([
      'error: InvalidInput: Invalid account type "cash": expected asset, liability, equity, income or expense',
    ]);
  });

  it("seeds the default chart once", () => {
    const h = createHarness();
    h.run("init");
    expect(h.out).toEqual(["Added 50 accounts (0 already present)"]);
    h.run("init");
    expect(h.out).toEqual(["Added 0 accounts (50 already present)"]);
  });

  it("imports a CSV chart and lists rejected rows", () => {
    const h = createHarness({ "chart.csv": "name,type\nCash,asset\n,asset\nCash,asset\n" });
    expect(h.run("import", "chart.csv")).toBe(0);
    expect(h.out).toEqual([
      "Imported 1 accounts, skipped 2",
      "  row 2: Account name must not be empty",
    ]);
  });

  it("imports a JSON chart by extension", () => {
    const h = createHarness({ "chart.JSON": '[{"name":"Rent","type":"expense"}]' });
    h.run("import", "chart.JSON");
    expect(h.out).toEqual(["Imported 1 accounts, skipped 0"]);
  });

  it("reports a chart with no valid rows", () => {
    const h = createHarness({ "empty.csv": "name,type\n" });
    expect(h.run("import", "empty.csv")).toBe(0);
    expect(h.out).toEqual(["No valid accounts found"]);
  });

  it("sets an opening balance", () => {
    const h = createHarness();
    h.run("add-account", "Cash", "asset");
    expect(h.run("opening", "1", "250")).toBe(0);
    expect(h.out).toEqual(["Opening balance of Cash set to 250.00"]);
  });

  it("rejects a non-numeric account id", () => {
    const h = createHarness();
    expect(h.run("opening", "cash", "250")).toBe(1);
    expect(h.err).toEqual(['error: InvalidInput: Invalid identifier "NaN": expected a positive integer']);
  });
});

// =============================================================================
// Transactions
// =============================================================================

describe("transaction commands", () => {
  let h: Harness;

  beforeEach(() => {
    h = createPostedHarness();
  });

  it("shows balances", () => {
    expect(h.run("balance", "1")).toBe(0);
    expect(h.out).toEqual(["Cash (asset): 954.50", "  opening 0.00  debits 1000.00  credits 45.50"]);

    h.run("balance", "1", "--as-of", "2025-10-02");
    expect(h.out[0]).toBe("Cash (asset): 1000.00");
  });

  it("shows the dashboard", () => {
    expect(h.run("dashboard")).toBe(0);
    expect(h.out).toEqual([
      "Total assets              954.50",
      "Total liabilities           0.00",
      "Net worth                 954.50",
    ]);

    h.run("dashboard", "--as-of", "2025-10-02");
    expect(h.out[2]).toBe("Net worth                1000.00");
  });

  it("refuses to credit an expense account", () => {
    expect(h.run("post", "2025-10-05", "10", "1", "3")).toBe(1);
    expect(h.err).toEqual(['error: InvalidPosting: Expense account "Groceries" cannot be credited']);
  });

  it("searches by text", () => {
    expect(h.run("search", "--text", "market")).toBe(0);
    expect(h.out).toEqual(["#2      2025-10-03         45.50  Groceries <- Cash  Market"]);
  });

  it("pages search results", () => {
    h.run("search", "--limit", "1", "--offset", "1");
    expect(h.out).toEqual(["#2      2025-10-03         45.50  Groceries <- Cash  Market"]);
    h.run("search", "--account", "2");
    expect(h.out).toEqual(["#1      2025-10-01       1000.00  Cash <- Salary  October pay"]);
  });

  it("says when nothing matches", () => {
    h.run("search", "--from", "2025-11-01");
    expect(h.out).toEqual(["No transactions found"]);
  });

  it("modifies a transaction", () => {
    expect(h.run("modify", "2", "--amount", "50")).toBe(0);
    expect(h.out).toEqual(["Updated transaction #2"]);
    const updated = h.ledger.transactions.getTransaction(2);
    expect(updated.ok && updated.value.amount).toBe("50.00");
  });

  it("exports CSV to stdout or to a file", () => {
    h.run("export");
    expect(h.out).toEqual([
      "date,amount,debit_account,credit_account,notes",
      "2025-10-01,1000.00,Cash,Salary,October pay",
      "2025-10-03,45.50,Groceries,Cash,Market",
    ]);

    h.run("export", "--out", "tx.csv");
    expect(h.out).toEqual(["Exported 2 transactions to tx.csv"]);
    expect(h.written.get("tx.csv")).toBe(
      "date,amount,debit_account,credit_account,notes\n" +
        "2025-10-01,1000.00,Cash,Salary,October pay\n" +
        "2025-10-03,45.50,Groceries,Cash,Market\n",
    );
  });

  it("locks a period and corrects it by reversal", () => {
    expect(h.run("lock", "2025-10")).toBe(0);
    expect(h.out).toEqual([`Locked 2025-10 (since ${TS})`]);

    expect(h.run("delete", "1")).toBe(1);
    expect(h.err).toEqual(["error: PeriodLocked: Period 2025-10 is locked"]);

    expect(h.run("reverse", "1", "2025-11-01")).toBe(0);
    expect(h.out).toEqual(["Posted reversal #3 of #1"]);

    h.run("locks");
    expect(h.out).toEqual([`2025-10  locked ${TS}`]);

    h.run("unlock", "2025-10");
    expect(h.out).toEqual(["Unlocked 2025-10"]);
    h.run("unlock", "2025-10");
    expect(h.out).toEqual(["2025-10 was not locked"]);
    h.run("locks");
    expect(h.out).toEqual(["No locked periods"]);
  });

  it("deletes a transaction in an open period", () => {
    expect(h.run("delete", "2")).toBe(0);
    expect(h.out).toEqual(["Deleted transaction #2"]);
  });

  it("prints a balanced trial balance", () => {
    expect(h.run("trial-balance")).toBe(0);
    expect(h.out).toEqual([
      "Cash                            954.50          0.00",
      "Salary                            0.00       1000.00",
      "Groceries                        45.50          0.00",
      "Total                          1000.00       1000.00",
      "Balanced",
    ]);
  });
});

// =============================================================================
// Budgets
// =============================================================================

describe("budget commands", () => {
  let h: Harness;

  beforeEach(() => {
    h = createPostedHarness();
  });

  it("sets and lists budgets", () => {
    expect(h.run("budget", "3", "2025-10", "100")).toBe(0);
    expect(h.out).toEqual(["Budget for account #3 in 2025-10 set to 100.00"]);

    h.run("budgets", "2025-10");
    expect(h.out).toEqual(["Groceries                       100.00"]);

    h.run("budgets", "2025-12");
    expect(h.out).toEqual(["No budgets for 2025-12"]);
  });

  it("copies budgets forward", () => {
    h.run("budget", "3", "2025-10", "100");
    expect(h.run("copy-budget", "2025-10", "2025-11")).toBe(0);
    expect(h.out).toEqual(["Copied 1 budgets from 2025-10 to 2025-11 (0 kept)"]);
  });

  it("reports budget against actual as a table", () => {
    h.run("budget", "3", "2025-10", "40");
    expect(h.run("report", "2025-10")).toBe(0);
    expect(h.out).toEqual([
      "Category                      Budgeted        Actual      Variance        %",
      "Groceries                        40.00         45.50         -5.50   113.75",
    ]);
  });

  it("reports budget against actual as CSV", () => {
    h.run("budget", "3", "2025-10", "100");
    h.run("report", "2025-10", "--csv");
    expect(h.out).toEqual([
      "category,budgeted,actual,variance,pct_of_budget",
      "Groceries,100.00,45.50,54.50,45.50",
    ]);
  });

  it("rejects a malformed period", () => {
    expect(h.run("report", "2025-13")).toBe(1);
    expect(h.err[0]).toMatch(/^error: InvalidInput: /);
  });
});
