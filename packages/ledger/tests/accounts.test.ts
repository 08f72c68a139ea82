/**
 * Tests for the account service.
 *
 * Covers:
 * - Default chart seeding (idempotent)
 * - Batch import with per-row errors
 * - CSV and JSON chart documents
 * - Manual additions and listing order
 * - Opening balances and balance computation
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ChartRowInput } from "../src/types.js";
import type { TestBook } from "./fixtures.js";
import { createTestBook, expectFailure, TS, unwrap } from "./fixtures.js";

describe("AccountService", () => {
  let book: TestBook;

  beforeEach(() => {
    book = createTestBook();
  });

  // ─── Default chart ───────────────────────────────────────────────────

  describe("initializeDefaultChart", () => {
    it("seeds the built-in chart", () => {
      expect(unwrap(book.ledger.accounts.initializeDefaultChart())).toEqual({ added: 50, existing: 0 });
      const expenses = unwrap(book.ledger.accounts.listAccounts({ category: "expense" }));
      expect(expenses).toHaveLength(17);
      expect(expenses.map((a) => a.name)).toContain("Groceries");
    });

    it("is idempotent", () => {
      unwrap(book.ledger.accounts.initializeDefaultChart());
      expect(unwrap(book.ledger.accounts.initializeDefaultChart())).toEqual({ added: 0, existing: 50 });
      expect(unwrap(book.ledger.accounts.listAccounts())).toHaveLength(50);
    });

    it("keeps accounts added by hand", () => {
      book.account("Groceries", "expense");
      expect(unwrap(book.ledger.accounts.initializeDefaultChart())).toEqual({ added: 49, existing: 1 });
    });
  });

  // ─── Import ──────────────────────────────────────────────────────────

  describe("importChart", () => {
    const rows: ChartRowInput[] = [
      { name: "Cash", type: "asset" },
      { name: "Checking Account", type: "Asset" },
      { name: "", type: "asset" },
      { name: "Credit Card", type: "liability" },
      { name: "Salary", type: "income" },
      { name: "Groceries", type: "expense" },
      { name: "Pet Care", type: "savings" },
      { name: "Rent", type: " EXPENSE " },
    ];

    it("adds the good rows and reports the malformed ones", () => {
      expect(unwrap(book.ledger.accounts.importChart(rows))).toEqual({
        status: "imported",
        added: 6,
        skipped: 2,
        errors: [
          { row: 3, message: "Account name must not be empty" },
          {
            row: 7,
            message:
              'Invalid account type "savings": expected asset, liability, equity, income or expense',
          },
        ],
      });
      expect(unwrap(book.ledger.accounts.listAccounts({ category: "expense" })).map((a) => a.name)).toEqual([
        "Groceries",
        "Rent",
      ]);
    });

    it("counts duplicates as skipped without an error", () => {
      book.account("Cash", "asset");
      const result = unwrap(
        book.ledger.accounts.importChart([
          { name: "Cash", type: "asset" },
          { name: "Rent", type: "expense" },
          { name: "Rent", type: "expense" },
        ]),
      );
      expect(result).toEqual({ status: "imported", added: 1, skipped: 2, errors: [] });
    });

    it("reports an input without valid rows as empty", () => {
      const result = unwrap(book.ledger.accounts.importChart([{ name: 7, type: "asset" }]));
      expect(result).toEqual({
        status: "empty",
        added: 0,
        skipped: 1,
        errors: [{ row: 1, message: "Account name must be a string" }],
      });
    });

    it("logs one mutation for the batch", () => {
      unwrap(book.ledger.accounts.importChart(rows));
      expect(book.log).toHaveLength(1);
      expect(book.log[0]).toMatchObject({ operation: "importChart", ok: true });
    });
  });

  describe("importChartCsv", () => {
    it("imports rows under a case-insensitive header", () => {
      const result = unwrap(
        book.ledger.accounts.importChartCsv("Name,Type\nCash,Asset\nRent, expense \n\n"),
      );
      expect(result).toEqual({ status: "imported", added: 2, skipped: 0, errors: [] });
      expect(unwrap(book.ledger.accounts.listAccounts()).map((a) => [a.name, a.category])).toEqual([
        ["Cash", "asset"],
        ["Rent", "expense"],
      ]);
    });

    it("reports rows with a missing type", () => {
      const result = unwrap(book.ledger.accounts.importChartCsv("name,type\nCash,asset\nRent\n"));
      expect(result.added).toBe(1);
      expect(result.errors).toEqual([{ row: 2, message: "Account type must be a string" }]);
    });

    it("reports an empty file as having no valid accounts", () => {
      expect(unwrap(book.ledger.accounts.importChartCsv(""))).toEqual({
        status: "empty",
        added: 0,
        skipped: 0,
        errors: [],
      });
    });

    it("rejects a document without the header", () => {
      const message = expectFailure(
        book.ledger.accounts.importChartCsv("account,kind\nCash,asset\n"),
        "InvalidInput",
      );
      expect(message).toBe('CSV header must contain "name" and "type", got: account,kind');
    });
  });

  describe("importChartJson", () => {
    it("imports an array of objects", () => {
      const result = unwrap(
        book.ledger.accounts.importChartJson('[{"name":"Cash","type":"asset"}, 5, {"name":"Rent"}]'),
      );
      expect(result).toEqual({
        status: "imported",
        added: 1,
        skipped: 2,
        errors: [
          { row: 2, message: "Account name must be a string" },
          { row: 3, message: "Account type must be a string" },
        ],
      });
    });

    it("rejects a document that is not an array", () => {
      expectFailure(book.ledger.accounts.importChartJson('{"name":"Cash"}'), "InvalidInput");
    });

    it("rejects malformed JSON", () => {
      const message = expectFailure(book.ledger.accounts.importChartJson("[{"), "InvalidInput");
      expect(message).toBe("Chart file is not valid JSON");
    });
  });

  // ─── Manual accounts ─────────────────────────────────────────────────

  describe("addAccount", () => {
    it("returns the stored account", () => {
      expect(unwrap(book.ledger.accounts.addAccount(" Cash ", "Asset"))).toEqual({
        id: 1,
        name: "Cash",
        category: "asset",
        openingBalance: "0.00",
        createdAt: TS,
      });
    });

    it("rejects a duplicate pair", () => {
      book.account("Cash", "asset");
      const message = expectFailure(book.ledger.accounts.addAccount("Cash", "asset"), "DuplicateAccount");
      expect(message).toBe('Account "Cash" (asset) already exists');
    });

    it("rejects bad input", () => {
      expectFailure(book.ledger.accounts.addAccount("", "asset"), "InvalidInput");
      expectFailure(book.ledger.accounts.addAccount("Cash", "savings"), "InvalidInput");
    });

    it("logs failures with their kind", () => {
      book.ledger.accounts.addAccount("Cash", "savings");
      expect(book.log).toEqual([
        expect.objectContaining({ operation: "addAccount", ok: false, errorKind: "InvalidInput" }),
      ]);
    });
  });

  describe("getAccount", () => {
    it("finds an account by id", () => {
      const cash = book.account("Cash", "asset");
      expect(unwrap(book.ledger.accounts.getAccount(cash.id))).toEqual(cash);
    });

    it("reports unknown ids", () => {
      expect(expectFailure(book.ledger.accounts.getAccount(42), "NotFound")).toBe("Unknown account: 42");
    });

    it("reports malformed ids as invalid input", () => {
      expectFailure(book.ledger.accounts.getAccount(-1), "InvalidInput");
    });
  });

  describe("listAccounts", () => {
    beforeEach(() => {
      book.account("Rent", "expense");
      book.account("Cash", "asset");
      book.account("Salary", "income");
      book.account("Credit Card", "liability");
      book.account("Bank", "asset");
      book.account("Opening Balance Equity", "equity");
    });

    it("orders by category, then name", () => {
      expect(unwrap(book.ledger.accounts.listAccounts()).map((a) => a.name)).toEqual([
        "Bank",
        "Cash",
        "Credit Card",
        "Opening Balance Equity",
        "Salary",
        "Rent",
      ]);
    });

    it("filters by category", () => {
      expect(unwrap(book.ledger.accounts.listAccounts({ category: "asset" })).map((a) => a.name)).toEqual([
        "Bank",
        "Cash",
      ]);
    });
  });

  // ─── Balances ────────────────────────────────────────────────────────

  describe("setOpeningBalance", () => {
    it("overwrites the opening balance", () => {
      const cash = book.account("Cash", "asset");
      unwrap(book.ledger.accounts.setOpeningBalance(cash.id, "1000"));
      const updated = unwrap(book.ledger.accounts.setOpeningBalance(cash.id, 250.5));
      expect(updated.openingBalance).toBe("250.50");
      expect(unwrap(book.ledger.accounts.getAccount(cash.id)).openingBalance).toBe("250.50");
    });

    it("allows zero and negative values", () => {
      const card = book.account("Credit Card", "liability");
      expect(unwrap(book.ledger.accounts.setOpeningBalance(card.id, 0)).openingBalance).toBe("0.00");
      expect(unwrap(book.ledger.accounts.setOpeningBalance(card.id, "-20")).openingBalance).toBe("-20.00");
    });

    it("rejects malformed amounts", () => {
      const cash = book.account("Cash", "asset");
      expectFailure(book.ledger.accounts.setOpeningBalance(cash.id, "ten"), "InvalidAmount");
      expectFailure(book.ledger.accounts.setOpeningBalance(cash.id, Number.NaN), "InvalidAmount");
    });

    it("reports unknown accounts first", () => {
      expectFailure(book.ledger.accounts.setOpeningBalance(99, "ten"), "NotFound");
    });
  });

  describe("getBalance", () => {
    it("combines the opening balance with postings", () => {
      const cash = book.account("Cash", "asset");
      const salary = book.account("Salary", "income");
      const groceries = book.account("Groceries", "expense");
      unwrap(book.ledger.accounts.setOpeningBalance(cash.id, "1000"));
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-01",
          amount: "200",
          debitAccountId: cash.id,
          creditAccountId: salary.id,
        }),
      );
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-03",
          amount: "50",
          debitAccountId: groceries.id,
          creditAccountId: cash.id,
        }),
      );

      expect(unwrap(book.ledger.accounts.getBalance(cash.id))).toEqual({
        accountId: cash.id,
        name: "Cash",
        category: "asset",
        openingBalance: "1000.00",
        totalDebits: "200.00",
        totalCredits: "50.00",
        balance: "1150.00",
      });
      expect(unwrap(book.ledger.accounts.getBalance(salary.id)).balance).toBe("200.00");
      expect(unwrap(book.ledger.accounts.getBalance(groceries.id)).balance).toBe("50.00");
    });

    it("limits postings to an as-of date", () => {
      const cash = book.account("Cash", "asset");
      const salary = book.account("Salary", "income");
      for (const date of ["2025-09-30", "2025-10-15"]) {
        unwrap(
          book.ledger.transactions.addTransaction({
            date,
            amount: "100",
            debitAccountId: cash.id,
            creditAccountId: salary.id,
          }),
        );
      }
      expect(unwrap(book.ledger.accounts.getBalance(cash.id, { asOf: "2025-09-30" })).balance).toBe("100.00");
      expect(unwrap(book.ledger.accounts.getBalance(cash.id)).balance).toBe("200.00");
    });

    it("rejects a malformed as-of date", () => {
      const cash = book.account("Cash", "asset");
      expectFailure(book.ledger.accounts.getBalance(cash.id, { asOf: "2025-02-30" }), "InvalidInput");
    });

    it("reports unknown accounts", () => {
      expectFailure(book.ledger.accounts.getBalance(5), "NotFound");
    });
  });

  describe("financialOverview", () => {
    it("reports assets, liabilities and net worth", () => {
      const cash = book.account("Cash", "asset");
      const card = book.account("Credit Card", "liability");
      const salary = book.account("Salary", "income");
      const groceries = book.account("Groceries", "expense");
      unwrap(book.ledger.accounts.setOpeningBalance(cash.id, "1000"));
      unwrap(book.ledger.accounts.setOpeningBalance(card.id, "300"));
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-01",
          amount: "200",
          debitAccountId: cash.id,
          creditAccountId: salary.id,
        }),
      );
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-10",
          amount: "80",
          debitAccountId: groceries.id,
          creditAccountId: card.id,
        }),
      );

      expect(unwrap(book.ledger.accounts.financialOverview())).toEqual({
        totalAssets: "1200.00",
        totalLiabilities: "380.00",
        netWorth: "820.00",
      });
      expect(unwrap(book.ledger.accounts.financialOverview({ asOf: "2025-10-05" }))).toEqual({
        totalAssets: "1200.00",
        totalLiabilities: "300.00",
        netWorth: "900.00",
      });
    });

    it("is zero for an empty ledger", () => {
      expect(unwrap(book.ledger.accounts.financialOverview()).netWorth).toBe("0.00");
    });

    it("rejects a malformed as-of date", () => {
      expectFailure(book.ledger.accounts.financialOverview({ asOf: "2025-13-01" }), "InvalidInput");
    });
  });

  describe("trialBalance", () => {
    it("balances across postings", () => {
      const cash = book.account("Cash", "asset");
      const salary = book.account("Salary", "income");
      const rent = book.account("Rent", "expense");
      unwrap(book.ledger.accounts.setOpeningBalance(cash.id, "999"));
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-01",
          amount: "3000",
          debitAccountId: cash.id,
          creditAccountId: salary.id,
        }),
      );
      unwrap(
        book.ledger.transactions.addTransaction({
          date: "2025-10-02",
          amount: "1200",
          debitAccountId: rent.id,
          creditAccountId: cash.id,
        }),
      );
      const trial = unwrap(book.ledger.accounts.trialBalance());
      expect(trial.lines.map((l) => [l.name, l.debitBalance, l.creditBalance])).toEqual([
        ["Cash", "1800.00", "0.00"],
        ["Salary", "0.00", "3000.00"],
        ["Rent", "1200.00", "0.00"],
      ]);
      expect(trial.totalDebits).toBe("3000.00");
      expect(trial.balanced).toBe(true);
    });
  });
});
