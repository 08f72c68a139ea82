/**
 * @pocketbook/sqlite-store — Schema and migrations.
 *
 * Amounts are stored as INTEGER minor units. The number of fractional
 * digits is fixed when the file is created and recorded in `meta`.
 *
 * Migrations are keyed by `PRAGMA user_version` and applied in order.
 */

import type Database from "better-sqlite3";

export const SCHEMA_VERSION = 1;

const MIGRATIONS: readonly string[] = [
  // v1
  `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    category TEXT NOT NULL
      CHECK(category IN ('asset', 'liability', 'equity', 'income', 'expense')),
    opening_balance INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    UNIQUE (name, category)
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount INTEGER NOT NULL CHECK(amount > 0),
    debit_account_id INTEGER NOT NULL,
    credit_account_id INTEGER NOT NULL,
    notes TEXT NOT NULL DEFAULT '',
    reversal_of INTEGER,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK(debit_account_id <> credit_account_id),
    FOREIGN KEY (debit_account_id) REFERENCES accounts(id),
    FOREIGN KEY (credit_account_id) REFERENCES accounts(id)
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date, id);
  CREATE INDEX IF NOT EXISTS idx_transactions_debit ON transactions(debit_account_id);
  CREATE INDEX IF NOT EXISTS idx_transactions_credit ON transactions(credit_account_id);
  CREATE INDEX IF NOT EXISTS idx_transactions_reversal ON transactions(reversal_of);

  CREATE TABLE IF NOT EXISTS budgets (
    account_id INTEGER NOT NULL,
    period TEXT NOT NULL,
    amount INTEGER NOT NULL CHECK(amount >= 0),
    PRIMARY KEY (account_id, period),
    FOREIGN KEY (account_id) REFERENCES accounts(id)
  );

  CREATE TABLE IF NOT EXISTS period_locks (
    period TEXT PRIMARY KEY,
    locked_at TEXT NOT NULL
  );
  `,
];

/**
 * Bring the database up to SCHEMA_VERSION.
 * Each step runs in its own transaction together with the version bump.
 */
export function migrate(db: Database.Database): void {
  const current = Number(db.pragma("user_version", { simple: true }));
  MIGRATIONS.forEach((sql, index) => {
    const version = index + 1;
    if (current >= version) return;
    db.transaction(() => {
      db.exec(sql);
      db.pragma(`user_version = ${String(version)}`);
    })();
  });
}

/**
 * Record the ledger's decimals on first use and refuse to reopen the
 * file with a different value.
 */
export function bindDecimals(db: Database.Database, decimals: number): void {
  db.prepare<[string, string]>("INSERT OR IGNORE INTO meta (key, value) VALUES (?, ?)").run(
    "decimals",
    String(decimals),
  );
  const row = db
    .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
    .get("decimals");
  if (row !== undefined && Number(row.value) !== decimals) {
    throw new Error(
      `Database was created with ${row.value} decimal places, but ${String(decimals)} were configured`,
    );
  }
}
