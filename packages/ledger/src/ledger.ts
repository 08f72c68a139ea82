/**
 * @pocketbook/ledger — Ledger composition root.
 *
 * Binds the three services to one store. The store handle is passed
 * in explicitly; nothing here opens or closes storage.
 */

import { AccountService } from "./accounts.js";
import { BudgetService } from "./budgets.js";
import type { LedgerStore } from "./store.js";
import { TransactionService } from "./transactions.js";
import type { LedgerOptions } from "./types.js";

export interface Ledger {
  readonly accounts: AccountService;
  readonly transactions: TransactionService;
  readonly budgets: BudgetService;
}

export function createLedger(store: LedgerStore, options?: LedgerOptions): Ledger {
  const accounts = new AccountService(store, options);
  return {
    accounts,
    transactions: new TransactionService(store, accounts, options),
    budgets: new BudgetService(store, accounts, options),
  };
}
