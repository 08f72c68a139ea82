/**
 * Shared fixtures for the ledger service tests.
 */

import { expect } from "vitest";
import type { Account, AccountCategory, ErrorKind, Result } from "@pocketbook/types";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import { createLedger } from "../src/ledger.js";
import type { Ledger } from "../src/ledger.js";
import type { LedgerOptions, MutationLogEntry } from "../src/types.js";

export const TS = "2025-10-01T09:00:00.000Z";

/** Return the value of a success, or fail the test with the error. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

/** Assert a failure of the given kind and return its message. */
export function expectFailure<T>(result: Result<T>, kind: ErrorKind): string {
  expect(result.ok).toBe(false);
  if (result.ok) {
    throw new Error("unreachable");
  }
  expect(result.error.kind).toBe(kind);
  return result.error.message;
}

export interface TestBook {
  readonly ledger: Ledger;
  readonly store: InMemoryLedgerStore;
  readonly log: MutationLogEntry[];
  account(name: string, category: AccountCategory): Account;
}

/**
 * A ledger over a fresh in-memory store with a fixed clock and a
 * captured mutation log.
 */
export function createTestBook(options?: LedgerOptions): TestBook {
  const store = new InMemoryLedgerStore();
  const log: MutationLogEntry[] = [];
  const ledger = createLedger(store, {
    now: () => new Date(TS),
    onMutation: (entry) => log.push(entry),
    ...options,
  });
  return {
    ledger,
    store,
    log,
    account: (name, category) => unwrap(ledger.accounts.addAccount(name, category)),
  };
}
