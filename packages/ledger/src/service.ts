/**
 * @pocketbook/ledger — Operation boundary shared by the services.
 *
 * Every public service operation runs through `query()` or `mutate()`.
 * A LedgerError (or a store constraint violation) becomes a Failure
 * envelope; anything else is a storage or programming fault and is
 * rethrown to the caller.
 */

import type { ErrorKind, Result } from "@pocketbook/types";
import { failure, success } from "@pocketbook/types";
import type { LedgerStore, StoreErrorCode } from "./store.js";
import { StoreError } from "./store.js";
import type { LedgerOptions, MutationLogEntry } from "./types.js";
import { LedgerError } from "./types.js";

const STORE_ERROR_KIND: Readonly<Record<StoreErrorCode, ErrorKind>> = {
  UNIQUE_VIOLATION: "DuplicateAccount",
  FOREIGN_KEY_VIOLATION: "NotFound",
  NOT_FOUND: "NotFound",
};

export abstract class LedgerService {
  protected readonly store: LedgerStore;
  protected readonly decimals: number;
  private readonly _now: () => Date;
  private readonly _onMutation: ((entry: MutationLogEntry) => void) | undefined;

  constructor(store: LedgerStore, options?: LedgerOptions) {
    this.store = store;
    this.decimals = store.decimals;
    this._now = options?.now ?? (() => new Date());
    this._onMutation = options?.onMutation;
  }

  /** ISO timestamp from the configured clock. */
  protected timestamp(): string {
    return this._now().toISOString();
  }

  /**
   * Run a read-only operation.
   */
  protected query<T>(fn: () => T): Result<T> {
    return this._settle(fn);
  }

  /**
   * Run a mutating operation and report it. Unless `atomic` is false
   * the whole operation is one unit of work; batch operations pass
   * false and open their own unit per item.
   */
  protected mutate<T>(operation: string, fn: () => T, atomic = true): Result<T> {
    const start = Date.now();
    const result = this._settle(atomic ? () => this.store.transaction(fn) : fn);
    this._onMutation?.({
      operation,
      ok: result.ok,
      errorKind: result.ok ? undefined : result.error.kind,
      durationMs: Date.now() - start,
    });
    return result;
  }

  private _settle<T>(fn: () => T): Result<T> {
    try {
      return success(fn());
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return failure(err.code, err.message, err.details);
      }
      if (err instanceof StoreError) {
        return failure(STORE_ERROR_KIND[err.code], err.message);
      }
      throw err;
    }
  }
}
