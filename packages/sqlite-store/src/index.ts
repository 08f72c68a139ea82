/**
 * @pocketbook/sqlite-store — Durable LedgerStore on SQLite.
 */

export { SqliteLedgerStore } from "./sqlite-store.js";
export type { SqliteLedgerStoreOptions } from "./sqlite-store.js";
export { migrate, bindDecimals, SCHEMA_VERSION } from "./schema.js";
