#!/usr/bin/env -S node --import tsx
/**
 * @pocketbook/cli — Entry point.
 *
 * Loads config, opens the SQLite ledger, runs one command and closes
 * the database again.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { Chalk } from "chalk";
import { createLedger } from "@pocketbook/ledger";
import { SqliteLedgerStore } from "@pocketbook/sqlite-store";
import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { createLogger, mutationLogger } from "./logger.js";

function main(argv: readonly string[]): number {
  const config = loadConfig();
  const logger = createLogger(config);

  let store: SqliteLedgerStore | undefined;
  try {
    store = SqliteLedgerStore.open(config.POCKETBOOK_DB, { decimals: config.LEDGER_DECIMALS });
    logger.debug({ db: config.POCKETBOOK_DB, decimals: store.decimals }, "Ledger opened");

    const ledger = createLedger(store, {
      onMutation: mutationLogger(logger),
      searchLimit: config.SEARCH_LIMIT,
    });

    return runCli(
      argv,
      {
        ledger,
        color: new Chalk(),
        files: {
          read: (path) => readFileSync(path, "utf8"),
          write: (path, text) => writeFileSync(path, text, "utf8"),
        },
      },
      {
        out: (line) => process.stdout.write(`${line}\n`),
        err: (line) => process.stderr.write(`${line}\n`),
      },
    );
  } catch (err: unknown) {
    logger.fatal({ err }, "Command aborted");
    return 2;
  } finally {
    store?.close();
  }
}

process.exitCode = main(process.argv.slice(2));
