/**
 * @pocketbook/cli — Structured logging.
 *
 * JSON lines on stderr so stdout stays clean for command output.
 * In development the pino-pretty transport formats them for reading.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { MutationLogEntry } from "@pocketbook/ledger";
import type { CliConfig } from "./config.js";

export function createLogger(config: Pick<CliConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}

/**
 * Route ledger mutation outcomes to the logger: info when the
 * operation succeeded, warn when it ended in a domain failure.
 */
export function mutationLogger(logger: Logger): (entry: MutationLogEntry) => void {
  return (entry) => {
    if (entry.ok) {
      logger.info(entry, `${entry.operation} ok`);
    } else {
      logger.warn(entry, `${entry.operation} failed: ${entry.errorKind ?? "unknown"}`);
    }
  };
}
