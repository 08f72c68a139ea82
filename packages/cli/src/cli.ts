/**
 * @pocketbook/cli — Argument dispatch.
 *
 * Exit codes:
 * - 0: the command succeeded
 * - 1: usage error or domain failure (reported on stderr)
 * - 2: fatal error, set by the entry point
 */

import { parseArgs } from "node:util";
import type { CommandContext, Flags } from "./commands.js";
import { COMMANDS, OPTIONS } from "./commands.js";

export const PROGRAM = "pocketbook";

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

interface Invocation {
  readonly name: string;
  readonly args: readonly string[];
  readonly flags: Flags;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isParseArgsError(err: unknown): err is Error & { code: string } {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS")
  );
}

function parse(argv: readonly string[]): Invocation {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: OPTIONS,
      allowPositionals: true,
      strict: true,
    });
    const [name = "help", ...args] = positionals;
    return { name, args, flags: values };
  } catch (err: unknown) {
    if (isParseArgsError(err)) {
      throw new UsageError(err.message);
    }
    throw err;
  }
}

export function helpText(): readonly string[] {
  const width = Math.max(...Object.values(COMMANDS).map((c) => c.usage.length));
  return [
    `Usage: ${PROGRAM} <command> [arguments] [options]`,
    "",
    "Commands:",
    ...Object.values(COMMANDS).map((c) => `  ${c.usage.padEnd(width)}  ${c.summary}`),
    `  ${"help".padEnd(width)}  Show this message`,
  ];
}

/**
 * Run one command line against the ledger. Storage faults are not
 * caught here; they propagate to the entry point.
 */
export function runCli(argv: readonly string[], ctx: CommandContext, io: CliOutput): number {
  let invocation: Invocation;
  try {
    invocation = parse(argv);
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      io.err(ctx.color.red(`error: ${err.message}`));
      return 1;
    }
    throw err;
  }

  const { name, args, flags } = invocation;
  if (name === "help") {
    helpText().forEach((line) => io.out(line));
    return 0;
  }

  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (command === undefined) {
    io.err(ctx.color.red(`error: unknown command "${name}"`));
    io.err(`Run "${PROGRAM} help" for the list of commands.`);
    return 1;
  }
  if (args.length !== command.arity) {
    io.err(ctx.color.red(`error: expected ${String(command.arity)} argument(s), got ${String(args.length)}`));
    io.err(`Usage: ${PROGRAM} ${command.usage}`);
    return 1;
  }

  const result = command.run(ctx, args, flags);
  if (!result.ok) {
    io.err(ctx.color.red(`error: ${result.error.kind}: ${result.error.message}`));
    return 1;
  }
  result.value.forEach((line) => io.out(line));
  return 0;
}
