/**
 * @pocketbook/ledger — Chart of accounts sources.
 *
 * Turns external documents into candidate chart rows. Parsing here is
 * structural only: a document that cannot be read at all throws
 * LedgerError("InvalidInput"); individual bad rows are passed through
 * for per-row validation by the account service.
 *
 * Formats:
 * - CSV with header `name,type` (header matched case-insensitively)
 * - JSON array of objects with `name` and `type` keys
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { AccountCategory } from "@pocketbook/types";
import { readCsv } from "./csv.js";
import type { ChartRowInput } from "./types.js";
import { LedgerError } from "./types.js";
import type { Verdict } from "./validation.js";
import { validateAccountName, validateCategory } from "./validation.js";

export interface ChartRow {
  readonly name: string;
  readonly category: AccountCategory;
}

// =============================================================================
// Row validation
// =============================================================================

/**
 * Validate one candidate row. Name and type are checked independently
 * so the reason names the first failing field.
 */
export function validateChartRow(row: ChartRowInput): Verdict<ChartRow> {
  const name = validateAccountName(row.name);
  if (!name.valid) {
    return name;
  }
  const category = validateCategory(row.type);
  if (!category.valid) {
    return category;
  }
  return { valid: true, value: { name: name.value, category: category.value } };
}

// =============================================================================
// Document parsing
// =============================================================================

/**
 * Candidate rows of a `name,type` CSV document. An empty document has
 * no rows; a document with content but without both headers fails.
 */
export function parseChartCsv(text: string): readonly ChartRowInput[] {
  const table = readCsv(text);
  if (table.fields.length === 0 && table.rows.length === 0) {
    return [];
  }
  if (!table.fields.includes("name") || !table.fields.includes("type")) {
    throw new LedgerError(
      "InvalidInput",
      `CSV header must contain "name" and "type", got: ${table.fields.join(",") || "(none)"}`,
    );
  }
  return table.rows.map((record) => ({ name: record["name"], type: record["type"] }));
}

const JsonChartSchema = z.array(z.unknown());
const JsonChartItemSchema = z.object({ name: z.unknown(), type: z.unknown() });

export function parseChartJson(text: string): readonly ChartRowInput[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    throw new LedgerError("InvalidInput", "Chart file is not valid JSON");
  }

  const parsed = JsonChartSchema.safeParse(document);
  if (!parsed.success) {
    throw new LedgerError("InvalidInput", "Chart JSON must be an array of { name, type } objects");
  }

  return parsed.data.map((item) => {
    const row = JsonChartItemSchema.safeParse(item);
    return row.success
      ? { name: row.data.name, type: row.data.type }
      : { name: undefined, type: undefined };
  });
}

// =============================================================================
// Built-in chart
// =============================================================================

const DefaultChartSchema = z.array(
  z.object({
    name: z.string().min(1),
    type: z.enum(["asset", "liability", "equity", "income", "expense"]),
  }),
);

const DEFAULT_CHART_URL = new URL("../data/default-chart.json", import.meta.url);

let _defaultChart: readonly ChartRow[] | undefined;

/**
 * The built-in chart of accounts, read once from data/default-chart.json.
 */
export function loadDefaultChart(): readonly ChartRow[] {
  if (_defaultChart === undefined) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_CHART_URL, "utf8"));
    _defaultChart = DefaultChartSchema.parse(raw).map((row) => ({
      name: row.name,
      category: row.type,
    }));
  }
  return _defaultChart;
}
