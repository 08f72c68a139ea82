/**
 * @pocketbook/ledger — CSV reading and writing.
 *
 * Thin wrappers over papaparse with the ledger's conventions:
 * header row, LF line endings, headers matched case-insensitively.
 */

import Papa from "papaparse";

export interface CsvTable {
  /** Header names, trimmed and lower-cased. */
  readonly fields: readonly string[];
  readonly rows: readonly Readonly<Record<string, string | undefined>>[];
}

/**
 * Parse a CSV document with a header row.
 * Blank lines are skipped; row-level shape problems are left to the caller.
 */
export function readCsv(text: string): CsvTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim().toLowerCase(),
  });
  return {
    fields: parsed.meta.fields ?? [],
    rows: parsed.data,
  };
}

/**
 * Serialize rows under a header. Values are written as given;
 * fields containing commas, quotes or line breaks are quoted.
 */
export function writeCsv(
  fields: readonly string[],
  rows: readonly (readonly string[])[],
): string {
  return Papa.unparse(
    {
      fields: [...fields],
      data: rows.map((row) => [...row]),
    },
    { newline: "\n" },
  );
}
