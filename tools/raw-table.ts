import fs from "node:fs";
import { parse } from "csv-parse/sync";
import type { RawRow } from "./interval-reconciler";
import { DEFAULT_DELIMITER, DEFAULT_MISSING_MARKERS } from "./prep-config";

export type RawTableOptions = {
  delimiter?: string;
  missingMarkers?: string[];
};

const toRawCell = (value: string, missing: Set<string>): string | null => {
  const text = value.trim();
  if (text === "" || missing.has(text)) return null;
  return value;
};

/**
 * Parses a headed delimited table (first line = column names) into raw rows
 * for the reconciler. Every header key is present on every row; cells stay
 * text (the reconciler parses the numeric columns, so a name such as `007`
 * survives) and missing tokens become null.
 */
export function parseRawTable(text: string, options: RawTableOptions = {}): RawRow[] {
  const missing = new Set(options.missingMarkers ?? DEFAULT_MISSING_MARKERS);
  const records: string[][] = parse(text, {
    delimiter: options.delimiter ?? DEFAULT_DELIMITER,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  const [header, ...body] = records;
  if (!header) return [];
  return body.map((record) => {
    const row: RawRow = {};
    header.forEach((name, i) => {
      row[name.trim()] = toRawCell(record[i] ?? "", missing);
    });
    return row;
  });
}

export function readRawTable(filePath: string, options: RawTableOptions = {}): RawRow[] {
  return parseRawTable(fs.readFileSync(filePath, "utf8"), options);
}
