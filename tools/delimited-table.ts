import { parse } from "csv-parse/sync";
import { SchemaError } from "@shared/prep-errors";
import { formatValue, parseNumberFormat, type TNumberFormat } from "@shared/number-format";
import {
  readCell,
  type CellValue,
  type ColumnDef,
  type CoreField,
  type TableLayout,
  type TWellLogRow,
} from "@shared/well-log";
import {
  DEFAULT_DELIMITER,
  DEFAULT_FLOAT_FORMAT,
  DEFAULT_MISSING_MARKER,
  DEFAULT_MISSING_MARKERS,
} from "./prep-config";

export type DelimitedWriteOptions = {
  delimiter?: string;
  missingMarker?: string;
  floatFormat?: string | TNumberFormat;
};

export type DelimitedReadOptions = {
  delimiter?: string;
  missingMarkers?: string[];
};

const quoteIfNeeded = (text: string, delimiter: string): string => {
  if (text.includes(delimiter) || text.includes('"') || /[\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
};

const renderCell = (
  value: CellValue,
  column: ColumnDef,
  floatFormat: TNumberFormat,
  missingMarker: string,
): string => {
  if (value === null || (typeof value === "number" && Number.isNaN(value))) return missingMarker;
  if (typeof value === "string") return value;
  switch (column.kind) {
    case "float":
      return formatValue(value, floatFormat);
    case "integer":
      return formatValue(value, { kind: "integer" });
    case "string":
      return String(value);
  }
};

/** Header line of layout labels, then one line per row in the given order. */
export function renderDelimitedTable(
  layout: TableLayout,
  rows: readonly TWellLogRow[],
  options: DelimitedWriteOptions = {},
): string {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const missingMarker = options.missingMarker ?? DEFAULT_MISSING_MARKER;
  const rawFormat = options.floatFormat ?? DEFAULT_FLOAT_FORMAT;
  const floatFormat = typeof rawFormat === "string" ? parseNumberFormat(rawFormat) : rawFormat;

  const lines = [layout.columns.map((column) => quoteIfNeeded(column.label, delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(
      layout.columns
        .map((column) =>
          quoteIfNeeded(renderCell(readCell(row, column), column, floatFormat, missingMarker), delimiter),
        )
        .join(delimiter),
    );
  }
  return `${lines.join("\n")}\n`;
}

type ParsedCells = Map<string, CellValue>;

const parseCell = (
  raw: string | undefined,
  column: ColumnDef,
  missing: Set<string>,
  line: number,
): CellValue => {
  if (raw === undefined) return null;
  const text = raw.trim();
  if (text === "" || missing.has(text)) return null;
  if (column.kind === "string") return raw;
  const value = Number(text);
  if (Number.isNaN(value)) {
    throw new SchemaError(`line ${line}: column ${column.label} is not numeric ("${raw}")`);
  }
  if (column.kind === "integer" && !Number.isInteger(value)) {
    throw new SchemaError(`line ${line}: column ${column.label} must be an integer ("${raw}")`);
  }
  return value;
};

const requireNumber = (cells: ParsedCells, key: string, line: number): number => {
  const value = cells.get(key);
  if (typeof value !== "number") {
    throw new SchemaError(`line ${line}: column ${key} has no value`);
  }
  return value;
};

const requireString = (cells: ParsedCells, key: string, line: number): string => {
  const value = cells.get(key);
  if (value === null || value === undefined) {
    throw new SchemaError(`line ${line}: column ${key} has no value`);
  }
  return String(value);
};

const numberOrNull = (value: CellValue | undefined): number | null => (typeof value === "number" ? value : null);

const coreKey = (layout: TableLayout, field: CoreField): string => {
  const column = layout.columns.find((c) => c.source.type === "core" && c.source.field === field);
  if (!column) {
    throw new SchemaError(`layout ${layout.name} has no column for ${field}`);
  }
  return column.key;
};

/**
 * Parses a delimited file whose first line is skipped unconditionally.
 * Columns map onto the layout by position; extra trailing columns are ignored.
 */
export function parseDelimitedTable(
  text: string,
  layout: TableLayout,
  options: DelimitedReadOptions = {},
): TWellLogRow[] {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const missing = new Set(options.missingMarkers ?? DEFAULT_MISSING_MARKERS);
  const records: string[][] = parse(text, {
    delimiter,
    from_line: 2,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });

  const keys = {
    location: coreKey(layout, "location"),
    wellId: coreKey(layout, "wellId"),
    pointIndex: coreKey(layout, "pointIndex"),
    x: coreKey(layout, "x"),
    y: coreKey(layout, "y"),
    landElevation: coreKey(layout, "landElevation"),
    bottomDepth: coreKey(layout, "bottomDepth"),
  };

  return records.map((record, index) => {
    const line = index + 2;
    const cells: ParsedCells = new Map();
    layout.columns.forEach((column, position) => {
      cells.set(column.key, parseCell(record[position], column, missing, line));
    });

    const classes: Record<string, number | null> = {};
    const variances: Record<string, number | null> = {};
    const zones: Array<number | null> = Array.from({ length: layout.zoneLayers }, () => null);
    for (const column of layout.columns) {
      const { source } = column;
      const value = numberOrNull(cells.get(column.key));
      if (source.type === "class") classes[source.name] = value;
      else if (source.type === "variance") variances[source.name] = value;
      else if (source.type === "zone") zones[source.layer - 1] = value;
    }

    return {
      location: requireString(cells, keys.location, line),
      wellId: requireNumber(cells, keys.wellId, line),
      pointIndex: requireNumber(cells, keys.pointIndex, line),
      x: requireNumber(cells, keys.x, line),
      y: requireNumber(cells, keys.y, line),
      landElevation: requireNumber(cells, keys.landElevation, line),
      bottomDepth: requireNumber(cells, keys.bottomDepth, line),
      classes,
      variances,
      zones,
    };
  });
}
