import { SchemaError } from "@shared/prep-errors";
import { hsuKey, varianceKey, type TableLayout, type TWellLogRow } from "@shared/well-log";
import { silentLogger, type PrepLogger } from "./prep-log";

export type RawCell = string | number | boolean | null | undefined;
export type RawRow = Record<string, RawCell>;

export type ReconcileOptions = {
  layout: TableLayout;
  nameCol?: string;
  xCol?: string;
  yCol?: string;
  zlandCol?: string;
  /** Bottom depth of each interval. */
  depthCol?: string;
  depthTopCol?: string;
  pointIndexCol?: string;
  fillMissing?: boolean;
  /** Class name -> raw column. Defaults to every layout class under its own name. */
  classColumns?: Record<string, string>;
  /** Class name -> raw variance column. Defaults to `<class>_var`. */
  varianceColumns?: Record<string, string>;
  /** Raw column per zone layer, layer 1 first. Defaults to `hsu_1..hsu_n`. */
  zoneColumns?: string[];
  logger?: PrepLogger;
};

export type ReconcileResult = {
  rows: TWellLogRow[];
  wellCount: number;
  insertedGaps: number;
};

type ResolvedColumns = {
  name: string;
  x: string;
  y: string;
  zland: string;
  depth: string;
  top?: string;
  pointIndex?: string;
  classes: Array<[string, string]>;
  variances: Array<[string, string]>;
  zones: string[];
};

const columnsPresent = (rows: RawRow[]): Set<string> => {
  const present = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) present.add(key);
  }
  return present;
};

/**
 * Checks every column the reconciliation will touch. Runs before any row is
 * built so a rejected batch never reaches the store.
 */
export function resolveColumns(rawRows: RawRow[], options: ReconcileOptions): ResolvedColumns {
  const { layout } = options;
  const present = columnsPresent(rawRows);
  const required = {
    name: options.nameCol ?? "Name",
    x: options.xCol ?? "X",
    y: options.yCol ?? "Y",
    zland: options.zlandCol ?? "Zland",
    depth: options.depthCol ?? "Depth",
  };
  const missing = Object.values(required).filter((col) => !present.has(col));
  if (missing.length > 0) {
    throw new SchemaError(`missing necessary columns in table: ${missing.join(", ")}`);
  }
  for (const optional of [options.depthTopCol, options.pointIndexCol]) {
    if (optional !== undefined && !present.has(optional)) {
      throw new SchemaError(`missing column ${optional}`);
    }
  }

  const classMap = options.classColumns ?? Object.fromEntries(layout.classes.map((name) => [name, name]));
  const classes = Object.entries(classMap);
  for (const [name, col] of classes) {
    if (!layout.classes.includes(name)) {
      throw new SchemaError(`invalid class ${name}`);
    }
    if (!present.has(col)) {
      throw new SchemaError(`missing column for class ${name}`);
    }
  }

  const variances: Array<[string, string]> = [];
  if (layout.variances) {
    for (const [name] of classes) {
      const col = options.varianceColumns?.[name] ?? varianceKey(name);
      if (!present.has(col)) {
        throw new SchemaError(`missing variance column for class ${name}`);
      }
      variances.push([name, col]);
    }
  }

  const zones: string[] = [];
  for (let layer = 1; layer <= layout.zoneLayers; layer += 1) {
    const col = options.zoneColumns?.[layer - 1] ?? hsuKey(layer);
    if (!present.has(col)) {
      throw new SchemaError(`missing column for ${hsuKey(layer)}`);
    }
    zones.push(col);
  }

  return {
    ...required,
    top: options.depthTopCol,
    pointIndex: options.pointIndexCol,
    classes,
    variances,
    zones,
  };
}

const toNumberOrNull = (value: RawCell, col: string, rowIndex: number): number | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "boolean") return value ? 1 : 0;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  if (Number.isNaN(parsed)) {
    throw new SchemaError(`row ${rowIndex + 1}: column ${col} is not numeric ("${value}")`);
  }
  return parsed;
};

const toRequiredNumber = (value: RawCell, col: string, rowIndex: number): number => {
  const parsed = toNumberOrNull(value, col, rowIndex);
  if (parsed === null) {
    throw new SchemaError(`row ${rowIndex + 1}: column ${col} has no value`);
  }
  return parsed;
};

const toName = (value: RawCell, col: string, rowIndex: number): string => {
  if (value === null || value === undefined || value === "") {
    throw new SchemaError(`row ${rowIndex + 1}: column ${col} has no value`);
  }
  return String(value);
};

const toPointIndex = (value: RawCell, col: string, rowIndex: number): number => {
  const parsed = toRequiredNumber(value, col, rowIndex);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new SchemaError(`row ${rowIndex + 1}: column ${col} must be a positive integer`);
  }
  return parsed;
};

const byWellThenDepth = (a: TWellLogRow, b: TWellLogRow): number =>
  a.wellId - b.wellId || a.bottomDepth - b.bottomDepth;

/** Sorts by (well, bottom depth) and numbers each well's rows 1..k. */
export function assignPointIndices(rows: TWellLogRow[]): TWellLogRow[] {
  const sorted = [...rows].sort(byWellThenDepth);
  let currentWell = -1;
  let counter = 0;
  return sorted.map((row) => {
    if (row.wellId !== currentWell) {
      currentWell = row.wellId;
      counter = 0;
    }
    counter += 1;
    return { ...row, pointIndex: counter };
  });
}

const groupByWell = (rows: TWellLogRow[]): Map<number, TWellLogRow[]> => {
  const groups = new Map<number, TWellLogRow[]>();
  for (const row of rows) {
    const group = groups.get(row.wellId);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.wellId, [row]);
    }
  }
  return groups;
};

/**
 * Inserts a missing-valued interval wherever a well's interval top sits below
 * the previous bottom (ground surface for the first interval). Overlapping or
 * unsorted intervals are not corrected.
 */
export function fillIntervalGaps(rows: TWellLogRow[]): TWellLogRow[] {
  const synthetic: TWellLogRow[] = [];
  for (const group of groupByWell(rows).values()) {
    const ordered = [...group].sort((a, b) => a.bottomDepth - b.bottomDepth);
    let previousBottom = 0.0;
    for (const row of ordered) {
      const top = row.topDepth;
      if (top !== null && top !== undefined && top > previousBottom) {
        synthetic.push({
          ...row,
          topDepth: previousBottom,
          bottomDepth: top,
          classes: Object.fromEntries(Object.keys(row.classes).map((name) => [name, null])),
          variances: Object.fromEntries(Object.keys(row.variances).map((name) => [name, null])),
          zones: [...row.zones],
        });
      }
      previousBottom = row.bottomDepth;
    }
  }
  return synthetic;
}

/**
 * Turns raw well-log rows into canonical rows: one dense ID per distinct
 * (name, x, y), point indices ascending by depth, and, when a top-depth column
 * is given, no vertical gaps. IDs start at 1; the store offsets them on merge.
 */
export function reconcileIntervals(rawRows: RawRow[], options: ReconcileOptions): ReconcileResult {
  const logger = options.logger ?? silentLogger;
  if (rawRows.length === 0) {
    logger.warn("No rows to add");
    return { rows: [], wellCount: 0, insertedGaps: 0 };
  }
  const cols = resolveColumns(rawRows, options);
  const fillMissing = options.fillMissing ?? true;

  const ids = new Map<string, number>();
  const names = new Set<string>();
  const built: TWellLogRow[] = rawRows.map((raw, i) => {
    const location = toName(raw[cols.name], cols.name, i);
    const x = toRequiredNumber(raw[cols.x], cols.x, i);
    const y = toRequiredNumber(raw[cols.y], cols.y, i);
    const key = JSON.stringify([location, x, y]);
    let wellId = ids.get(key);
    if (wellId === undefined) {
      wellId = ids.size + 1;
      ids.set(key, wellId);
    }
    names.add(location);

    const classes: Record<string, number | null> = {};
    for (const [name, col] of cols.classes) classes[name] = toNumberOrNull(raw[col], col, i);
    const variances: Record<string, number | null> = {};
    for (const [name, col] of cols.variances) variances[name] = toNumberOrNull(raw[col], col, i);

    return {
      location,
      wellId,
      pointIndex: cols.pointIndex ? toPointIndex(raw[cols.pointIndex], cols.pointIndex, i) : 1,
      x,
      y,
      landElevation: toRequiredNumber(raw[cols.zland], cols.zland, i),
      bottomDepth: toRequiredNumber(raw[cols.depth], cols.depth, i),
      topDepth: cols.top ? toNumberOrNull(raw[cols.top], cols.top, i) : undefined,
      classes,
      variances,
      zones: cols.zones.map((col) => toNumberOrNull(raw[col], col, i)),
    };
  });

  let rows = cols.pointIndex ? built : assignPointIndices(built);
  logger.info(`Adding ${rows.length} entries from ${ids.size} wells (${names.size} unique names)`);

  let insertedGaps = 0;
  if (cols.top !== undefined && fillMissing) {
    logger.info("Filling interval gaps...");
    const synthetic = fillIntervalGaps(rows);
    insertedGaps = synthetic.length;
    rows = assignPointIndices([...rows, ...synthetic]);
    logger.info(`Inserted ${insertedGaps} gap intervals`);
  }

  return { rows, wellCount: ids.size, insertedGaps };
}
