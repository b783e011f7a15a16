import fs from "node:fs";
import { SchemaError, ShapeError } from "@shared/prep-errors";
import {
  buildDatasetLayout,
  cloneRow,
  type TableLayout,
  type TDatasetLayoutOptions,
  type TWellLogRow,
} from "@shared/well-log";
import {
  parseDelimitedTable,
  renderDelimitedTable,
  type DelimitedReadOptions,
  type DelimitedWriteOptions,
} from "./delimited-table";
import {
  assignPointIndices,
  reconcileIntervals,
  type RawRow,
  type ReconcileOptions,
  type ReconcileResult,
} from "./interval-reconciler";
import { silentLogger, type PrepLogger } from "./prep-log";

export type WellCoordinate = { wellId: number; x: number; y: number };

export type StoreOptions = {
  rows?: readonly TWellLogRow[];
  logger?: PrepLogger;
};

export type AddWellInput = {
  name: string;
  x: number;
  y: number;
  zland: number;
  depths: number[];
  classes?: Record<string, Array<number | null>>;
  variances?: Record<string, Array<number | null>>;
  /** One code per zone layer, repeated on every interval of the well. */
  zones?: Array<number | null>;
};

export type TableIngestOptions = Omit<ReconcileOptions, "layout" | "logger">;

export type TableIngestResult = ReconcileResult & {
  merged: TWellLogRow[];
};

const maxWellId = (rows: readonly TWellLogRow[]): number =>
  rows.reduce((max, row) => (row.wellId > max ? row.wellId : max), 0);

/**
 * Append-only table of well-log intervals with a running maximum well ID.
 * Each merge numbers its wells from `maxId + 1`, so independent batches never
 * collide.
 */
export class WellLogStore {
  readonly layout: TableLayout;
  private readonly table: TWellLogRow[] = [];
  private currentMaxId = 0;
  private readonly logger: PrepLogger;

  constructor(layout: TableLayout, options: StoreOptions = {}) {
    this.layout = layout;
    this.logger = options.logger ?? silentLogger;
    if (options.rows && options.rows.length > 0) {
      const normalized = options.rows.map((row) => this.normalize(row, "initial rows"));
      this.table.push(...normalized);
      this.currentMaxId = maxWellId(this.table);
    }
  }

  static dataset(options: TDatasetLayoutOptions, storeOptions: StoreOptions = {}): WellLogStore {
    return new WellLogStore(buildDatasetLayout(options), storeOptions);
  }

  static parse(
    text: string,
    layout: TableLayout,
    options: DelimitedReadOptions & { logger?: PrepLogger } = {},
  ): WellLogStore {
    return new WellLogStore(layout, { rows: parseDelimitedTable(text, layout, options), logger: options.logger });
  }

  static read(
    filePath: string,
    layout: TableLayout,
    options: DelimitedReadOptions & { logger?: PrepLogger } = {},
  ): WellLogStore {
    const store = WellLogStore.parse(fs.readFileSync(filePath, "utf8"), layout, options);
    store.logger.info(`Read ${store.size} rows (${store.wellCoordinates().length} wells) from ${filePath}`);
    return store;
  }

  get maxId(): number {
    return this.currentMaxId;
  }

  get size(): number {
    return this.table.length;
  }

  get rows(): ReadonlyArray<Readonly<TWellLogRow>> {
    return this.table;
  }

  /** Brings a row onto the layout: every class (and variance) key, one zone per layer. */
  private normalize(row: TWellLogRow, context: string): TWellLogRow {
    if (!Number.isInteger(row.wellId) || row.wellId < 1) {
      throw new SchemaError(`${context}: well ID must be a positive integer, got ${row.wellId}`);
    }
    for (const name of Object.keys(row.classes)) {
      if (!this.layout.classes.includes(name)) {
        throw new SchemaError(`${context}: invalid class ${name}`);
      }
    }
    const varianceNames = Object.keys(row.variances);
    if (varianceNames.length > 0 && !this.layout.variances) {
      throw new SchemaError(`${context}: layout has no variance columns`);
    }
    for (const name of varianceNames) {
      if (!this.layout.classes.includes(name)) {
        throw new SchemaError(`${context}: invalid variance class ${name}`);
      }
    }
    if (row.zones.length !== this.layout.zoneLayers) {
      throw new SchemaError(
        `${context}: expected ${this.layout.zoneLayers} zone values, got ${row.zones.length}`,
      );
    }
    const out = cloneRow(row);
    out.classes = Object.fromEntries(this.layout.classes.map((name) => [name, row.classes[name] ?? null]));
    out.variances = this.layout.variances
      ? Object.fromEntries(this.layout.classes.map((name) => [name, row.variances[name] ?? null]))
      : {};
    return out;
  }

  /**
   * Appends canonical rows (IDs from 1) with IDs offset by the current maximum.
   * Every row is checked before the table changes. Returns copies of the
   * appended rows.
   */
  merge(canonicalRows: readonly TWellLogRow[]): TWellLogRow[] {
    const offset = this.currentMaxId;
    const prepared = canonicalRows.map((row) => {
      const normalized = this.normalize(row, "merge");
      normalized.wellId = offset + row.wellId;
      return normalized;
    });
    this.table.push(...prepared);
    this.currentMaxId = Math.max(offset, maxWellId(prepared));
    this.logger.info(`Merged ${prepared.length} rows; maximum well ID is now ${this.currentMaxId}`);
    return prepared.map(cloneRow);
  }

  /** Reconciles a raw table against this store's layout, then merges it. */
  addWellsFromTable(rawRows: RawRow[], options: TableIngestOptions = {}): TableIngestResult {
    const result = reconcileIntervals(rawRows, { ...options, layout: this.layout, logger: this.logger });
    const merged = this.merge(result.rows);
    return { ...result, merged };
  }

  /** Appends one well from parallel per-interval lists. */
  addWell(input: AddWellInput): TWellLogRow[] {
    const count = input.depths.length;
    const checkLists = (label: string, lists: Record<string, Array<number | null>> | undefined) => {
      for (const [name, values] of Object.entries(lists ?? {})) {
        if (!this.layout.classes.includes(name)) {
          throw new SchemaError(`invalid class ${name}`);
        }
        if (values.length !== count) {
          throw new ShapeError(`${label} ${name} has ${values.length} values but ${count} depths were given`);
        }
      }
    };
    checkLists("class", input.classes);
    if (input.variances && Object.keys(input.variances).length > 0 && !this.layout.variances) {
      throw new SchemaError("layout has no variance columns");
    }
    checkLists("variance", input.variances);
    if (this.layout.zoneLayers > 0 && input.zones === undefined) {
      throw new SchemaError(`zones in file: ${this.layout.zoneLayers} zone values must be given`);
    }
    const zones = input.zones ?? [];
    if (zones.length !== this.layout.zoneLayers) {
      throw new ShapeError(`expected ${this.layout.zoneLayers} zone values, got ${zones.length}`);
    }

    const rows: TWellLogRow[] = input.depths.map((depth, i) => ({
      location: input.name,
      wellId: 1,
      pointIndex: i + 1,
      x: input.x,
      y: input.y,
      landElevation: input.zland,
      bottomDepth: depth,
      classes: Object.fromEntries(Object.entries(input.classes ?? {}).map(([name, values]) => [name, values[i] ?? null])),
      variances: Object.fromEntries(
        Object.entries(input.variances ?? {}).map(([name, values]) => [name, values[i] ?? null]),
      ),
      zones: [...zones],
    }));
    return this.merge(assignPointIndices(rows));
  }

  /** Distinct (well, x, y) in the order first seen. */
  wellCoordinates(): WellCoordinate[] {
    const seen = new Set<string>();
    const coords: WellCoordinate[] = [];
    for (const row of this.table) {
      const key = JSON.stringify([row.wellId, row.x, row.y]);
      if (seen.has(key)) continue;
      seen.add(key);
      coords.push({ wellId: row.wellId, x: row.x, y: row.y });
    }
    return coords;
  }

  toDelimited(options: DelimitedWriteOptions = {}): string {
    return renderDelimitedTable(this.layout, this.table, options);
  }

  write(filePath: string, options: DelimitedWriteOptions = {}): void {
    fs.writeFileSync(filePath, this.toDelimited(options));
    this.logger.info(`Wrote ${this.size} rows to ${filePath}`);
  }
}
