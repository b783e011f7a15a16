import { z } from "zod";
import { SchemaError } from "./prep-errors";

export const WellLogRow = z.object({
  location: z.string(),
  wellId: z.number().int().positive(),
  pointIndex: z.number().int().positive(),
  x: z.number(),
  y: z.number(),
  landElevation: z.number(),
  bottomDepth: z.number(),
  topDepth: z.number().nullable().optional(),
  classes: z.record(z.string(), z.number().nullable()),
  variances: z.record(z.string(), z.number().nullable()),
  zones: z.array(z.number().nullable()),
});

export type TWellLogRow = z.infer<typeof WellLogRow>;

export type CoreField =
  | "location"
  | "wellId"
  | "pointIndex"
  | "x"
  | "y"
  | "landElevation"
  | "bottomDepth";

export type ColumnSource =
  | { type: "core"; field: CoreField }
  | { type: "class"; name: string }
  | { type: "variance"; name: string }
  | { type: "zone"; layer: number };

export type ColumnKind = "string" | "integer" | "float";

export type ColumnDef = {
  /** Internal name, e.g. `hsu_2`. */
  key: string;
  /** Header label written to file, e.g. `2` for zone layers. */
  label: string;
  kind: ColumnKind;
  source: ColumnSource;
};

export type TableLayoutName = "dataset" | "well_log";

export type TableLayout = {
  name: TableLayoutName;
  columns: ColumnDef[];
  classes: string[];
  variances: boolean;
  zoneLayers: number;
};

export type CellValue = string | number | null;

const core = (key: string, field: CoreField, kind: ColumnKind): ColumnDef => ({
  key,
  label: key,
  kind,
  source: { type: "core", field },
});

const zoneColumns = (prefix: string, layers: number): ColumnDef[] =>
  Array.from({ length: layers }, (_, i) => ({
    key: `${prefix}${i + 1}`,
    label: String(i + 1),
    kind: "integer" as const,
    source: { type: "zone" as const, layer: i + 1 },
  }));

export const varianceKey = (className: string): string => `${className}_var`;
export const hsuKey = (layer: number): string => `hsu_${layer}`;

export const DatasetLayoutOptions = z.object({
  classes: z.array(z.string().min(1)),
  variances: z.boolean().default(false),
  hsus: z.boolean().default(false),
  layers: z.number().int().min(0).default(0),
});

export type TDatasetLayoutOptions = z.input<typeof DatasetLayoutOptions>;

const CORE_DATASET_KEYS = ["Location", "ID", "n", "X", "Y", "Zland", "Depth"];

const parseOptions = <T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new SchemaError(`invalid ${label} layout options: ${detail}`);
  }
  return parsed.data;
};

/**
 * Layout of the dataset file consumed by the interpolator:
 * `Location ID n X Y Zland Depth <classes> [<class>_var] [1..nlay]`.
 */
export function buildDatasetLayout(input: TDatasetLayoutOptions): TableLayout {
  const opts = parseOptions(DatasetLayoutOptions, input, "dataset");
  if (opts.hsus && opts.layers === 0) {
    throw new SchemaError("layers must be > 0 when hsus are present");
  }
  const seen = new Set(CORE_DATASET_KEYS);
  for (const name of opts.classes) {
    if (seen.has(name)) {
      throw new SchemaError(`duplicate or reserved class name "${name}"`);
    }
    seen.add(name);
  }

  const columns: ColumnDef[] = [
    core("Location", "location", "string"),
    core("ID", "wellId", "integer"),
    core("n", "pointIndex", "integer"),
    core("X", "x", "float"),
    core("Y", "y", "float"),
    core("Zland", "landElevation", "float"),
    core("Depth", "bottomDepth", "float"),
  ];
  for (const name of opts.classes) {
    columns.push({ key: name, label: name, kind: "float", source: { type: "class", name } });
  }
  if (opts.variances) {
    for (const name of opts.classes) {
      const key = varianceKey(name);
      columns.push({ key, label: key, kind: "float", source: { type: "variance", name } });
    }
  }
  const layers = opts.hsus ? opts.layers : 0;
  columns.push(...zoneColumns("hsu_", layers));

  return {
    name: "dataset",
    columns,
    classes: [...opts.classes],
    variances: opts.variances,
    zoneLayers: layers,
  };
}

export const WellLogLayoutOptions = z.object({
  geozones: z.boolean().default(false),
  layers: z.number().int().min(0).default(0),
});

export type TWellLogLayoutOptions = z.input<typeof WellLogLayoutOptions>;

export const PERCENT_COARSE = "PC";

/** Older single-class log file: `WellName Well Point PC X Y Zland Depth [1..nlay]`. */
export function buildWellLogLayout(input: TWellLogLayoutOptions = {}): TableLayout {
  const opts = parseOptions(WellLogLayoutOptions, input, "well log");
  if (opts.geozones && opts.layers === 0) {
    throw new SchemaError("layers must be > 0 when geozones are present");
  }
  const layers = opts.geozones ? opts.layers : 0;
  return {
    name: "well_log",
    columns: [
      core("WellName", "location", "string"),
      core("Well", "wellId", "integer"),
      core("Point", "pointIndex", "integer"),
      { key: PERCENT_COARSE, label: PERCENT_COARSE, kind: "float", source: { type: "class", name: PERCENT_COARSE } },
      core("X", "x", "float"),
      core("Y", "y", "float"),
      core("Zland", "landElevation", "float"),
      core("Depth", "bottomDepth", "float"),
      ...zoneColumns("zone_", layers),
    ],
    classes: [PERCENT_COARSE],
    variances: false,
    zoneLayers: layers,
  };
}

export function readCell(row: TWellLogRow, column: ColumnDef): CellValue {
  const { source } = column;
  switch (source.type) {
    case "core":
      return row[source.field];
    case "class":
      return row.classes[source.name] ?? null;
    case "variance":
      return row.variances[source.name] ?? null;
    case "zone":
      return row.zones[source.layer - 1] ?? null;
  }
}

export const cloneRow = (row: TWellLogRow): TWellLogRow => ({
  ...row,
  classes: { ...row.classes },
  variances: { ...row.variances },
  zones: [...row.zones],
});
