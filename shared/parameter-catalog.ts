import { z } from "zod";
import { SchemaError } from "./prep-errors";
import { NumberFormat, type TNumberFormat } from "./number-format";

export const ParameterValue = z.union([z.number(), z.string(), z.boolean(), z.null()]);
export type TParameterValue = z.infer<typeof ParameterValue>;

export const ParameterSeed = z.object({
  key: z.string().min(1),
  value: ParameterValue,
  format: NumberFormat,
  estimate: z.boolean().default(false),
  displayName: z.string().min(1).optional(),
});

export type TParameterSeed = z.input<typeof ParameterSeed>;

export type ParameterRecord = {
  key: string;
  value: TParameterValue;
  format: TNumberFormat;
  estimate: boolean;
  displayName?: string;
};

/**
 * Ordered set of named scalar parameters. Each record carries its value, its
 * display format, whether it is handed to the estimation tool, and an
 * optional placeholder name that replaces the key in template files.
 */
export class ParameterCatalog {
  private readonly records: ParameterRecord[];
  private readonly index = new Map<string, ParameterRecord>();

  constructor(seeds: TParameterSeed[]) {
    this.records = seeds.map((seed) => ParameterSeed.parse(seed));
    for (const record of this.records) {
      if (this.index.has(record.key)) {
        throw new SchemaError(`duplicate parameter ${record.key}`);
      }
      this.index.set(record.key, record);
    }
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  get(key: string): Readonly<ParameterRecord> {
    return this.require(key);
  }

  value(key: string): TParameterValue {
    return this.require(key).value;
  }

  setValue(key: string, value: TParameterValue): void {
    this.require(key).value = value;
  }

  isSelected(key: string): boolean {
    return this.require(key).estimate;
  }

  /** Marks parameters for estimation. Unknown names reject the whole call. */
  selectForEstimation(names: Iterable<string>): void {
    const records = this.requireAll(names);
    for (const record of records) record.estimate = true;
  }

  clearEstimation(names?: Iterable<string>): void {
    const records = names === undefined ? this.records : this.requireAll(names);
    for (const record of records) record.estimate = false;
  }

  /** Overrides the placeholder token of each key; the catalog key is unchanged. */
  renameForEstimation(names: Record<string, string>): void {
    const entries = Object.entries(names);
    const blank = entries.find(([, displayName]) => displayName.trim() === "");
    if (blank) {
      throw new SchemaError(`empty display name for ${blank[0]}`);
    }
    this.requireAll(entries.map(([key]) => key));
    for (const [key, displayName] of entries) {
      this.require(key).displayName = displayName;
    }
  }

  placeholderName(key: string): string {
    const record = this.require(key);
    return record.displayName ?? record.key;
  }

  listParameters(): string[] {
    return this.records.map((record) => record.key);
  }

  listSelected(): string[] {
    return this.records.filter((record) => record.estimate).map((record) => record.key);
  }

  entries(): ReadonlyArray<Readonly<ParameterRecord>> {
    return this.records;
  }

  describe(): string[] {
    return [
      `Available Parameters: ${this.listParameters().join(", ")}`,
      `Parameters set to estimation: ${this.listSelected().join(", ")}`,
    ];
  }

  private require(key: string): ParameterRecord {
    const record = this.index.get(key);
    if (!record) {
      throw new SchemaError(`unknown parameter ${key} (available: ${this.listParameters().join(", ")})`);
    }
    return record;
  }

  private requireAll(keys: Iterable<string>): ParameterRecord[] {
    const list = [...keys];
    const unknown = list.filter((key) => !this.index.has(key));
    if (unknown.length > 0) {
      throw new SchemaError(`unknown parameter(s) ${unknown.join(", ")}`);
    }
    return list.map((key) => this.require(key));
  }
}
