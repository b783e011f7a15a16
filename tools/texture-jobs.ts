import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "@shared/prep-errors";
import { DatasetLayoutOptions, buildDatasetLayout } from "@shared/well-log";
import { PilotPointInput, StorageParameters } from "@shared/pilot-points";
import { ControlFile, ControlFileSettings, DEFAULT_CONTROL_FILE } from "./control-file";
import type { PrepConfig } from "./prep-config";
import { silentLogger, type PrepLogger } from "./prep-log";
import { readRawTable } from "./raw-table";
import { WellLogStore, type TableIngestResult } from "./well-log-store";

export const IngestSource = z.object({
  path: z.string().min(1),
  delimiter: z.string().min(1).optional(),
  nameCol: z.string().optional(),
  xCol: z.string().optional(),
  yCol: z.string().optional(),
  zlandCol: z.string().optional(),
  depthCol: z.string().optional(),
  depthTopCol: z.string().optional(),
  pointIndexCol: z.string().optional(),
  fillMissing: z.boolean().optional(),
  classColumns: z.record(z.string(), z.string()).optional(),
  varianceColumns: z.record(z.string(), z.string()).optional(),
  zoneColumns: z.array(z.string()).optional(),
});

export const IngestJob = z.object({
  layout: DatasetLayoutOptions,
  sources: z.array(IngestSource).min(1),
  output: z.string().min(1),
  /** Dataset file to extend; its wells keep their IDs. */
  existing: z.string().min(1).optional(),
});

export type TIngestJob = z.infer<typeof IngestJob>;

export type IngestReport = {
  output: string;
  rows: number;
  wells: number;
  maxId: number;
  batches: Array<Pick<TableIngestResult, "wellCount" | "insertedGaps"> & { source: string; rows: number }>;
};

const resolveFrom = (baseDir: string, file: string): string => path.resolve(baseDir, file);

export function runIngestJob(
  job: TIngestJob,
  config: PrepConfig,
  options: { baseDir?: string; logger?: PrepLogger } = {},
): IngestReport {
  const baseDir = options.baseDir ?? process.cwd();
  const logger = options.logger ?? silentLogger;
  const layout = buildDatasetLayout(job.layout);
  const store = job.existing
    ? WellLogStore.read(resolveFrom(baseDir, job.existing), layout, {
        delimiter: config.delimiter,
        missingMarkers: config.missingMarkers,
        logger,
      })
    : new WellLogStore(layout, { logger });

  const batches: IngestReport["batches"] = [];
  for (const source of job.sources) {
    const sourcePath = resolveFrom(baseDir, source.path);
    const { path: _path, delimiter, ...columns } = source;
    const raw = readRawTable(sourcePath, {
      delimiter: delimiter ?? config.delimiter,
      missingMarkers: config.missingMarkers,
    });
    logger.info(`Read ${raw.length} raw rows from ${sourcePath}`);
    const result = store.addWellsFromTable(raw, columns);
    batches.push({
      source: sourcePath,
      rows: result.merged.length,
      wellCount: result.wellCount,
      insertedGaps: result.insertedGaps,
    });
  }

  const output = resolveFrom(baseDir, job.output);
  store.write(output, {
    delimiter: config.delimiter,
    missingMarker: config.missingMarker,
    floatFormat: config.floatFormat,
  });
  return {
    output,
    rows: store.size,
    wells: store.wellCoordinates().length,
    maxId: store.maxId,
    batches,
  };
}

const AquiferPilotPointInput = PilotPointInput.extend({ storage: StorageParameters });
const AquitardPilotPointInput = PilotPointInput.omit({ storage: true });

const ParameterSelection = z.object({
  globals: z.array(z.string()).default([]),
  aquifer: z.array(z.string()).default([]),
  aquitard: z.array(z.string()).default([]),
});

const ParameterRenames = z.object({
  globals: z.record(z.string(), z.string()).default({}),
  aquifer: z.record(z.string(), z.string()).default({}),
  aquitard: z.record(z.string(), z.string()).default({}),
});

export const ControlJob = z.object({
  settings: ControlFileSettings,
  output: z.string().min(1).optional(),
  template: z
    .object({
      output: z.string().min(1),
      delimiter: z.string().length(1).optional(),
    })
    .optional(),
  pilotPoints: z
    .object({
      aquifer: z.array(AquiferPilotPointInput).default([]),
      aquitard: z.array(AquitardPilotPointInput).default([]),
    })
    .default({}),
  estimate: ParameterSelection.default({}),
  rename: ParameterRenames.default({}),
});

export type TControlJob = z.infer<typeof ControlJob>;
export type TControlJobInput = z.input<typeof ControlJob>;

export type ControlReport = {
  modelType: ControlFile["modelType"];
  written: string[];
  pilotPoints: { aquifer: number; aquitard: number };
  selected: string[];
};

/** Builds the control file model from a job and writes the value and/or template files. */
export function buildControlFile(job: TControlJob, logger: PrepLogger = silentLogger): ControlFile {
  const control = new ControlFile(job.settings, { logger });
  for (const point of job.pilotPoints.aquifer) control.addAquiferPilotPoint(point);
  for (const point of job.pilotPoints.aquitard) control.addAquitardPilotPoint(point);
  control.selectForEstimation(job.estimate.globals);
  control.renameForEstimation(job.rename.globals);
  control.selectPilotPointParameters(job.estimate.aquifer, "aquifer");
  control.renamePilotPointParameters(job.rename.aquifer, "aquifer");
  control.selectPilotPointParameters(job.estimate.aquitard, "aquitard");
  control.renamePilotPointParameters(job.rename.aquitard, "aquitard");
  return control;
}

export function runControlJob(
  job: TControlJob,
  config: PrepConfig,
  options: { baseDir?: string; logger?: PrepLogger } = {},
): ControlReport {
  const baseDir = options.baseDir ?? process.cwd();
  const logger = options.logger ?? silentLogger;
  const control = buildControlFile(job, logger);
  for (const line of control.describeParameters()) logger.info(line);

  const written: string[] = [];
  if (job.output || !job.template) {
    const output = resolveFrom(baseDir, job.output ?? DEFAULT_CONTROL_FILE);
    control.write(output);
    written.push(output);
  }
  if (job.template) {
    const output = resolveFrom(baseDir, job.template.output);
    control.write(output, {
      templateMode: true,
      delimiter: job.template.delimiter ?? config.placeholderDelimiter,
    });
    written.push(output);
  }
  return {
    modelType: control.modelType,
    written,
    pilotPoints: control.pilotPointCounts,
    selected: control.globals.listSelected(),
  };
}

export function loadJobFile<T extends z.ZodTypeAny>(schema: T, filePath: string): z.output<T> {
  const text = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`job file ${filePath} is not valid JSON: ${reason}`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "job"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid job file ${filePath}: ${detail}`);
  }
  return parsed.data;
}
