import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError, SchemaError } from "@shared/prep-errors";
import { fixed, INTEGER_FORMAT, scientific, type TNumberFormat } from "@shared/number-format";
import { ParameterCatalog } from "@shared/parameter-catalog";
import {
  AQUIFER_PARAMETERS,
  AQUITARD_PARAMETERS,
  createPilotPoint,
  type PilotPoint,
  type PilotPointKind,
  type TPilotPointInput,
  type TStorageParameters,
} from "@shared/pilot-points";
import { silentLogger, type PrepLogger } from "./prep-log";
import {
  DEFAULT_TEMPLATE_DELIMITER,
  DIVIDER,
  HEADER_LINE,
  renderPilotPointLine,
  renderSectionHeader,
  renderStringLine,
  renderValueLine,
  type TemplateOptions,
} from "./templated-serializer";

export const CONTROL_FILE_TITLE = "Texture2Par Input File";
export const DEFAULT_CONTROL_FILE = "Texture2Par.in";
export const FLOAT_PRECISION: TNumberFormat = fixed(4);
export const SCI_PRECISION: TNumberFormat = scientific(4);

export const ControlFileSettings = z.object({
  wellLogFile: z.string().min(1),
  unitFile: z.string().min(1),
  simFile: z.string().min(1),
  preprocFile: z.string().min(1).nullable().optional(),
  templateFile: z.string().min(1).nullable().optional(),
  ppZoneFile: z.string().min(1).nullable().optional(),
  xoff: z.number().default(0.0),
  yoff: z.number().default(0.0),
  rotation: z.number().default(0.0),
  fullOutput: z.boolean().default(false),
  variogramType: z.number().int().default(1),
  sill: z.number().default(1.0),
  rangeMax: z.number().default(1e7),
  rangeMin: z.number().default(1e7),
  anisotropy: z.number().default(0.0),
  nugget: z.number().default(0.0),
  nkrigeWells: z.number().int().positive().default(16),
  KCk: z.number().default(0.007),
  KFk: z.number().default(0.0099),
  KHp: z.number().default(0.93),
  KVp: z.number().default(-0.62),
  Syp: z.number().default(1.0),
});

export type TControlFileSettings = z.output<typeof ControlFileSettings>;
export type TControlFileSettingsInput = z.input<typeof ControlFileSettings>;

export type ModelType = "MODFLOW" | "IWFM";

/** `.nam` name files select MODFLOW; any other simulation file is IWFM. */
export function detectModelType(simFile: string): ModelType {
  return path.extname(simFile).toLowerCase() === ".nam" ? "MODFLOW" : "IWFM";
}

export const GLOBAL_PARAMETERS = [
  "sill",
  "range_max",
  "range_min",
  "anisotropy",
  "nugget",
  "KCk",
  "KFk",
  "KHp",
  "KVp",
  "Syp",
] as const;

export type GlobalParameter = (typeof GLOBAL_PARAMETERS)[number];

const buildGlobalCatalog = (s: TControlFileSettings): ParameterCatalog =>
  new ParameterCatalog([
    { key: "sill", value: s.sill, format: FLOAT_PRECISION },
    { key: "range_max", value: s.rangeMax, format: SCI_PRECISION },
    { key: "range_min", value: s.rangeMin, format: SCI_PRECISION },
    { key: "anisotropy", value: s.anisotropy, format: FLOAT_PRECISION },
    { key: "nugget", value: s.nugget, format: FLOAT_PRECISION },
    { key: "KCk", value: s.KCk, format: FLOAT_PRECISION },
    { key: "KFk", value: s.KFk, format: FLOAT_PRECISION },
    { key: "KHp", value: s.KHp, format: FLOAT_PRECISION },
    { key: "KVp", value: s.KVp, format: FLOAT_PRECISION },
    { key: "Syp", value: s.Syp, format: FLOAT_PRECISION },
  ]);

const VARIOGRAM_LINES: Array<[GlobalParameter, string]> = [
  ["sill", "Sill"],
  ["range_max", "[Maximum] Range"],
  ["range_min", "Minimum Range"],
  ["anisotropy", "Anisotropy Angle (from North)"],
  ["nugget", "Nugget"],
];

const GLOBAL_LINES: GlobalParameter[] = ["KCk", "KFk", "KHp", "KVp", "Syp"];

const SECTION_TITLES = {
  program: "Program Settings (True/False)",
  variogram: "Variogram Settings",
  global: "Global Settings",
  aquifer: "Pilot Points - X  Y  KCMin  deltaKC  KFMin  deltaKF  SsC  SsF  SyC  SyF  AnisoC  AnisoF  Zone",
  aquitard: "Aquitard Pilot Points - X  Y  KCMin  deltaKC  KFMin  deltaKF  AnisoC  AnisoF  Zone",
};

export type ControlFileOptions = {
  logger?: PrepLogger;
};

export type AquitardPilotPointInput = Omit<TPilotPointInput, "storage">;

/**
 * In-memory model of the interpolator control file: paths, model type,
 * variogram and global settings, and the aquifer / aquitard pilot points.
 * Rendering never mutates the model.
 */
export class ControlFile {
  readonly settings: TControlFileSettings;
  readonly modelType: ModelType;
  readonly globals: ParameterCatalog;
  private readonly aquifer: PilotPoint[] = [];
  private readonly aquitard: PilotPoint[] = [];
  private readonly logger: PrepLogger;

  constructor(settings: TControlFileSettingsInput, options: ControlFileOptions = {}) {
    this.settings = ControlFileSettings.parse(settings);
    this.logger = options.logger ?? silentLogger;
    this.modelType = detectModelType(this.settings.simFile);
    if (this.modelType === "IWFM" && !this.settings.preprocFile) {
      throw new ConfigError("pre-processor file cannot be empty for IWFM");
    }
    this.logger.info(`Detected Model Type is: ${this.modelType}`);
    this.globals = buildGlobalCatalog(this.settings);
  }

  get aquiferPilotPoints(): readonly PilotPoint[] {
    return this.aquifer;
  }

  get aquitardPilotPoints(): readonly PilotPoint[] {
    return this.aquitard;
  }

  get pilotPointCounts(): { aquifer: number; aquitard: number } {
    return { aquifer: this.aquifer.length, aquitard: this.aquitard.length };
  }

  /** Points with storage parameters join the aquifer list, the others the aquitard list. */
  addPilotPoint(input: TPilotPointInput): PilotPoint {
    const point = createPilotPoint(input);
    (point.kind === "aquifer" ? this.aquifer : this.aquitard).push(point);
    return point;
  }

  addAquiferPilotPoint(input: AquitardPilotPointInput & { storage: TStorageParameters }): PilotPoint {
    return this.addPilotPoint(input);
  }

  addAquitardPilotPoint(input: AquitardPilotPointInput): PilotPoint {
    return this.addPilotPoint({ ...input, storage: undefined });
  }

  selectForEstimation(names: Iterable<string>): void {
    this.globals.selectForEstimation(names);
  }

  renameForEstimation(names: Record<string, string>): void {
    this.globals.renameForEstimation(names);
  }

  /** Flags the named parameters on every pilot point of one list. */
  selectPilotPointParameters(names: Iterable<string>, kind: PilotPointKind = "aquifer"): void {
    const list = [...names];
    this.checkPilotPointNames(list, kind);
    for (const point of this.pointsOf(kind)) point.parameters.selectForEstimation(list);
  }

  renamePilotPointParameters(names: Record<string, string>, kind: PilotPointKind = "aquifer"): void {
    this.checkPilotPointNames(Object.keys(names), kind);
    for (const point of this.pointsOf(kind)) point.parameters.renameForEstimation(names);
  }

  describeParameters(): string[] {
    return this.globals.describe();
  }

  render(options: TemplateOptions = {}): string {
    const templateMode = options.templateMode ?? false;
    const delimiter = options.delimiter ?? DEFAULT_TEMPLATE_DELIMITER;
    const s = this.settings;
    const onOverflow = (prefix: string) =>
      this.logger.warn(`control file value runs past column 40: "${prefix.trim()}"`);
    const value = (key: GlobalParameter, description: string) =>
      renderValueLine({
        value: this.globals.value(key),
        format: this.globals.get(key).format,
        description,
        parameterKey: key,
        catalog: this.globals,
        templateMode,
        delimiter,
        onOverflow,
      });
    const literal = (v: number, format: TNumberFormat, description: string) =>
      renderValueLine({ value: v, format, description, onOverflow });
    const text = (v: string | null | undefined, description: string) => renderStringLine(v, description, onOverflow);

    const out: string[] = [];
    if (templateMode) out.push(`ptf ${delimiter}\n`);
    out.push(`${HEADER_LINE}\n`, `* ${CONTROL_FILE_TITLE}\n`, `${HEADER_LINE}\n`);
    out.push(
      text(this.modelType, "Model Type"),
      text(s.wellLogFile, "Well Log File"),
      text(s.unitFile, "Hydrogeologic Units File"),
    );

    out.push(renderSectionHeader(`Model Settings (${this.modelType})`));
    let interpPoint: string;
    if (this.modelType === "IWFM") {
      out.push(
        text(s.simFile, "Simulation File"),
        text(s.preprocFile, "Pre-processor File"),
        text(s.templateFile, "GW Template File"),
        text(s.ppZoneFile, "Pilot Point Node Zones File"),
      );
      interpPoint = "Node";
    } else {
      out.push(
        text(s.simFile, "Name File"),
        text(s.templateFile, "Layer Parameter Template File"),
        text(s.ppZoneFile, "Pilot Point Node Zones File"),
        literal(s.xoff, FLOAT_PRECISION, "xOffset"),
        literal(s.yoff, FLOAT_PRECISION, "yOffset"),
        literal(s.rotation, FLOAT_PRECISION, "Rotation"),
      );
      interpPoint = "Cell";
    }

    out.push(renderSectionHeader(SECTION_TITLES.program));
    out.push(text(s.fullOutput ? "True" : "False", `Output ${interpPoint} Files`));

    out.push(renderSectionHeader(SECTION_TITLES.variogram));
    out.push(literal(s.variogramType, INTEGER_FORMAT, "Variogram Type (itype)"));
    for (const [key, description] of VARIOGRAM_LINES) out.push(value(key, description));
    out.push(literal(s.nkrigeWells, INTEGER_FORMAT, "[Maximum] Wells used in kriging"));

    out.push(renderSectionHeader(SECTION_TITLES.global));
    for (const key of GLOBAL_LINES) out.push(value(key, key));

    out.push(renderSectionHeader(SECTION_TITLES.aquifer));
    this.aquifer.forEach((point, i) => out.push(renderPilotPointLine(point, i, { templateMode, delimiter })));
    out.push(renderSectionHeader(SECTION_TITLES.aquitard));
    this.aquitard.forEach((point, i) => out.push(renderPilotPointLine(point, i, { templateMode, delimiter })));

    out.push(`${DIVIDER}\n`, "* EOF\n");
    return out.join("");
  }

  write(filePath = DEFAULT_CONTROL_FILE, options: TemplateOptions = {}): void {
    fs.writeFileSync(filePath, this.render(options));
    const kind = options.templateMode ? "template" : "control";
    this.logger.info(
      `Wrote ${kind} file ${filePath} (${this.aquifer.length} aquifer / ${this.aquitard.length} aquitard pilot points)`,
    );
  }

  private pointsOf(kind: PilotPointKind): PilotPoint[] {
    return kind === "aquifer" ? this.aquifer : this.aquitard;
  }

  private checkPilotPointNames(names: string[], kind: PilotPointKind): void {
    const allowed: readonly string[] = kind === "aquifer" ? AQUIFER_PARAMETERS : AQUITARD_PARAMETERS;
    const unknown = names.filter((name) => !allowed.includes(name));
    if (unknown.length > 0) {
      throw new SchemaError(`unknown ${kind} pilot point parameter(s) ${unknown.join(", ")}`);
    }
  }
}
