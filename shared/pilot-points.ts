import { z } from "zod";
import { ParameterCatalog, type TParameterSeed } from "./parameter-catalog";
import { fixed, scientific, type TNumberFormat } from "./number-format";

export const PILOT_POINT_FLOAT_FORMAT: TNumberFormat = fixed(2);
export const PILOT_POINT_SCI_FORMAT: TNumberFormat = scientific(3);

export const StorageParameters = z.object({
  SsC: z.number(),
  SsF: z.number(),
  SyC: z.number(),
  SyF: z.number(),
});

export type TStorageParameters = z.infer<typeof StorageParameters>;

export const PilotPointInput = z.object({
  x: z.number(),
  y: z.number(),
  KCMin: z.number(),
  deltaKC: z.number(),
  KFMin: z.number(),
  deltaKF: z.number(),
  AnisoC: z.number().default(10.0),
  AnisoF: z.number().default(10.0),
  zone: z.number().int().default(1),
  /** Present for aquifer pilot points, absent for aquitard ones. */
  storage: StorageParameters.optional(),
});

export type TPilotPointInput = z.input<typeof PilotPointInput>;

export type PilotPointKind = "aquifer" | "aquitard";

export type PilotPoint = {
  kind: PilotPointKind;
  x: number;
  y: number;
  zone: number;
  /** Estimable values in file order, e.g. KCMin ... SyF AnisoC AnisoF. */
  parameters: ParameterCatalog;
};

export const AQUIFER_PARAMETERS = [
  "KCMin",
  "deltaKC",
  "KFMin",
  "deltaKF",
  "SsC",
  "SsF",
  "SyC",
  "SyF",
  "AnisoC",
  "AnisoF",
] as const;

export const AQUITARD_PARAMETERS = ["KCMin", "deltaKC", "KFMin", "deltaKF", "AnisoC", "AnisoF"] as const;

const flt = (key: string, value: number): TParameterSeed => ({ key, value, format: PILOT_POINT_FLOAT_FORMAT });
const sci = (key: string, value: number): TParameterSeed => ({ key, value, format: PILOT_POINT_SCI_FORMAT });

export function createPilotPoint(input: TPilotPointInput): PilotPoint {
  const p = PilotPointInput.parse(input);
  const seeds: TParameterSeed[] = [
    flt("KCMin", p.KCMin),
    flt("deltaKC", p.deltaKC),
    flt("KFMin", p.KFMin),
    flt("deltaKF", p.deltaKF),
  ];
  if (p.storage) {
    seeds.push(
      sci("SsC", p.storage.SsC),
      sci("SsF", p.storage.SsF),
      sci("SyC", p.storage.SyC),
      sci("SyF", p.storage.SyF),
    );
  }
  seeds.push(flt("AnisoC", p.AnisoC), flt("AnisoF", p.AnisoF));
  return {
    kind: p.storage ? "aquifer" : "aquitard",
    x: p.x,
    y: p.y,
    zone: p.zone,
    parameters: new ParameterCatalog(seeds),
  };
}
