import { PERCENT_COARSE, buildWellLogLayout, type TWellLogLayoutOptions, type TWellLogRow } from "@shared/well-log";
import type { DelimitedReadOptions } from "./delimited-table";
import type { PrepLogger } from "./prep-log";
import { WellLogStore, type StoreOptions } from "./well-log-store";

// Single-class (percent coarse) well log file read by older interpolator builds.

export function createWellLogFile(options: TWellLogLayoutOptions = {}, storeOptions: StoreOptions = {}): WellLogStore {
  return new WellLogStore(buildWellLogLayout(options), storeOptions);
}

export function readWellLogFile(
  filePath: string,
  options: TWellLogLayoutOptions = {},
  readOptions: DelimitedReadOptions & { logger?: PrepLogger } = {},
): WellLogStore {
  return WellLogStore.read(filePath, buildWellLogLayout(options), readOptions);
}

export type PercentCoarseWell = {
  name: string;
  x: number;
  y: number;
  zland: number;
  pc: Array<number | null>;
  depths: number[];
  geozones?: Array<number | null>;
};

export function addPercentCoarseWell(file: WellLogStore, well: PercentCoarseWell): TWellLogRow[] {
  return file.addWell({
    name: well.name,
    x: well.x,
    y: well.y,
    zland: well.zland,
    depths: well.depths,
    classes: { [PERCENT_COARSE]: well.pc },
    zones: well.geozones,
  });
}
