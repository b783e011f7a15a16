import { describe, expect, it } from "vitest";
import { SchemaError, ShapeError } from "@shared/prep-errors";
import { addPercentCoarseWell, createWellLogFile } from "../tools/well-log-file";

describe("percent coarse well log file", () => {
  it("writes the single-class layout with geozone layers", () => {
    const file = createWellLogFile({ geozones: true, layers: 2 });
    addPercentCoarseWell(file, {
      name: "W-7",
      x: 1,
      y: 2,
      zland: 3,
      pc: [25, 80],
      depths: [4, 9],
      geozones: [1, 2],
    });

    expect(file.toDelimited().split("\n")).toEqual([
      "WellName\tWell\tPoint\tPC\tX\tY\tZland\tDepth\t1\t2",
      "W-7\t1\t1\t25.00000\t1.00000\t2.00000\t3.00000\t4.00000\t1\t2",
      "W-7\t1\t2\t80.00000\t1.00000\t2.00000\t3.00000\t9.00000\t1\t2",
      "",
    ]);
  });

  it("gives each added well the next id", () => {
    const file = createWellLogFile();
    addPercentCoarseWell(file, { name: "A", x: 0, y: 0, zland: 0, pc: [10], depths: [1] });
    const rows = addPercentCoarseWell(file, { name: "B", x: 5, y: 5, zland: 0, pc: [20, 30], depths: [1, 2] });

    expect(rows.map((row) => [row.wellId, row.pointIndex])).toEqual([
      [2, 1],
      [2, 2],
    ]);
  });

  it("rejects mismatched PC and depth lists", () => {
    const file = createWellLogFile();

    expect(() => addPercentCoarseWell(file, { name: "A", x: 0, y: 0, zland: 0, pc: [10, 20], depths: [1, 2, 3] })).toThrow(
      ShapeError,
    );
  });

  it("requires geozones when the file carries them", () => {
    const file = createWellLogFile({ geozones: true, layers: 1 });

    expect(() => addPercentCoarseWell(file, { name: "A", x: 0, y: 0, zland: 0, pc: [10], depths: [1] })).toThrow(
      SchemaError,
    );
    expect(() => createWellLogFile({ geozones: true })).toThrow("layers must be > 0 when geozones are present");
  });
});
