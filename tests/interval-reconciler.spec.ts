import { describe, expect, it } from "vitest";
import { SchemaError } from "@shared/prep-errors";
import { buildDatasetLayout, type TWellLogRow } from "@shared/well-log";
import { reconcileIntervals, type RawRow } from "../tools/interval-reconciler";
import { createMemoryLogger } from "../tools/prep-log";

const layout = buildDatasetLayout({ classes: ["Sand"] });

const raw = (name: string, x: number, y: number, top: number | null, bottom: number, sand: number | null): RawRow => ({
  Name: name,
  X: x,
  Y: y,
  Zland: 100,
  Top: top,
  Depth: bottom,
  Sand: sand,
});

const toRaw = (rows: TWellLogRow[]): RawRow[] =>
  rows.map((row) => ({
    Name: row.location,
    X: row.x,
    Y: row.y,
    Zland: row.landElevation,
    Top: row.topDepth ?? null,
    Depth: row.bottomDepth,
    Sand: row.classes.Sand ?? null,
  }));

describe("reconcileIntervals", () => {
  it("fills the gap between two intervals with a missing-valued row", () => {
    const result = reconcileIntervals([raw("W1", 10, 20, 0, 5, 0.8), raw("W1", 10, 20, 8, 12, 0.3)], {
      layout,
      depthTopCol: "Top",
    });

    expect(result.insertedGaps).toBe(1);
    expect(result.rows.map((row) => row.bottomDepth)).toEqual([5, 8, 12]);
    expect(result.rows.map((row) => row.pointIndex)).toEqual([1, 2, 3]);
    expect(result.rows[1]).toMatchObject({
      location: "W1",
      wellId: 1,
      topDepth: 5,
      bottomDepth: 8,
      classes: { Sand: null },
    });
    expect(result.rows[2]?.classes.Sand).toBe(0.3);
  });

  it("inserts a gap row from the ground surface when the first top is below zero depth", () => {
    const result = reconcileIntervals([raw("W1", 10, 20, 2, 6, 0.5)], { layout, depthTopCol: "Top" });

    expect(result.rows.map((row) => [row.topDepth, row.bottomDepth, row.classes.Sand])).toEqual([
      [0, 2, null],
      [2, 6, 0.5],
    ]);
  });

  it("gives each distinct (name, x, y) one dense id in first-seen order", () => {
    const result = reconcileIntervals(
      [
        raw("A", 1, 1, null, 5, 0.1),
        raw("B", 2, 2, null, 5, 0.2),
        raw("A", 1, 1, null, 10, 0.3),
        raw("A", 9, 9, null, 5, 0.4),
      ],
      { layout },
    );

    expect(result.wellCount).toBe(3);
    const byId = result.rows.map((row) => [row.wellId, row.location, row.x, row.bottomDepth]);
    expect(byId).toEqual([
      [1, "A", 1, 5],
      [1, "A", 1, 10],
      [2, "B", 2, 5],
      [3, "A", 9, 5],
    ]);
  });

  it("numbers points 1..k per well in ascending bottom depth", () => {
    const result = reconcileIntervals(
      [raw("W", 0, 0, null, 30, 1), raw("W", 0, 0, null, 10, 2), raw("W", 0, 0, null, 20, 3)],
      { layout },
    );

    expect(result.rows.map((row) => [row.pointIndex, row.bottomDepth, row.classes.Sand])).toEqual([
      [1, 10, 2],
      [2, 20, 3],
      [3, 30, 1],
    ]);
  });

  it("adds nothing on a second pass over gap-free output", () => {
    const first = reconcileIntervals(
      [raw("W1", 10, 20, 0, 5, 0.8), raw("W1", 10, 20, 8, 12, 0.3), raw("W2", 5, 5, 3, 4, 0.1)],
      { layout, depthTopCol: "Top" },
    );
    expect(first.insertedGaps).toBe(2);

    const second = reconcileIntervals(toRaw(first.rows), { layout, depthTopCol: "Top" });
    expect(second.insertedGaps).toBe(0);
    expect(second.rows).toHaveLength(first.rows.length);
  });

  it("does not correct overlapping intervals", () => {
    const result = reconcileIntervals([raw("W", 0, 0, 0, 10, 1), raw("W", 0, 0, 4, 12, 2)], {
      layout,
      depthTopCol: "Top",
    });

    expect(result.insertedGaps).toBe(0);
    expect(result.rows).toHaveLength(2);
  });

  it("skips gap filling when fillMissing is off or no top column is given", () => {
    const rows = [raw("W1", 10, 20, 0, 5, 0.8), raw("W1", 10, 20, 8, 12, 0.3)];

    expect(reconcileIntervals(rows, { layout, depthTopCol: "Top", fillMissing: false }).rows).toHaveLength(2);
    expect(reconcileIntervals(rows, { layout }).rows).toHaveLength(2);
  });

  it("keeps an explicit point index column as given", () => {
    const rows = [
      { ...raw("W", 0, 0, null, 20, 1), n: 7 },
      { ...raw("W", 0, 0, null, 10, 2), n: 3 },
    ];
    const result = reconcileIntervals(rows, { layout, pointIndexCol: "n" });

    expect(result.rows.map((row) => row.pointIndex)).toEqual([7, 3]);
  });

  it("maps renamed class columns onto layout classes", () => {
    const result = reconcileIntervals([{ Name: "W", X: 0, Y: 0, Zland: 1, Depth: 3, pct_sand: 0.45 }], {
      layout,
      classColumns: { Sand: "pct_sand" },
    });

    expect(result.rows[0]?.classes).toEqual({ Sand: 0.45 });
  });

  it("reports progress through the injected logger", () => {
    const logger = createMemoryLogger();
    reconcileIntervals([raw("W1", 10, 20, 0, 5, 0.8), raw("W1", 10, 20, 8, 12, 0.3)], {
      layout,
      depthTopCol: "Top",
      logger,
    });

    expect(logger.messages).toEqual([
      "Adding 2 entries from 1 wells (1 unique names)",
      "Filling interval gaps...",
      "Inserted 1 gap intervals",
    ]);
  });

  it("returns nothing for an empty batch", () => {
    const logger = createMemoryLogger();
    const result = reconcileIntervals([], { layout, logger });

    expect(result).toEqual({ rows: [], wellCount: 0, insertedGaps: 0 });
    expect(logger.warnings).toEqual(["No rows to add"]);
  });

  describe("validation", () => {
    it("rejects tables without a required column", () => {
      const rows = [{ Name: "W", X: 0, Y: 0, Depth: 5, Sand: 1 }];

      expect(() => reconcileIntervals(rows, { layout })).toThrow(SchemaError);
      expect(() => reconcileIntervals(rows, { layout })).toThrow("missing necessary columns in table: Zland");
    });

    it("rejects classes outside the layout", () => {
      const rows = [raw("W", 0, 0, null, 5, 1)];

      expect(() => reconcileIntervals(rows, { layout, classColumns: { Clay: "Sand" } })).toThrow("invalid class Clay");
    });

    it("rejects a class whose column is absent", () => {
      const rows = [{ Name: "W", X: 0, Y: 0, Zland: 1, Depth: 5 }];

      expect(() => reconcileIntervals(rows, { layout })).toThrow("missing column for class Sand");
    });

    it("requires variance columns when the layout declares them", () => {
      const withVariance = buildDatasetLayout({ classes: ["Sand"], variances: true });
      const rows = [raw("W", 0, 0, null, 5, 1)];

      expect(() => reconcileIntervals(rows, { layout: withVariance })).toThrow(
        "missing variance column for class Sand",
      );
      const ok = reconcileIntervals([{ ...rows[0], Sand_var: 0.02 }], { layout: withVariance });
      expect(ok.rows[0]?.variances).toEqual({ Sand: 0.02 });
    });

    it("requires zone columns when the layout declares layers", () => {
      const zoned = buildDatasetLayout({ classes: ["Sand"], hsus: true, layers: 2 });
      const rows = [{ ...raw("W", 0, 0, null, 5, 1), hsu_1: 4 }];

      expect(() => reconcileIntervals(rows, { layout: zoned })).toThrow("missing column for hsu_2");
      const ok = reconcileIntervals([{ ...rows[0], hsu_2: 6 }], { layout: zoned });
      expect(ok.rows[0]?.zones).toEqual([4, 6]);
    });

    it("rejects non-numeric coordinates", () => {
      const rows = [{ ...raw("W", 0, 0, null, 5, 1), X: "east" }];

      expect(() => reconcileIntervals(rows, { layout })).toThrow('row 1: column X is not numeric ("east")');
    });
  });
});
