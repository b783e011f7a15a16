import { describe, expect, it, vi } from "vitest";
import { fixed } from "@shared/number-format";
import { ParameterCatalog } from "@shared/parameter-catalog";
import { createPilotPoint } from "@shared/pilot-points";
import {
  placeholderToken,
  renderPilotPointLine,
  renderSectionHeader,
  renderStringLine,
  renderValueLine,
} from "../tools/templated-serializer";

const sillCatalog = () => new ParameterCatalog([{ key: "sill", value: 1, format: fixed(4) }]);

const aquiferPoint = () =>
  createPilotPoint({
    x: 1000,
    y: 2000,
    KCMin: 1.5,
    deltaKC: 10,
    KFMin: 0.01,
    deltaKF: 0.5,
    storage: { SsC: 1e-5, SsF: 2e-5, SyC: 0.1, SyF: 0.05 },
  });

describe("renderValueLine", () => {
  it("pads the value to column 40 before the comment", () => {
    const line = renderValueLine({ value: 1, format: fixed(4), description: "Sill" });

    expect(line).toBe(` 1.0000${" ".repeat(33)}/ Sill\n`);
    expect(line.indexOf("/")).toBe(40);
  });

  it("writes the literal value when the parameter is not selected", () => {
    const catalog = sillCatalog();
    const line = renderValueLine({
      value: 1,
      format: fixed(4),
      description: "Sill",
      parameterKey: "sill",
      catalog,
      templateMode: true,
    });

    expect(line).toBe(` 1.0000${" ".repeat(33)}/ Sill\n`);
  });

  it("substitutes a placeholder after the leading space for selected parameters in template mode", () => {
    const catalog = sillCatalog();
    catalog.selectForEstimation(["sill"]);
    const line = renderValueLine({
      value: 1,
      format: fixed(4),
      description: "Sill",
      parameterKey: "sill",
      catalog,
      templateMode: true,
      delimiter: "$",
    });

    const token = `$ sill${" ".repeat(8)} $`;
    expect(line).toBe(` ${token}${" ".repeat(40 - 1 - token.length)}/ Sill\n`);
  });

  it("keeps the literal value outside template mode even when selected", () => {
    const catalog = sillCatalog();
    catalog.selectForEstimation(["sill"]);

    expect(renderValueLine({ value: 1, format: fixed(4), description: "Sill", parameterKey: "sill", catalog })).toBe(
      ` 1.0000${" ".repeat(33)}/ Sill\n`,
    );
  });

  it("uses the display name override and the configured delimiter", () => {
    const catalog = sillCatalog();
    catalog.selectForEstimation(["sill"]);
    catalog.renameForEstimation({ sill: "vg_sill" });
    const line = renderValueLine({
      value: 1,
      format: fixed(4),
      description: "Sill",
      parameterKey: "sill",
      catalog,
      templateMode: true,
      delimiter: "#",
    });

    expect(line.startsWith(" # vg_sill      #")).toBe(true);
  });

  it("appends the comment directly when the value already passes column 40", () => {
    const onOverflow = vi.fn();
    const longPath = `C:/models/${"x".repeat(40)}.dat`;
    const line = renderStringLine(longPath, "Well Log File", onOverflow);

    expect(line).toBe(` ${longPath}/ Well Log File\n`);
    expect(onOverflow).toHaveBeenCalledWith(` ${longPath}`);
  });

  it("treats a prefix ending exactly at column 40 as fitting", () => {
    const onOverflow = vi.fn();
    const name = "x".repeat(39);
    const line = renderStringLine(name, "Name File", onOverflow);

    expect(line).toBe(` ${name}/ Name File\n`);
    expect(line.indexOf("/")).toBe(40);
    expect(onOverflow).not.toHaveBeenCalled();
    renderStringLine(`${name}y`, "Name File", onOverflow);
    expect(onOverflow).toHaveBeenCalledTimes(1);
  });

  it("writes None for absent paths", () => {
    expect(renderStringLine(null, "GW Template File")).toBe(` None${" ".repeat(35)}/ GW Template File\n`);
  });
});

describe("placeholderToken", () => {
  it("left-justifies the name to twelve characters", () => {
    expect(placeholderToken("KCMin_01")).toBe("$ KCMin_01     $");
    expect(placeholderToken("a_very_long_name", "@")).toBe("@ a_very_long_name @");
  });
});

describe("renderSectionHeader", () => {
  it("wraps the title in dividers", () => {
    const divider = `*${"-".repeat(79)}`;
    expect(renderSectionHeader("Global Settings")).toBe(`${divider}\n* Global Settings\n${divider}\n`);
  });
});

describe("renderPilotPointLine", () => {
  it("writes aquifer points with storage terms in scientific notation", () => {
    expect(renderPilotPointLine(aquiferPoint(), 0)).toBe(
      "1000.00 2000.00 1.50 10.00 0.01 0.50 1.000e-05 2.000e-05 1.000e-01 5.000e-02 10.00 10.00 1\n",
    );
  });

  it("writes aquitard points without storage terms", () => {
    const point = createPilotPoint({ x: 1, y: 2, KCMin: 3, deltaKC: 4, KFMin: 5, deltaKF: 6, AnisoC: 2, zone: 3 });

    expect(point.kind).toBe("aquitard");
    expect(renderPilotPointLine(point, 0)).toBe("1.00 2.00 3.00 4.00 5.00 6.00 2.00 10.00 3\n");
  });

  it("numbers placeholders by 1-based position", () => {
    const point = aquiferPoint();
    point.parameters.selectForEstimation(["KCMin", "SyF"]);

    expect(renderPilotPointLine(point, 0, { templateMode: true, delimiter: "$" })).toBe(
      "1000.00 2000.00 $ KCMin_01     $ 10.00 0.01 0.50 1.000e-05 2.000e-05 1.000e-01 $ SyF_01       $ 10.00 10.00 1\n",
    );
    expect(renderPilotPointLine(point, 11, { templateMode: true })).toContain("$ KCMin_12     $");
  });

  it("uses renamed parameters as the placeholder stem", () => {
    const point = aquiferPoint();
    point.parameters.selectForEstimation(["KCMin"]);
    point.parameters.renameForEstimation({ KCMin: "kc" });

    expect(renderPilotPointLine(point, 2, { templateMode: true })).toContain("$ kc_03        $");
  });
});
