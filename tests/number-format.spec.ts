import { describe, expect, it } from "vitest";
import { ConfigError } from "@shared/prep-errors";
import { formatValue, parseNumberFormat } from "@shared/number-format";

describe("number formats", () => {
  it("parses the printf subset used by the interpolator files", () => {
    expect(parseNumberFormat("%.5f")).toEqual({ kind: "fixed", digits: 5 });
    expect(parseNumberFormat("%.3e")).toEqual({ kind: "scientific", digits: 3 });
    expect(parseNumberFormat("%f")).toEqual({ kind: "fixed", digits: 6 });
    expect(parseNumberFormat("%d")).toEqual({ kind: "integer" });
    expect(parseNumberFormat("%s")).toEqual({ kind: "string" });
  });

  it("rejects anything else", () => {
    expect(() => parseNumberFormat("%5.2g")).toThrow(ConfigError);
    expect(() => parseNumberFormat("{:.2f}")).toThrow('unsupported number format "{:.2f}"');
  });

  it("writes exponents with at least two digits", () => {
    expect(formatValue(1e7, parseNumberFormat("%.4e"))).toBe("1.0000e+07");
    expect(formatValue(0.000015, parseNumberFormat("%.3e"))).toBe("1.500e-05");
    expect(formatValue(1.5e123, parseNumberFormat("%.1e"))).toBe("1.5e+123");
  });

  it("rounds exact halves to even", () => {
    expect(formatValue(0.125, { kind: "fixed", digits: 2 })).toBe("0.12");
    expect(formatValue(0.375, { kind: "fixed", digits: 2 })).toBe("0.38");
    expect(formatValue(2.5, { kind: "fixed", digits: 0 })).toBe("2");
    expect(formatValue(-0.125, { kind: "fixed", digits: 2 })).toBe("-0.12");
    expect(formatValue(9.5, { kind: "fixed", digits: 0 })).toBe("10");
    expect(formatValue(1.25, { kind: "scientific", digits: 1 })).toBe("1.2e+00");
    expect(formatValue(1.005, { kind: "fixed", digits: 2 })).toBe("1.00");
  });

  it("truncates integers and spells out non-finite values", () => {
    expect(formatValue(16.9, { kind: "integer" })).toBe("16");
    expect(formatValue(Number.NaN, { kind: "fixed", digits: 2 })).toBe("nan");
    expect(formatValue(Number.NEGATIVE_INFINITY, { kind: "fixed", digits: 2 })).toBe("-inf");
  });

  it("renders non-numeric values as text", () => {
    expect(formatValue(true, { kind: "string" })).toBe("True");
    expect(formatValue(null, { kind: "fixed", digits: 2 })).toBe("None");
    expect(formatValue("model.nam", { kind: "fixed", digits: 2 })).toBe("model.nam");
  });
});
