import { z } from "zod";
import { ConfigError } from "./prep-errors";

export const NumberFormat = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("fixed"), digits: z.number().int().min(0).max(20) }),
  z.object({ kind: z.literal("scientific"), digits: z.number().int().min(0).max(20) }),
  z.object({ kind: z.literal("integer") }),
  z.object({ kind: z.literal("string") }),
]);

export type TNumberFormat = z.infer<typeof NumberFormat>;

export type FormatValue = number | string | boolean | null;

const FORMAT_PATTERN = /^%(?:\.(\d+))?([fedis])$/;

/**
 * Parses the printf-style subset used by the interpolator files:
 * `%.Nf`, `%.Ne`, `%d` (or `%i`) and `%s`. `%f` and `%e` without a
 * precision default to six digits.
 */
export function parseNumberFormat(spec: string): TNumberFormat {
  const match = FORMAT_PATTERN.exec(spec.trim());
  if (!match) {
    throw new ConfigError(`unsupported number format "${spec}"`);
  }
  const digits = match[1] === undefined ? 6 : Number(match[1]);
  switch (match[2]) {
    case "f":
      return NumberFormat.parse({ kind: "fixed", digits });
    case "e":
      return NumberFormat.parse({ kind: "scientific", digits });
    case "d":
    case "i":
      return { kind: "integer" };
    default:
      return { kind: "string" };
  }
}

export const fixed = (digits: number): TNumberFormat => ({ kind: "fixed", digits });
export const scientific = (digits: number): TNumberFormat => ({ kind: "scientific", digits });
export const INTEGER_FORMAT: TNumberFormat = { kind: "integer" };
export const STRING_FORMAT: TNumberFormat = { kind: "string" };

const nonFinite = (value: number): string => {
  if (Number.isNaN(value)) return "nan";
  return value > 0 ? "inf" : "-inf";
};

const EXACT_DIGITS = 100;
const EXACT_TIE = /^50*$/;

/**
 * `toFixed` and `toExponential` round exact halves away from zero; printf
 * rounds them to even. `rounded` is the away-from-zero result, `exact` the
 * value written out to EXACT_DIGITS places in the same notation.
 */
const halfToEven = (rounded: string, exact: string, digits: number): string => {
  const [mantissa = "", exponent] = exact.split("e");
  const [whole = "", fraction = ""] = mantissa.split(".");
  if (!EXACT_TIE.test(fraction.slice(digits))) return rounded;
  const truncated = digits === 0 ? whole : `${whole}.${fraction.slice(0, digits)}`;
  if (Number(truncated.slice(-1)) % 2 !== 0) return rounded;
  return exponent === undefined ? truncated : `${truncated}e${exponent}`;
};

const toFixedPoint = (value: number, digits: number): string => {
  const rounded = value.toFixed(digits);
  if (Math.abs(value) >= 1e21) return rounded;
  return halfToEven(rounded, value.toFixed(EXACT_DIGITS), digits);
};

// Exponents carry at least two digits (1.5000e-05), as C printf writes them.
const toScientific = (value: number, digits: number): string => {
  const raw = halfToEven(value.toExponential(digits), value.toExponential(EXACT_DIGITS), digits);
  return raw.replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
};

const asText = (value: FormatValue): string => {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  return String(value);
};

export function formatValue(value: FormatValue, format: TNumberFormat): string {
  if (format.kind === "string" || typeof value !== "number") {
    return asText(value);
  }
  if (!Number.isFinite(value)) return nonFinite(value);
  switch (format.kind) {
    case "fixed":
      return toFixedPoint(value, format.digits);
    case "scientific":
      return toScientific(value, format.digits);
    case "integer":
      return String(Math.trunc(value));
  }
}
