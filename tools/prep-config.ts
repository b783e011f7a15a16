import { ConfigError } from "@shared/prep-errors";
import { parseNumberFormat } from "@shared/number-format";

export type PrepConfig = {
  delimiter: string;
  missingMarker: string;
  missingMarkers: string[];
  floatFormat: string;
  placeholderDelimiter: string;
  quiet: boolean;
};

export const DEFAULT_DELIMITER = "\t";
export const DEFAULT_MISSING_MARKER = "-999";
export const DEFAULT_MISSING_MARKERS = ["-99", "-999"];
export const DEFAULT_FLOAT_FORMAT = "%.5f";
export const DEFAULT_PLACEHOLDER_DELIMITER = "$";

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const parseDelimiter = (raw: string | undefined): string => {
  if (raw === undefined || raw === "") return DEFAULT_DELIMITER;
  const lowered = raw.toLowerCase();
  if (raw === "\\t" || lowered === "tab") return "\t";
  if (lowered === "comma") return ",";
  if (lowered === "space") return " ";
  return raw;
};

const parseMarkerList = (raw: string | undefined): string[] => {
  if (!raw) {
    return [...DEFAULT_MISSING_MARKERS];
  }
  const markers = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return markers.length > 0 ? markers : [...DEFAULT_MISSING_MARKERS];
};

export const readPrepConfig = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): PrepConfig => {
  const floatFormat = env.T2_FLOAT_FORMAT?.trim() || DEFAULT_FLOAT_FORMAT;
  // Throws ConfigError on an unsupported format.
  parseNumberFormat(floatFormat);

  const placeholderDelimiter = env.T2_PLACEHOLDER_DELIMITER?.trim() || DEFAULT_PLACEHOLDER_DELIMITER;
  if (placeholderDelimiter.length !== 1) {
    throw new ConfigError(`placeholder delimiter must be a single character, got "${placeholderDelimiter}"`);
  }

  return {
    delimiter: parseDelimiter(env.T2_DELIMITER),
    missingMarker: env.T2_MISSING_MARKER?.trim() || DEFAULT_MISSING_MARKER,
    missingMarkers: parseMarkerList(env.T2_MISSING_MARKERS),
    floatFormat,
    placeholderDelimiter,
    quiet: flagEnabled(env.T2_QUIET, false),
  };
};
