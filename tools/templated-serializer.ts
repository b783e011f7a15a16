import { formatValue, INTEGER_FORMAT, STRING_FORMAT, type FormatValue, type TNumberFormat } from "@shared/number-format";
import type { ParameterCatalog } from "@shared/parameter-catalog";
import { PILOT_POINT_FLOAT_FORMAT, type PilotPoint } from "@shared/pilot-points";

export const VALUE_COLUMN_WIDTH = 40;
export const PLACEHOLDER_WIDTH = 12;
export const HEADER_LINE = `*${"=".repeat(79)}`;
export const DIVIDER = `*${"-".repeat(79)}`;
export const DEFAULT_TEMPLATE_DELIMITER = "$";

export type TemplateOptions = {
  templateMode?: boolean;
  delimiter?: string;
};

export type ValueLineInput = TemplateOptions & {
  value: FormatValue;
  format?: TNumberFormat;
  description: string;
  /** Catalog key deciding whether the value becomes a placeholder. */
  parameterKey?: string;
  catalog?: ParameterCatalog;
  /** Called with the prefix when it runs past the comment column. */
  onOverflow?: (prefix: string) => void;
};

/** `$ name         $`: the token a PEST template processor substitutes. */
export function placeholderToken(name: string, delimiter = DEFAULT_TEMPLATE_DELIMITER): string {
  return `${delimiter} ${name.padEnd(PLACEHOLDER_WIDTH)} ${delimiter}`;
}

const padToComment = (prefix: string, description: string, onOverflow?: (prefix: string) => void): string => {
  if (prefix.length > VALUE_COLUMN_WIDTH) onOverflow?.(prefix);
  return `${prefix.padEnd(VALUE_COLUMN_WIDTH)}/ ${description}\n`;
};

/**
 * One control-file data line: a space, the value, padding to column 40, then
 * `/ description`. Prefixes longer than 40 are left as they are.
 * A placeholder keeps the leading space (` $ sill         $`) rather than
 * replacing the whole prefix; template processors read either form.
 */
export function renderValueLine(input: ValueLineInput): string {
  const { parameterKey, catalog } = input;
  let rendered = formatValue(input.value, input.format ?? STRING_FORMAT);
  if (input.templateMode && parameterKey !== undefined && catalog?.isSelected(parameterKey)) {
    rendered = placeholderToken(catalog.placeholderName(parameterKey), input.delimiter);
  }
  return padToComment(` ${rendered}`, input.description, input.onOverflow);
}

export function renderStringLine(
  text: string | null | undefined,
  description: string,
  onOverflow?: (prefix: string) => void,
): string {
  return padToComment(` ${text ?? "None"}`, description, onOverflow);
}

export function renderSectionHeader(title: string): string {
  return `${DIVIDER}\n* ${title}\n${DIVIDER}\n`;
}

export const pilotPointPlaceholder = (name: string, position: number): string =>
  `${name}_${String(position).padStart(2, "0")}`;

/**
 * `X Y <parameters...> Zone`, space separated. In template mode each flagged
 * parameter becomes `<name>_NN`, NN being the 1-based position of the point
 * within its list.
 */
export function renderPilotPointLine(point: PilotPoint, index: number, options: TemplateOptions = {}): string {
  const fields = [formatValue(point.x, PILOT_POINT_FLOAT_FORMAT), formatValue(point.y, PILOT_POINT_FLOAT_FORMAT)];
  for (const record of point.parameters.entries()) {
    if (options.templateMode && record.estimate) {
      const name = pilotPointPlaceholder(record.displayName ?? record.key, index + 1);
      fields.push(placeholderToken(name, options.delimiter));
    } else {
      fields.push(formatValue(record.value, record.format));
    }
  }
  fields.push(formatValue(point.zone, INTEGER_FORMAT));
  return `${fields.join(" ")}\n`;
}
