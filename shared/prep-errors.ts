export type PrepErrorCode = "schema_error" | "shape_error" | "config_error";

export class PrepError extends Error {
  code: PrepErrorCode;
  constructor(message: string, code: PrepErrorCode) {
    super(message);
    this.code = code;
    this.name = "PrepError";
  }
}

/** Missing or unknown column, class, variance, zone or parameter name. */
export class SchemaError extends PrepError {
  constructor(message: string) {
    super(message, "schema_error");
    this.name = "SchemaError";
  }
}

/** Parallel input lists whose lengths disagree. */
export class ShapeError extends PrepError {
  constructor(message: string) {
    super(message, "shape_error");
    this.name = "ShapeError";
  }
}

export class ConfigError extends PrepError {
  constructor(message: string) {
    super(message, "config_error");
    this.name = "ConfigError";
  }
}
