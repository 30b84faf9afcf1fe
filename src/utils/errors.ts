export type ValidationReason =
  | "NotParseable"
  | "MissingField"
  | "WrongType"
  | "EmptyComments";

/** Raised by the input validator before any heuristic runs. */
export class ValidationError extends Error {
  readonly reason: ValidationReason;

  constructor(reason: ValidationReason, message: string) {
    super(message);
    this.name = "ValidationError";
    this.reason = reason;
  }
}

/** The LLM call failed or produced nothing usable. */
export class RewriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RewriteError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
