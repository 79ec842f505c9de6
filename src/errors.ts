export type MetricsErrorCode =
  | "input-shape"
  | "invalid-window"
  | "time-format"
  | "unknown-profile"
  | "invalid-config";

export class MetricsError extends Error {
  readonly code: MetricsErrorCode;

  constructor(code: MetricsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MetricsError";
    this.code = code;
  }
}

/** Decisions are not a list, or an artifact has no `decisions` list. */
export class InputShapeError extends MetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("input-shape", message, options);
    this.name = "InputShapeError";
  }
}

export class InvalidWindowError extends MetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid-window", message, options);
    this.name = "InvalidWindowError";
  }
}

export class TimeFormatError extends MetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("time-format", message, options);
    this.name = "TimeFormatError";
  }
}

export class UnknownProfileError extends MetricsError {
  constructor(profile: string) {
    super("unknown-profile", `Unknown profile: ${profile}`);
    this.name = "UnknownProfileError";
  }
}

export class ConfigError extends MetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("invalid-config", message, options);
    this.name = "ConfigError";
  }
}
