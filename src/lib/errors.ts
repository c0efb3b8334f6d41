export type ErrorCode =
  | "VALIDATION_ERROR"
  | "SOURCE_UNAVAILABLE"
  | "COMPUTATION_ERROR"
  | "CONFIGURATION_ERROR";

export class TimesheetError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TimesheetError";
  }
}

/** Bad caller input. Raised before any source is contacted. */
export class ValidationError extends TimesheetError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid ${field}: ${message}`, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class SourceUnavailableError extends TimesheetError {
  public readonly status?: number;

  constructor(
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, "SOURCE_UNAVAILABLE", { cause: options.cause });
    this.name = "SourceUnavailableError";
    this.status = options.status;
  }
}

export class ComputationError extends TimesheetError {
  constructor(message: string) {
    super(message, "COMPUTATION_ERROR");
    this.name = "ComputationError";
  }
}

export class ConfigurationError extends TimesheetError {
  constructor(
    public readonly missing: string[],
    message = `Missing required environment variables: ${missing.join(", ")}`
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Shape returned to MCP clients and printed by the CLI with --json */
export function toErrorPayload(error: unknown): Record<string, unknown> {
  if (error instanceof ValidationError) {
    return { error: error.message, code: error.code, field: error.field };
  }
  if (error instanceof SourceUnavailableError && error.status !== undefined) {
    return { error: error.message, code: error.code, status: error.status };
  }
  if (error instanceof TimesheetError) {
    return { error: error.message, code: error.code };
  }
  return { error: errorMessage(error) };
}
