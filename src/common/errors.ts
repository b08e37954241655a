export type PipelineErrorKind =
  | "malformed_input"
  | "missing_field"
  | "invalid_timestamp"
  | "external_service"
  | "fatal_io";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** Input line that is not a JSON object. Skipped and counted. */
export class MalformedInputError extends PipelineError {
  readonly kind = "malformed_input";
  readonly lineNumber: number;

  constructor(lineNumber: number, detail: string) {
    super(`Malformed input at line ${lineNumber}: ${detail}`);
    this.name = "MalformedInputError";
    this.lineNumber = lineNumber;
  }
}

export class MissingFieldError extends PipelineError {
  readonly kind = "missing_field";
  readonly field: string;

  constructor(field: string, recordId?: string) {
    super(`Missing field ${field}${recordId ? ` on campaign ${recordId}` : ""}`);
    this.name = "MissingFieldError";
    this.field = field;
  }
}

export class InvalidTimestampError extends PipelineError {
  readonly kind = "invalid_timestamp";

  constructor(message: string) {
    super(message);
    this.name = "InvalidTimestampError";
  }
}

/** Embedding or word-vector collaborator failed; the field falls back to zeros. */
export class ExternalServiceError extends PipelineError {
  readonly kind = "external_service";
  readonly service: string;

  constructor(service: string, message: string) {
    super(`${service}: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/** Stage input or output path cannot be opened. Aborts the stage. */
export class FatalIOError extends PipelineError {
  readonly kind = "fatal_io";
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cannot access ${path}: ${stringifyError(cause)}`);
    this.name = "FatalIOError";
    this.path = path;
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

export function errorKindOf(value: unknown): PipelineErrorKind | "unexpected" {
  return isPipelineError(value) ? value.kind : "unexpected";
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}

export function isAbortError(value: unknown): boolean {
  return value instanceof Error && value.name === "AbortError";
}
