export type CutlineErrorCode =
  | "FORMAT_ERROR"
  | "PLANNING_ERROR"
  | "APPLY_ERROR"
  | "PERMISSION_ERROR"
  | "IO_ERROR";

/**
 * Context attached to every error so a caller can act on it without
 * re-deriving what went wrong: the offending entity plus expected/actual
 * values where a comparison failed.
 */
export interface ErrorDetails {
  entityId?: string;
  path?: string;
  expected?: unknown;
  actual?: unknown;
  [key: string]: unknown;
}

export class CutlineError extends Error {
  constructor(
    public readonly code: CutlineErrorCode,
    message: string,
    public readonly details: ErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CutlineError";
  }
}

/** Malformed or incomplete persisted project. */
export class FormatError extends CutlineError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super("FORMAT_ERROR", message, details, options);
    this.name = "FormatError";
  }
}

/** Invalid transcript or duplicate-group input. */
export class PlanningError extends CutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super("PLANNING_ERROR", message, details);
    this.name = "PlanningError";
  }
}

/** Cut plan does not fit the project it is applied to. */
export class ApplyError extends CutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super("APPLY_ERROR", message, details);
    this.name = "ApplyError";
  }
}

export class PermissionError extends CutlineError {
  constructor(message: string, details?: ErrorDetails) {
    super("PERMISSION_ERROR", message, details);
    this.name = "PermissionError";
  }
}

/** Disk or staging failure while saving. */
export class IOError extends CutlineError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super("IO_ERROR", message, details, options);
    this.name = "IOError";
  }
}

export const isCutlineError = (error: unknown): error is CutlineError =>
  error instanceof CutlineError;
