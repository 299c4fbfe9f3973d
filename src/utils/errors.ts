/**
 * Error taxonomy for the analytics core.
 *
 * Callers tell "no data" (EmptySeriesError) from "bad input" (InputError,
 * ConfigurationError) from "internal computation fault" (ComputationError)
 * by class or by `code`.
 */
export class AnalysisError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class InputError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>, code = 'INPUT_ERROR') {
    super(message, code, details);
    this.name = 'InputError';
  }
}

export class EmptySeriesError extends InputError {
  constructor(message = 'Series contains no usable bars') {
    super(message, undefined, 'EMPTY_SERIES');
    this.name = 'EmptySeriesError';
  }
}

export class ConfigurationError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', issues.length > 0 ? { issues } : undefined);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class ComputationError extends AnalysisError {
  readonly stage: string;

  constructor(stage: string, message: string, cause?: unknown) {
    super(message, 'COMPUTATION_ERROR', { stage });
    this.name = 'ComputationError';
    this.stage = stage;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof AnalysisError) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
