/**
 * Analysis error utilities.
 *
 * Provides a consistent error type for every public surface of the
 * analysis pipeline and helpers to convert whatever was thrown into an
 * AnalysisError that the interactive session can report.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 */
export type AnalysisErrorCode =
  | 'InsufficientSample'
  | 'InvalidResampleCount'
  | 'AmbiguousElimination'
  | 'IngestionError'
  | 'ConfigError'
  | 'InvalidParams'
  | 'UnknownError';

/**
 * Plain serialisable shape of an analysis error.
 */
export interface AnalysisErrorShape {
  code: AnalysisErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class AnalysisError extends Error implements AnalysisErrorShape {
  public readonly code: AnalysisErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: AnalysisErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for log lines).
   */
  public toObject(): AnalysisErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A sample array handed to the regression tester was empty.
 */
export class InsufficientSampleError extends AnalysisError {
  public readonly sample: 'A' | 'B';

  constructor(sample: 'A' | 'B') {
    super('InsufficientSample', `Sample ${sample} is empty; a permutation test needs at least one measurement per sample`, {
      sample,
    });
    this.name = 'InsufficientSampleError';
    this.sample = sample;
  }
}

/**
 * Resample count was zero, negative or not an integer.
 */
export class InvalidResampleCountError extends AnalysisError {
  public readonly resampleCount: number;

  constructor(resampleCount: number) {
    super('InvalidResampleCount', `Resample count must be a positive integer (got ${resampleCount})`, {
      resampleCount,
    });
    this.name = 'InvalidResampleCountError';
    this.resampleCount = resampleCount;
  }
}

/**
 * The selection collaborator answered with values outside the offered candidates.
 */
export class AmbiguousEliminationError extends AnalysisError {
  public readonly dimension: string;
  public readonly unknownValues: ReadonlyArray<string | number>;

  constructor(dimension: string, unknownValues: ReadonlyArray<string | number>) {
    super(
      'AmbiguousElimination',
      `Answer for dimension '${dimension}' references values that were not offered: ${unknownValues.join(', ')}`,
      { dimension, unknownValues: [...unknownValues] }
    );
    this.name = 'AmbiguousEliminationError';
    this.dimension = dimension;
    this.unknownValues = unknownValues;
  }
}

/**
 * A log record could not be turned into a sample pair.
 */
export class IngestionError extends AnalysisError {
  public readonly line: number;

  constructor(line: number, message: string, details?: Record<string, unknown>) {
    super('IngestionError', `Line ${line}: ${message}`, { line, ...details });
    this.name = 'IngestionError';
    this.line = line;
  }
}

export class ConfigError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ConfigError', message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Map unknown errors into AnalysisError instances.
 *
 * @param error - Anything caught at the session boundary
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toAnalysisError(
  error: unknown,
  fallbackCode: AnalysisErrorCode = 'UnknownError'
): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }

  if (error instanceof Error) {
    return new AnalysisError(fallbackCode, error.message);
  }

  return new AnalysisError(fallbackCode, `Unknown analysis error: ${String(error)}`);
}

/**
 * Describe the first zod issue as "field 'a.b': message".
 */
export function describeZodError(error: ZodError): { field: string; message: string } {
  const firstIssue = error.issues[0];
  if (!firstIssue) {
    return { field: 'root', message: error.message };
  }
  const field = firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  return { field, message: `Validation error on field '${field}': ${firstIssue.message}` };
}

/**
 * Convert Zod validation error to AnalysisError
 *
 * @example
 * ```typescript
 * const result = ConfigSchema.safeParse(raw);
 * if (!result.success) {
 *   throw zodErrorToAnalysisError(result.error);
 * }
 * // Throws: "Validation error on field 'permutation_test.exact_threshold': Expected number"
 * ```
 */
export function zodErrorToAnalysisError(error: ZodError): AnalysisError {
  const { field, message } = describeZodError(error);

  return new AnalysisError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
