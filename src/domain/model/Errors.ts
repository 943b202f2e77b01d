import type { ErrorReport } from './ErrorReport.js';

/** Machine-readable codes carried by every error this library throws or returns. */
export type RecordConstructorErrorCode =
  | 'INVALID_SHAPE'
  | 'UNKNOWN_KEY'
  | 'MISSING_REQUIRED_KEY'
  | 'CONSTRUCTION_FAILED'
  | 'STEP_THREW'
  | 'INVALID_SCHEMA';

/** Base class for all errors raised by record construction. */
export abstract class RecordConstructorError extends Error {
  abstract readonly code: RecordConstructorErrorCode;
}

/** Input is not a mapping, ordered pairs, record, list, or null. Returned as a failure, never thrown. */
export class ShapeError extends RecordConstructorError {
  readonly code = 'INVALID_SHAPE';

  constructor(
    readonly recordType: string,
    readonly input: unknown,
  ) {
    super(`Cannot construct ${recordType} from ${describeShape(input)}`);
    this.name = 'ShapeError';
  }
}

/**
 * Unknown input key, or a required field left absent, while `checkKeys` is enabled.
 * Thrown immediately; the field pipeline never runs.
 */
export class KeyError extends RecordConstructorError {
  constructor(
    readonly code: 'UNKNOWN_KEY' | 'MISSING_REQUIRED_KEY',
    readonly recordType: string,
    readonly key: string,
  ) {
    super(
      code === 'UNKNOWN_KEY'
        ? `Unknown key '${key}' for ${recordType}`
        : `Required key '${key}' is missing for ${recordType}`,
    );
    this.name = 'KeyError';
  }
}

/** Thrown by `constructOrThrow()` when construction fails. */
export class ConstructionException extends RecordConstructorError {
  readonly code = 'CONSTRUCTION_FAILED';

  /** The aggregated report, or `null` when the input had an unrecognized shape (see `cause`). */
  readonly report: ErrorReport | null;

  constructor(recordType: string, failure: ErrorReport | ShapeError) {
    const isShapeFailure = failure instanceof ShapeError;
    super(
      isShapeFailure ? failure.message : `Failed to construct ${recordType}: ${JSON.stringify(failure)}`,
      isShapeFailure ? { cause: failure } : undefined,
    );
    this.name = 'ConstructionException';
    this.report = failure instanceof ShapeError ? null : failure;
  }
}

/** A conversion step threw instead of returning a failure. Always surfaced to the caller. */
export class ConversionStepError extends RecordConstructorError {
  readonly code = 'STEP_THREW';

  constructor(
    readonly recordType: string,
    readonly field: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Conversion step for ${recordType}.${field} threw: ${reason}`, { cause });
    this.name = 'ConversionStepError';
  }
}

/** The schema definition is inconsistent (duplicate field names or aliases). Thrown at registration. */
export class SchemaDefinitionError extends RecordConstructorError {
  readonly code = 'INVALID_SCHEMA';

  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

function describeShape(input: unknown): string {
  if (Array.isArray(input)) return 'array';
  if (typeof input === 'object' && input !== null) {
    return input.constructor?.name ? `an instance of ${input.constructor.name}` : 'object';
  }
  return typeof input;
}
