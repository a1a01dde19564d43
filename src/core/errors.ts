/**
 * Failure types surfaced by the normalization engine.
 *
 * Nothing in the engine catches these; they propagate to the caller, which
 * decides what to draw (usually nothing) when a call fails.
 *
 * @module errors
 */

export type NormalizationErrorCode = 'EMPTY_DATASET' | 'INVALID_VALUE';

export class NormalizationError extends Error {
  readonly code: NormalizationErrorCode;

  constructor(code: NormalizationErrorCode, message: string) {
    super(message);
    this.name = 'NormalizationError';
    this.code = code;
  }
}

/**
 * Thrown when an extent, stack or normalization is requested over zero points.
 */
export class EmptyDatasetError extends NormalizationError {
  readonly operation: string;

  constructor(operation: string) {
    super('EMPTY_DATASET', `${operation}: dataset is empty. Render nothing instead of calling with zero points.`);
    this.name = 'EmptyDatasetError';
    this.operation = operation;
  }
}

/**
 * Thrown when a projection, geometry field or option is not a usable number.
 */
export class InvalidValueError extends NormalizationError {
  readonly field: string;
  readonly index: number | undefined;
  readonly value: unknown;

  constructor(field: string, value: unknown, index?: number, reason = 'must be a finite number') {
    const at = index === undefined ? field : `${field}[${index}]`;
    super('INVALID_VALUE', `${at} ${reason}. Received: ${String(value)}`);
    this.name = 'InvalidValueError';
    this.field = field;
    this.index = index;
    this.value = value;
  }
}

export const isNormalizationError = (error: unknown): error is NormalizationError =>
  error instanceof NormalizationError;
