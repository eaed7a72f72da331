// Runtime error types

/**
 * Base class for all domain runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class DomainError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DomainError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 * Thrown synchronously at construction time, never from comparisons.
 */
export class ValidationError extends DomainError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when an operation is not valid for the current state of an object.
 */
export class InvalidStateError extends DomainError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

/**
 * Error when a component extractor cannot be compiled for a value-object type.
 * The equality engine catches it and falls back to reflective extraction.
 */
export class AccessorCompilationError extends DomainError {
  readonly typeName: string;

  constructor(typeName: string, reason: string, cause?: unknown) {
    super(
      'ACCESSOR_COMPILATION_ERROR',
      `Accessor for "${typeName}" could not be compiled: ${reason}`,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'AccessorCompilationError';
    this.typeName = typeName;
  }
}

/**
 * Check if an error is one of ours
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
