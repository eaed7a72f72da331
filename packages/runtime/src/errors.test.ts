// Tests for error types

import { describe, it, expect } from 'vitest';
import {
  AccessorCompilationError,
  DomainError,
  InvalidStateError,
  ValidationError,
  isDomainError,
} from './errors.js';

describe('errors', () => {
  it('carries codes and fields', () => {
    const error = new ValidationError('amount is required', { field: 'amount' });

    expect(error).toBeInstanceOf(DomainError);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.field).toBe('amount');
    expect(new InvalidStateError('done').code).toBe('INVALID_STATE');
  });

  it('keeps the cause of a compilation failure', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new AccessorCompilationError('Money', 'Unexpected token', cause);

    expect(error.message).toBe('Accessor for "Money" could not be compiled: Unexpected token');
    expect(error.typeName).toBe('Money');
    expect(error.cause).toBe(cause);
  });

  it('recognises domain errors', () => {
    expect(isDomainError(new InvalidStateError('done'))).toBe(true);
    expect(isDomainError(new Error('other'))).toBe(false);
    expect(isDomainError('text')).toBe(false);
  });
});
