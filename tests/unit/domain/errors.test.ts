import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  DependencyError,
  GenerationUnavailableError,
  PersistenceError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../../../src/domain/errors.js';

describe('pipeline errors', () => {
  it('carries classification and retry flags', () => {
    expect(new ValidationError('bad').retriable).toBe(false);
    expect(new GenerationUnavailableError('down').retriable).toBe(true);
    expect(new DependencyError('lookup failed').retriable).toBe(true);
    expect(new DependencyError('no credentials', undefined, false).retriable).toBe(false);

    const cancelled = new CancelledError();
    expect(cancelled.classification).toBe('Cancelled');
    expect(cancelled.statusCode).toBe(409);
    expect(cancelled.message).toBe('Job was cancelled');
  });

  it('keeps pipeline errors as they are', () => {
    const original = new ValidationError('bad input');
    const classified = classifyError(original, (message) => new PersistenceError(message));
    expect(classified).toBe(original);
  });

  it('wraps anything else with the fallback', () => {
    const classified = classifyError(
      new Error('socket hang up'),
      (message) => new GenerationUnavailableError(message)
    );
    expect(classified).toBeInstanceOf(GenerationUnavailableError);
    expect(classified.message).toBe('socket hang up');
  });

  it('describes non-error values generically', () => {
    expect(errorMessage('boom')).toBe('Unexpected error');
    expect(errorMessage(new Error('   '))).toBe('Unexpected error');
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
  });
});
