import { describe, it, expect } from 'vitest';
import {
  CarPickerError,
  ErrorCodes,
  IndexNotLoadedError,
  InsufficientDataError,
  SessionError,
} from '../../src/core/errors.js';

describe('errors', () => {
  it('carries a code and context', () => {
    const error = new SessionError('Session not found: abc', { sessionId: 'abc' });

    expect(error).toBeInstanceOf(CarPickerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SessionError');
    expect(error.code).toBe(ErrorCodes.SESSION_ERROR);
    expect(error.context).toEqual({ sessionId: 'abc' });
  });

  it('describes missing data', () => {
    const error = new InsufficientDataError(10, 4);

    expect(error.message).toBe('Not enough unique car combinations to generate 10 choices (only 4 available)');
    expect(error.code).toBe('INSUFFICIENT_DATA');
    expect(error.context).toEqual({ required: 10, available: 4 });
  });

  it('has a default message for an unloaded index', () => {
    expect(new IndexNotLoadedError().message).toBe('Index has not been loaded; call loadIndex() first');
  });
});
