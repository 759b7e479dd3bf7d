/**
 * Custom error types for car-picker
 */

export class CarPickerError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CarPickerError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export class DataDirectoryError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATA_DIRECTORY_ERROR', context);
    this.name = 'DataDirectoryError';
  }
}

export class LexiconError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LEXICON_ERROR', context);
    this.name = 'LexiconError';
  }
}

/**
 * The on-disk index artifact could not be read back. Callers rebuild instead
 * of failing.
 */
export class CacheCorruptionError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CACHE_CORRUPTION', context);
    this.name = 'CacheCorruptionError';
  }
}

export class InsufficientDataError extends CarPickerError {
  public readonly required: number;
  public readonly available: number;

  constructor(required: number, available: number) {
    super(
      `Not enough unique car combinations to generate ${required} choices (only ${available} available)`,
      'INSUFFICIENT_DATA',
      { required, available }
    );
    this.name = 'InsufficientDataError';
    this.required = required;
    this.available = available;
  }
}

export class InvalidChoiceError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_CHOICE', context);
    this.name = 'InvalidChoiceError';
  }
}

export class IndexNotLoadedError extends CarPickerError {
  constructor(message = 'Index has not been loaded; call loadIndex() first') {
    super(message, 'INDEX_NOT_LOADED');
    this.name = 'IndexNotLoadedError';
  }
}

export class SessionError extends CarPickerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SESSION_ERROR', context);
    this.name = 'SessionError';
  }
}

/**
 * Error code constants
 */
export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  DATA_DIRECTORY_ERROR: 'DATA_DIRECTORY_ERROR',
  LEXICON_ERROR: 'LEXICON_ERROR',
  CACHE_CORRUPTION: 'CACHE_CORRUPTION',
  INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',
  INVALID_CHOICE: 'INVALID_CHOICE',
  INDEX_NOT_LOADED: 'INDEX_NOT_LOADED',
  SESSION_ERROR: 'SESSION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
