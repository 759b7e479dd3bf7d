/**
 * Logger utility
 */

import { pino, type Logger } from 'pino';
import type { LogLevel } from '../core/QuizConfig.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'car-picker',
    level: options.level ?? 'info',
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}

/** A logger that drops everything; the default for library callers that pass none. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
