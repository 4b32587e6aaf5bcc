/**
 * @fileoverview Structured logging for the function runtime
 * @module runtime/logger
 */

import { pino, type Logger as PinoLogger } from 'pino';
import type { LogLevel } from './types.js';

export type Logger = PinoLogger;

export const SERVICE_NAME = 'kv-function-runtime';
export const SERVICE_VERSION = '0.1.0';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create the JSON-lines logger used by every runtime component
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? SERVICE_NAME;
  return pino({
    name,
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: name,
      version: SERVICE_VERSION,
    },
  });
}
