/**
 * Structured Logging
 * JSON logs through pino; components log through child loggers
 */

import { pino, type Logger } from 'pino';

import { defaultLogLevel, type LogLevel } from '../config/env.js';

export type { Logger };

export const SERVICE_NAME = 'profile-badges-api';

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'password',
        '*.password',
        'req.headers.authorization',
        'headers.authorization',
        'token',
      ],
      censor: '[REDACTED]',
    },
  });
}

function initialLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) {
    return configured;
  }
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'production' || nodeEnv === 'test' ? defaultLogLevel(nodeEnv) : 'debug';
}

/**
 * Root logger. Entry points may raise or lower its level after loading config.
 */
export const logger = createLogger(initialLevel());
