/**
 * Structured logging utility using pino
 *
 * - Level from config (LOG_LEVEL)
 * - Structured JSON in production, pino-pretty elsewhere
 * - Silent under test
 * - Component-based context
 *
 * Logs go to stderr so that CLI output on stdout stays machine-readable.
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = config.runtime.nodeEnv === 'test' || process.env.VITEST !== undefined;
const loggingEnabled = !isTest && config.logging.level !== 'silent';

/**
 * Common pino options with security redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  enabled: loggingEnabled,
  redact: {
    paths: [
      'password',
      'passwordHash',
      'password_hash',
      'authorization',
      '*.password',
      '*.passwordHash',
      'req.headers.authorization',
      'req.headers.cookie',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger =
  config.runtime.nodeEnv === 'production'
    ? pino(pinoOptions, pino.destination({ dest: 2, sync: false }))
    : pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'init', 'bootstrap', 'http')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
