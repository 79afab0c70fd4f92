import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers
 * - Passwords, tokens and other secrets, top level or one object deep
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'token',
  'secret',
  'apiKey',
  'api_key',
  '*.password',
  '*.token',
  '*.secret',
  '*.apiKey',
];

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL)
 * - Automatic redaction of sensitive data
 * - ISO 8601 timestamps and JSON output
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
