/**
 * @recycler/observability
 *
 * Structured logging for the asset recycler, built on Pino.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from 'pino';
