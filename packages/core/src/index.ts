/**
 * @recycler/core - Domain logic for the asset recycler
 *
 * Registry of accepted asset classes, the append-only recycling ledger,
 * single and batch exchange pipelines and read-only queries.
 */

export * from './errors.js';
export * from './config.js';
export * from './system.js';
export * from './access/index.js';
export * from './assets/index.js';
export * from './events/index.js';
export * from './registry/index.js';
export * from './ledger/index.js';
export * from './recycling/index.js';
export * from './batch/index.js';
export * from './queries/index.js';
export * from './control/index.js';
