/**
 * @recycler/types - Request schemas shared by the API
 */

export * from './class.schema.js';
export * from './recycling.schema.js';
export * from './admin.schema.js';
