export { QueryService } from './query-service.js';
export type { QueryServiceDependencies } from './query-service.js';
export { ELIGIBILITY_REASONS } from './query-types.js';
export type { Eligibility, RecyclerStats } from './query-types.js';
