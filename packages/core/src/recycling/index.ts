/**
 * Recycling Domain
 *
 * Single-unit exchange pipeline and its re-entrancy guard
 */

export { ExchangeGuard } from './exchange-guard.js';
export type { GuardRunOptions } from './exchange-guard.js';
export { RecycleProcessor } from './recycle-processor.js';
export type { RecycleProcessorDependencies } from './recycle-processor.js';
export type { ExchangeRequest, RecycleParams } from './recycling-types.js';
export {
  NotOwnerError,
  OperationFailedError,
  PausedError,
  PostconditionError,
  UnitNotFoundError,
} from './recycling-errors.js';
