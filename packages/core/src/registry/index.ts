/**
 * Registry Domain
 *
 * Public exports for asset class registration
 */

// Repository layer
export { AssetClassRepository } from './registry-repository.js';

// Service layer
export { ClassRegistryService, toSnapshot } from './registry-service.js';
export type { ClassRegistryDependencies } from './registry-service.js';

// Domain types
export { DEFAULT_MAX_POINTS_PER_UNIT } from './registry-types.js';
export type {
  AssetClassConfig,
  AssetClassSnapshot,
  ClassStatus,
  RegisterClassParams,
  RegistryLimits,
  SetActiveParams,
  UpdateRateParams,
} from './registry-types.js';

// Domain errors
export {
  AlreadyRegisteredError,
  CapabilityMissingError,
  NotActiveError,
  NotRegisteredError,
} from './registry-errors.js';
