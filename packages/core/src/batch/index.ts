export { BatchCoordinator } from './batch-coordinator.js';
export { MAX_BATCH_SIZE } from './batch-types.js';
export type {
  BatchItemFailure,
  BatchItemResult,
  BatchItemSuccess,
  BatchOutcome,
  RecycleBatchParams,
} from './batch-types.js';
