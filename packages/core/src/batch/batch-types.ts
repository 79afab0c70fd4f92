/**
 * Batch Domain Types
 */

import type { RecyclingRecord } from '../ledger/ledger-types.js';

export const MAX_BATCH_SIZE = 50;

export interface RecycleBatchParams {
  actor: string;
  classIds: readonly string[];
  unitIds: readonly string[];
  useDestruction: readonly boolean[];
}

export interface BatchItemSuccess {
  status: 'succeeded';
  index: number;
  classId: string;
  unitId: string;
  points: number;
  record: RecyclingRecord;
}

export interface BatchItemFailure {
  status: 'failed';
  index: number;
  classId: string;
  unitId: string;
  reason: string;
  code: string;
}

export type BatchItemResult = BatchItemSuccess | BatchItemFailure;

export interface BatchOutcome {
  /** Points across successful items only */
  totalPoints: number;
  succeeded: number;
  failed: number;
  results: BatchItemResult[];
}
