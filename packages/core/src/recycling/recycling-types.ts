/**
 * Recycling Domain Types
 */

import type { RecyclingMethod } from '../ledger/ledger-types.js';

export interface RecycleParams {
  actor: string;
  classId: string;
  unitId: string;
}

export interface ExchangeRequest extends RecycleParams {
  method: RecyclingMethod;
}
