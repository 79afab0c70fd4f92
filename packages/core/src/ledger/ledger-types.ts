/**
 * Ledger Domain Types
 */

export type RecyclingMethod = 'destruction' | 'transfer';

/**
 * One completed exchange. Frozen once appended.
 */
export interface RecyclingRecord {
  readonly sequenceNumber: number;
  readonly actor: string;
  readonly assetClass: string;
  readonly unitId: string;
  readonly pointsGenerated: number;
  readonly timestamp: number;
  readonly method: RecyclingMethod;
}

export type RecordDraft = Omit<RecyclingRecord, 'sequenceNumber'>;

export interface LedgerTotals {
  totalRecyclings: number;
  totalPointsGenerated: number;
}

export interface HistoryPage {
  offset?: number;
  limit?: number;
}
