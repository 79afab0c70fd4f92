/**
 * Ledger Domain
 *
 * Append-only audit trail of completed exchanges
 */

export { LedgerRepository } from './ledger-repository.js';
export type {
  HistoryPage,
  LedgerTotals,
  RecordDraft,
  RecyclingMethod,
  RecyclingRecord,
} from './ledger-types.js';
