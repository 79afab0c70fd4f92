/**
 * Ledger Repository
 *
 * Append-only store of recycling records with running totals and
 * actor/class indices maintained at append time.
 */

import { ValidationError } from '../errors.js';
import type { HistoryPage, LedgerTotals, RecordDraft, RecyclingRecord } from './ledger-types.js';

export class LedgerRepository {
  private readonly records: RecyclingRecord[] = [];
  private readonly byActor = new Map<string, number[]>();
  private readonly byClass = new Map<string, number[]>();
  private totalPointsGenerated = 0;

  /**
   * Throws before any write when the running total would leave the safe integer range
   */
  assertCanAppend(pointsGenerated: number): void {
    if (!Number.isSafeInteger(this.totalPointsGenerated + pointsGenerated)) {
      throw new ValidationError('Total points generated would exceed the supported range');
    }
  }

  append(draft: RecordDraft): RecyclingRecord {
    this.assertCanAppend(draft.pointsGenerated);

    const record: RecyclingRecord = Object.freeze({
      ...draft,
      sequenceNumber: this.records.length,
    });

    this.records.push(record);
    indexPosition(this.byActor, record.actor, record.sequenceNumber);
    indexPosition(this.byClass, record.assetClass, record.sequenceNumber);
    this.totalPointsGenerated += record.pointsGenerated;

    return record;
  }

  findBySequence(sequenceNumber: number): RecyclingRecord | null {
    return this.records[sequenceNumber] ?? null;
  }

  findByActor(actor: string, page?: HistoryPage): RecyclingRecord[] {
    return this.resolve(this.byActor.get(actor), page);
  }

  findByClass(classId: string, page?: HistoryPage): RecyclingRecord[] {
    return this.resolve(this.byClass.get(classId), page);
  }

  countByActor(actor: string): number {
    return this.byActor.get(actor)?.length ?? 0;
  }

  countByClass(classId: string): number {
    return this.byClass.get(classId)?.length ?? 0;
  }

  findAll(): readonly RecyclingRecord[] {
    return [...this.records];
  }

  size(): number {
    return this.records.length;
  }

  totals(): LedgerTotals {
    return {
      totalRecyclings: this.records.length,
      totalPointsGenerated: this.totalPointsGenerated,
    };
  }

  private resolve(positions: number[] | undefined, page?: HistoryPage): RecyclingRecord[] {
    if (!positions) {
      return [];
    }
    const offset = page?.offset ?? 0;
    const end = page?.limit === undefined ? positions.length : offset + page.limit;
    const result: RecyclingRecord[] = [];
    for (const position of positions.slice(offset, end)) {
      const record = this.records[position];
      if (record) {
        result.push(record);
      }
    }
    return result;
  }
}

function indexPosition(index: Map<string, number[]>, key: string, position: number): void {
  const positions = index.get(key);
  if (positions) {
    positions.push(position);
  } else {
    index.set(key, [position]);
  }
}
