/**
 * Query Service
 *
 * Read-only projections over the registry and ledger. No method mutates state;
 * history lookups go through the ledger's actor and class indices.
 */

import type { AssetClassDirectory } from '../assets/asset-class.js';
import type { ControlRepository } from '../control/control-repository.js';
import { ValidationError } from '../errors.js';
import type { LedgerRepository } from '../ledger/ledger-repository.js';
import type { HistoryPage, RecyclingRecord } from '../ledger/ledger-types.js';
import { NotRegisteredError } from '../registry/registry-errors.js';
import type { AssetClassRepository } from '../registry/registry-repository.js';
import { toSnapshot } from '../registry/registry-service.js';
import type { AssetClassSnapshot } from '../registry/registry-types.js';
import { ELIGIBILITY_REASONS } from './query-types.js';
import type { Eligibility, RecyclerStats } from './query-types.js';

export interface QueryServiceDependencies {
  classRepo: AssetClassRepository;
  ledgerRepo: LedgerRepository;
  controlRepo: ControlRepository;
  directory: AssetClassDirectory;
}

export class QueryService {
  constructor(private readonly deps: QueryServiceDependencies) {}

  getClassConfig(classId: string): AssetClassSnapshot | null {
    const config = this.deps.classRepo.findById(classId);
    return config ? toSnapshot(config) : null;
  }

  isAccepted(classId: string): boolean {
    return this.deps.classRepo.findById(classId)?.active ?? false;
  }

  /**
   * @throws {NotRegisteredError} If the class was never registered
   * @throws {ValidationError} If quantity is not a positive integer or the product overflows
   */
  calculatePoints(classId: string, quantity: number): number {
    const config = this.deps.classRepo.findById(classId);
    if (!config) {
      throw new NotRegisteredError(classId);
    }
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new ValidationError(`Quantity must be a positive integer, got ${quantity}`);
    }

    const points = config.pointsPerUnit * quantity;
    if (!Number.isSafeInteger(points)) {
      throw new ValidationError(
        `Points for ${quantity} units of ${classId} exceed the supported range`
      );
    }
    return points;
  }

  getHistoryForActor(actor: string, page?: HistoryPage): RecyclingRecord[] {
    return this.deps.ledgerRepo.findByActor(actor, normalizePage(page));
  }

  getHistoryForClass(classId: string, page?: HistoryPage): RecyclingRecord[] {
    return this.deps.ledgerRepo.findByClass(classId, normalizePage(page));
  }

  getActorRecyclingCount(actor: string): number {
    return this.deps.ledgerRepo.countByActor(actor);
  }

  getClassRecyclingCount(classId: string): number {
    return this.deps.ledgerRepo.countByClass(classId);
  }

  getRecord(sequenceNumber: number): RecyclingRecord | null {
    return this.deps.ledgerRepo.findBySequence(sequenceNumber);
  }

  getStats(): RecyclerStats {
    const totals = this.deps.ledgerRepo.totals();
    return {
      totalRecyclings: totals.totalRecyclings,
      totalPointsGenerated: totals.totalPointsGenerated,
      activeClassCount: this.deps.classRepo.countActive(),
    };
  }

  getHistorySize(): number {
    return this.deps.ledgerRepo.size();
  }

  /**
   * Same checks as the exchange pipeline up to the ownership query,
   * reported as a value instead of thrown
   */
  async canRecycle(actor: string, classId: string, unitId: string): Promise<Eligibility> {
    if (this.deps.controlRepo.isPaused()) {
      return ineligible(ELIGIBILITY_REASONS.paused);
    }
    if (!actor.trim() || !classId.trim() || !unitId.trim()) {
      return ineligible(ELIGIBILITY_REASONS.invalidInput);
    }

    const config = this.deps.classRepo.findById(classId);
    if (!config) {
      return ineligible(ELIGIBILITY_REASONS.notRegistered);
    }
    const collaborator = this.deps.directory.resolve(classId);
    if (!config.active || !collaborator) {
      return ineligible(ELIGIBILITY_REASONS.notActive);
    }

    let owner: string;
    try {
      owner = await collaborator.ownerOf(unitId);
    } catch {
      return ineligible(ELIGIBILITY_REASONS.unitNotFound);
    }
    if (owner !== actor) {
      return ineligible(ELIGIBILITY_REASONS.notOwner);
    }

    return { eligible: true, reason: ELIGIBILITY_REASONS.eligible };
  }
}

function ineligible(reason: string): Eligibility {
  return { eligible: false, reason };
}

function normalizePage(page?: HistoryPage): HistoryPage | undefined {
  if (!page) {
    return undefined;
  }
  const offset = page.offset ?? 0;
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError(`Offset must be a non-negative integer, got ${offset}`);
  }
  if (page.limit !== undefined && (!Number.isInteger(page.limit) || page.limit < 0)) {
    throw new ValidationError(`Limit must be a non-negative integer, got ${page.limit}`);
  }
  return { offset, limit: page.limit };
}
