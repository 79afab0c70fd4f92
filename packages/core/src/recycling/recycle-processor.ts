/**
 * Recycle Processor
 *
 * Executes one exchange for one unit: eligibility and ownership reads, exactly
 * one disposal call into the collaborator, then the ledger commit.
 * Nothing is written before the disposal call returns.
 */

import { logger } from '@recycler/observability';
import type { AssetClassCollaborator, AssetClassDirectory } from '../assets/asset-class.js';
import type { ControlRepository } from '../control/control-repository.js';
import { ValidationError, describeError } from '../errors.js';
import type { RecyclerEvents } from '../events/recycler-events.js';
import type { LedgerRepository } from '../ledger/ledger-repository.js';
import type { RecyclingRecord } from '../ledger/ledger-types.js';
import { NotActiveError } from '../registry/registry-errors.js';
import type { AssetClassRepository } from '../registry/registry-repository.js';
import type { ExchangeGuard } from './exchange-guard.js';
import {
  NotOwnerError,
  OperationFailedError,
  PausedError,
  PostconditionError,
  UnitNotFoundError,
} from './recycling-errors.js';
import type { ExchangeRequest, RecycleParams } from './recycling-types.js';

export interface RecycleProcessorDependencies {
  classRepo: AssetClassRepository;
  ledgerRepo: LedgerRepository;
  controlRepo: ControlRepository;
  directory: AssetClassDirectory;
  guard: ExchangeGuard;
  events: RecyclerEvents;
  custodyId: string;
  now?: () => Date;
}

/**
 * Reads captured before the disposal call
 */
interface ExchangePlan {
  collaborator: AssetClassCollaborator;
  pointsGenerated: number;
}

export class RecycleProcessor {
  private readonly now: () => Date;

  constructor(private readonly deps: RecycleProcessorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Recycle a unit by destroying it
   *
   * @throws {PausedError} While recycling is paused
   * @throws {NotActiveError} If the class is not registered or inactive
   * @throws {UnitNotFoundError} If the ownership query fails
   * @throws {NotOwnerError} If the actor does not own the unit
   * @throws {OperationFailedError} If destruction is unsupported or fails
   * @throws {PostconditionError} If the unit still resolves after destruction
   */
  async recycleByDestruction(params: RecycleParams): Promise<RecyclingRecord> {
    return this.deps.guard.run('recycleByDestruction', () =>
      this.execute({ ...params, method: 'destruction' })
    );
  }

  /**
   * Recycle a unit by moving it into custodial holding
   *
   * @throws {PausedError} While recycling is paused
   * @throws {NotActiveError} If the class is not registered or inactive
   * @throws {UnitNotFoundError} If the ownership query fails
   * @throws {NotOwnerError} If the actor does not own the unit
   * @throws {OperationFailedError} If the transfer fails
   */
  async recycleByTransfer(params: RecycleParams): Promise<RecyclingRecord> {
    return this.deps.guard.run('recycleByTransfer', () =>
      this.execute({ ...params, method: 'transfer' })
    );
  }

  /**
   * Run one exchange as an item of the batch operation in progress.
   * Rejected unless the caller's operation accepts items and no other item is open.
   */
  async recycleBatchItem(index: number, request: ExchangeRequest): Promise<RecyclingRecord> {
    return this.deps.guard.nest(`recycleBatch[${index}]`, () => this.execute(request));
  }

  private async execute(request: ExchangeRequest): Promise<RecyclingRecord> {
    this.assertNotPaused();
    validateRequest(request);

    const plan = await this.plan(request);

    if (request.method === 'destruction') {
      await this.destroy(request, plan.collaborator);
      await this.verifyDestroyed(request, plan.collaborator);
    } else {
      await this.moveToCustody(request, plan.collaborator);
    }

    const record = this.commit(request, plan.pointsGenerated);

    this.deps.events.emit({
      type: 'recycling.completed',
      actor: record.actor,
      classId: record.assetClass,
      unitId: record.unitId,
      points: record.pointsGenerated,
      method: record.method,
      sequenceNumber: record.sequenceNumber,
    });

    return record;
  }

  assertNotPaused(): void {
    if (this.deps.controlRepo.isPaused()) {
      throw new PausedError();
    }
  }

  private async plan(request: ExchangeRequest): Promise<ExchangePlan> {
    const { actor, classId, unitId } = request;

    const config = this.deps.classRepo.findById(classId);
    const collaborator = this.deps.directory.resolve(classId);
    if (!config || !config.active || !collaborator) {
      throw new NotActiveError(classId);
    }

    let owner: string;
    try {
      owner = await collaborator.ownerOf(unitId);
    } catch (error) {
      throw new UnitNotFoundError(classId, unitId, { cause: error });
    }
    if (owner !== actor) {
      throw new NotOwnerError(unitId, actor);
    }

    // Rate and ledger headroom are fixed here, before the disposal call
    this.deps.ledgerRepo.assertCanAppend(config.pointsPerUnit);
    return { collaborator, pointsGenerated: config.pointsPerUnit };
  }

  private async destroy(
    request: ExchangeRequest,
    collaborator: AssetClassCollaborator
  ): Promise<void> {
    const { classId, unitId } = request;
    if (!collaborator.destroy) {
      throw new OperationFailedError(
        `Asset class ${classId} does not support destruction; recycle unit ${unitId} by transfer instead`
      );
    }

    let destroyed: boolean;
    try {
      destroyed = await collaborator.destroy(unitId);
    } catch (error) {
      throw new OperationFailedError(
        `Destruction of unit ${unitId} failed (${describeError(error)}); recycle it by transfer instead`,
        { cause: error }
      );
    }
    if (!destroyed) {
      throw new OperationFailedError(
        `Destruction of unit ${unitId} was refused; recycle it by transfer instead`
      );
    }
  }

  private async verifyDestroyed(
    request: ExchangeRequest,
    collaborator: AssetClassCollaborator
  ): Promise<void> {
    const { actor, classId, unitId } = request;

    let remainingOwner: string;
    try {
      remainingOwner = await collaborator.ownerOf(unitId);
    } catch {
      // Unit no longer resolves
      return;
    }

    logger.error(
      { actor, classId, unitId, owner: remainingOwner },
      'Unit still exists after reported destruction'
    );
    throw new PostconditionError(classId, unitId, remainingOwner);
  }

  private async moveToCustody(
    request: ExchangeRequest,
    collaborator: AssetClassCollaborator
  ): Promise<void> {
    const { actor, unitId } = request;
    try {
      await collaborator.transfer(actor, this.deps.custodyId, unitId);
    } catch (error) {
      throw new OperationFailedError(
        `Transfer of unit ${unitId} into custody failed: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Append the record and bump every counter in one synchronous step
   */
  private commit(request: ExchangeRequest, pointsGenerated: number): RecyclingRecord {
    this.deps.ledgerRepo.assertCanAppend(pointsGenerated);
    this.deps.classRepo.incrementRecycled(request.classId);

    const record = this.deps.ledgerRepo.append({
      actor: request.actor,
      assetClass: request.classId,
      unitId: request.unitId,
      pointsGenerated,
      timestamp: this.now().getTime(),
      method: request.method,
    });

    return record;
  }
}

function validateRequest(request: ExchangeRequest): void {
  if (!request.actor.trim()) {
    throw new ValidationError('Actor is required');
  }
  if (!request.classId.trim()) {
    throw new ValidationError('Asset class id is required');
  }
  if (!request.unitId.trim()) {
    throw new ValidationError('Unit id is required');
  }
}
