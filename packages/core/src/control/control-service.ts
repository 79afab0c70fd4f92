/**
 * Control Service
 *
 * Administrative pause switch and recovery of units stuck in custodial holding
 */

import { requireAdmin } from '../access/authorizer.js';
import type { Authorizer } from '../access/authorizer.js';
import type { AssetClassDirectory } from '../assets/asset-class.js';
import { ValidationError, describeError } from '../errors.js';
import type { RecyclerEvents } from '../events/recycler-events.js';
import type { ExchangeGuard } from '../recycling/exchange-guard.js';
import {
  NotOwnerError,
  OperationFailedError,
  UnitNotFoundError,
} from '../recycling/recycling-errors.js';
import { NotRegisteredError } from '../registry/registry-errors.js';
import type { AssetClassRepository } from '../registry/registry-repository.js';
import type { ControlRepository } from './control-repository.js';

export interface ControlServiceDependencies {
  controlRepo: ControlRepository;
  classRepo: AssetClassRepository;
  directory: AssetClassDirectory;
  authorizer: Authorizer;
  guard: ExchangeGuard;
  events: RecyclerEvents;
  custodyId: string;
  now?: () => Date;
}

export interface EmergencyRescueParams {
  actor: string;
  classId: string;
  unitId: string;
  to: string;
}

export interface ControlStatus {
  paused: boolean;
  /** Epoch ms of the last pause or unpause, null if never toggled */
  changedAt: number | null;
}

export class ControlService {
  constructor(private readonly deps: ControlServiceDependencies) {}

  isPaused(): boolean {
    return this.deps.controlRepo.isPaused();
  }

  getStatus(): ControlStatus {
    return {
      paused: this.deps.controlRepo.isPaused(),
      changedAt: this.deps.controlRepo.lastChangedAt(),
    };
  }

  /**
   * Halt single and batch recycling. Idempotent; emits only on change.
   */
  async pause(actor: string): Promise<void> {
    await this.deps.guard.run('pause', async () => {
      requireAdmin(this.deps.authorizer, actor, 'pause');
      this.applyPaused(actor, true);
    });
  }

  async unpause(actor: string): Promise<void> {
    await this.deps.guard.run('unpause', async () => {
      requireAdmin(this.deps.authorizer, actor, 'unpause');
      this.applyPaused(actor, false);
    });
  }

  /**
   * Move a unit out of custodial holding to a recovery identity.
   * Available while paused.
   *
   * @throws {NotRegisteredError} If the class was never registered
   * @throws {ValidationError} If unitId or the destination is blank
   * @throws {UnitNotFoundError} If the unit's owner cannot be resolved
   * @throws {NotOwnerError} If custodial holding does not own the unit
   * @throws {OperationFailedError} If the transfer fails
   */
  async emergencyRescue(params: EmergencyRescueParams): Promise<void> {
    await this.deps.guard.run('emergencyRescue', async () => {
      const { actor, classId, unitId, to } = params;
      requireAdmin(this.deps.authorizer, actor, 'emergencyRescue');

      const config = this.deps.classRepo.findById(classId);
      const collaborator = this.deps.directory.resolve(classId);
      if (!config || config.registeredAt === 0 || !collaborator) {
        throw new NotRegisteredError(classId);
      }
      if (!unitId.trim()) {
        throw new ValidationError('Unit id is required');
      }
      if (!to.trim()) {
        throw new ValidationError('Rescue destination is required');
      }

      let owner: string;
      try {
        owner = await collaborator.ownerOf(unitId);
      } catch (error) {
        throw new UnitNotFoundError(classId, unitId, { cause: error });
      }
      if (owner !== this.deps.custodyId) {
        throw new NotOwnerError(unitId, this.deps.custodyId);
      }

      try {
        await collaborator.transfer(this.deps.custodyId, to, unitId);
      } catch (error) {
        throw new OperationFailedError(
          `Rescue transfer of unit ${unitId} failed: ${describeError(error)}`,
          { cause: error }
        );
      }

      this.deps.events.emit({ type: 'rescue.performed', actor, classId, unitId, to });
    });
  }

  private applyPaused(actor: string, paused: boolean): void {
    if (this.deps.controlRepo.isPaused() === paused) {
      return;
    }
    const now = this.deps.now ?? (() => new Date());
    this.deps.controlRepo.setPaused(paused, now().getTime());
    this.deps.events.emit({ type: paused ? 'recycler.paused' : 'recycler.unpaused', actor });
  }
}
