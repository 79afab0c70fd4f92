/**
 * Class Registry Service
 *
 * Administrative configuration of accepted asset classes.
 * Classes move Unregistered -> Active <-> Inactive and never back to Unregistered.
 */

import { requireAdmin } from '../access/authorizer.js';
import type { Authorizer } from '../access/authorizer.js';
import { OWNERSHIP_CAPABILITY } from '../assets/asset-class.js';
import type { AssetClassDirectory } from '../assets/asset-class.js';
import { ValidationError } from '../errors.js';
import type { RecyclerEvents } from '../events/recycler-events.js';
import type { ExchangeGuard } from '../recycling/exchange-guard.js';
import type { AssetClassRepository } from './registry-repository.js';
import {
  AlreadyRegisteredError,
  CapabilityMissingError,
  NotRegisteredError,
} from './registry-errors.js';
import type {
  AssetClassConfig,
  AssetClassSnapshot,
  RegisterClassParams,
  RegistryLimits,
  SetActiveParams,
  UpdateRateParams,
} from './registry-types.js';

export interface ClassRegistryDependencies {
  classRepo: AssetClassRepository;
  directory: AssetClassDirectory;
  authorizer: Authorizer;
  guard: ExchangeGuard;
  events: RecyclerEvents;
  limits: RegistryLimits;
  now?: () => Date;
}

export class ClassRegistryService {
  private readonly classRepo: AssetClassRepository;
  private readonly directory: AssetClassDirectory;
  private readonly authorizer: Authorizer;
  private readonly guard: ExchangeGuard;
  private readonly events: RecyclerEvents;
  private readonly limits: RegistryLimits;
  private readonly now: () => Date;

  constructor(deps: ClassRegistryDependencies) {
    this.classRepo = deps.classRepo;
    this.directory = deps.directory;
    this.authorizer = deps.authorizer;
    this.guard = deps.guard;
    this.events = deps.events;
    this.limits = deps.limits;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Register an asset class, or reactivate an inactive one
   *
   * Business rules:
   * - classId must resolve to a collaborator in the directory
   * - the collaborator must report the ownership capability
   * - rate must be a positive integer no larger than the configured maximum
   * - an active class cannot be registered again
   *
   * Reactivating keeps registeredAt and totalRecycled.
   *
   * @throws {ValidationError} On blank id, unresolvable class or invalid rate
   * @throws {CapabilityMissingError} If the capability check is negative or fails
   * @throws {AlreadyRegisteredError} If the class is currently active
   */
  async register(params: RegisterClassParams): Promise<AssetClassSnapshot> {
    return this.guard.run('register', async () => {
      requireAdmin(this.authorizer, params.actor, 'register');

      const classId = this.requireClassId(params.classId);
      const collaborator = this.directory.resolve(classId);
      if (!collaborator) {
        throw new ValidationError(`Asset class ${classId} does not resolve to an asset collaborator`);
      }
      this.validateRate(params.pointsPerUnit);

      await this.requireOwnershipCapability(classId, () =>
        collaborator.supportsCapability(OWNERSHIP_CAPABILITY)
      );

      const existing = this.classRepo.findById(classId);
      if (existing?.active) {
        throw new AlreadyRegisteredError(classId);
      }

      const timestamp = this.now().getTime();
      const saved = this.classRepo.save(
        existing
          ? { ...existing, pointsPerUnit: params.pointsPerUnit, active: true, updatedAt: timestamp }
          : {
              classId,
              pointsPerUnit: params.pointsPerUnit,
              active: true,
              totalRecycled: 0,
              registeredAt: timestamp,
              updatedAt: timestamp,
            }
      );

      this.events.emit({
        type: 'class.registered',
        actor: params.actor,
        classId,
        pointsPerUnit: saved.pointsPerUnit,
        reactivated: existing !== null,
      });

      return toSnapshot(saved);
    });
  }

  /**
   * Change the rate used by future exchanges; recorded history is untouched
   *
   * @throws {NotRegisteredError} If the class was never registered
   * @throws {ValidationError} If the rate is zero or above the maximum
   */
  async updateRate(params: UpdateRateParams): Promise<AssetClassSnapshot> {
    return this.guard.run('updateRate', async () => {
      requireAdmin(this.authorizer, params.actor, 'updateRate');

      const existing = this.requireRegistered(params.classId);
      this.validateRate(params.pointsPerUnit);

      const saved = this.classRepo.save({
        ...existing,
        pointsPerUnit: params.pointsPerUnit,
        updatedAt: this.now().getTime(),
      });

      this.events.emit({
        type: 'class.rate_updated',
        actor: params.actor,
        classId: saved.classId,
        previousPointsPerUnit: existing.pointsPerUnit,
        pointsPerUnit: saved.pointsPerUnit,
      });

      return toSnapshot(saved);
    });
  }

  /**
   * Toggle eligibility without touching counters or history
   *
   * @throws {NotRegisteredError} If the class was never registered
   */
  async setActive(params: SetActiveParams): Promise<AssetClassSnapshot> {
    return this.guard.run('setActive', async () => {
      requireAdmin(this.authorizer, params.actor, 'setActive');
      const saved = this.applyActive(params.classId, params.active);

      this.events.emit({
        type: 'class.status_changed',
        actor: params.actor,
        classId: saved.classId,
        active: saved.active,
      });

      return toSnapshot(saved);
    });
  }

  /**
   * Soft removal: the class stops accepting exchanges, config and history stay
   *
   * @throws {NotRegisteredError} If the class was never registered
   */
  async deactivate(params: { actor: string; classId: string }): Promise<AssetClassSnapshot> {
    return this.guard.run('deactivate', async () => {
      requireAdmin(this.authorizer, params.actor, 'deactivate');
      const saved = this.applyActive(params.classId, false);

      this.events.emit({
        type: 'class.removed',
        actor: params.actor,
        classId: saved.classId,
      });

      return toSnapshot(saved);
    });
  }

  listClasses(): AssetClassSnapshot[] {
    return this.classRepo.findAll().map(toSnapshot);
  }

  private applyActive(classId: string, active: boolean): AssetClassConfig {
    const existing = this.requireRegistered(classId);
    return this.classRepo.save({
      ...existing,
      active,
      updatedAt: this.now().getTime(),
    });
  }

  private requireRegistered(classId: string): AssetClassConfig {
    const existing = this.classRepo.findById(classId);
    if (!existing || existing.registeredAt === 0) {
      throw new NotRegisteredError(classId);
    }
    return existing;
  }

  /** Ids are matched verbatim on every lookup */
  private requireClassId(classId: string): string {
    if (!classId.trim()) {
      throw new ValidationError('Asset class id is required');
    }
    if (classId !== classId.trim()) {
      throw new ValidationError(
        `Asset class id must not have surrounding whitespace: "${classId}"`
      );
    }
    return classId;
  }

  /**
   * @throws {ValidationError} If the rate is not an integer in 1..maxPointsPerUnit
   */
  private validateRate(pointsPerUnit: number): void {
    if (!Number.isInteger(pointsPerUnit) || pointsPerUnit <= 0) {
      throw new ValidationError(`Points per unit must be a positive integer, got ${pointsPerUnit}`);
    }
    if (pointsPerUnit > this.limits.maxPointsPerUnit) {
      throw new ValidationError(
        `Points per unit must not exceed ${this.limits.maxPointsPerUnit}, got ${pointsPerUnit}`
      );
    }
  }

  private async requireOwnershipCapability(
    classId: string,
    check: () => Promise<boolean>
  ): Promise<void> {
    let supported: boolean;
    try {
      supported = await check();
    } catch (error) {
      throw new CapabilityMissingError(classId, OWNERSHIP_CAPABILITY, { cause: error });
    }
    if (supported !== true) {
      throw new CapabilityMissingError(classId, OWNERSHIP_CAPABILITY);
    }
  }
}

export function toSnapshot(config: AssetClassConfig): AssetClassSnapshot {
  return { ...config, status: config.active ? 'active' : 'inactive' };
}
