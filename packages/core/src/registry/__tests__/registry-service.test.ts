/**
 * Class Registry Service Unit Tests
 *
 * Uses the in-memory repository and collaborators; no external state
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationError, ValidationError } from '../../errors.js';
import type { AssetClassCollaborator } from '../../assets/asset-class.js';
import {
  ADMIN,
  ALICE,
  FIXED_NOW,
  attachCollection,
  createTestSystem,
  type TestSystem,
} from '../../test/fixtures.js';
import {
  AlreadyRegisteredError,
  CapabilityMissingError,
  NotRegisteredError,
} from '../registry-errors.js';

describe('ClassRegistryService', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem();
    attachCollection(system.directory, 'cans', { 'can-1': ALICE });
  });

  describe('register', () => {
    it('should register a class as active with zeroed counters', async () => {
      const result = await system.registry.register({
        actor: ADMIN,
        classId: 'cans',
        pointsPerUnit: 100,
      });

      expect(result).toEqual({
        classId: 'cans',
        pointsPerUnit: 100,
        active: true,
        status: 'active',
        totalRecycled: 0,
        registeredAt: FIXED_NOW.getTime(),
        updatedAt: FIXED_NOW.getTime(),
      });
      expect(system.emitted).toEqual([
        {
          type: 'class.registered',
          actor: ADMIN,
          classId: 'cans',
          pointsPerUnit: 100,
          reactivated: false,
          timestamp: FIXED_NOW,
        },
      ]);
    });

    it('should reject non-admin actors', async () => {
      await expect(
        system.registry.register({ actor: ALICE, classId: 'cans', pointsPerUnit: 100 })
      ).rejects.toThrow(AuthorizationError);
      expect(system.registry.listClasses()).toEqual([]);
    });

    it('should reject a blank class id', async () => {
      await expect(
        system.registry.register({ actor: ADMIN, classId: '  ', pointsPerUnit: 100 })
      ).rejects.toThrow('Asset class id is required');
    });

    it('should reject a class id with surrounding whitespace', async () => {
      await expect(
        system.registry.register({ actor: ADMIN, classId: ' cans', pointsPerUnit: 100 })
      ).rejects.toThrow('Asset class id must not have surrounding whitespace: " cans"');
      expect(system.registry.listClasses()).toEqual([]);
      expect(system.queries.isAccepted('cans')).toBe(false);
    });

    it('should reject a class id that does not resolve to a collaborator', async () => {
      await expect(
        system.registry.register({ actor: ADMIN, classId: 'unknown', pointsPerUnit: 100 })
      ).rejects.toThrow(ValidationError);
    });

    it.each([0, -5, 1.5, 10_001])('should reject rate %s', async (rate) => {
      await expect(
        system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: rate })
      ).rejects.toThrow(ValidationError);
    });

    it('should accept a rate equal to the maximum', async () => {
      const result = await system.registry.register({
        actor: ADMIN,
        classId: 'cans',
        pointsPerUnit: 10_000,
      });
      expect(result.pointsPerUnit).toBe(10_000);
    });

    it('should reject collaborators without the ownership capability', async () => {
      const collaborator: AssetClassCollaborator = {
        ownerOf: async () => ALICE,
        transfer: async () => undefined,
        supportsCapability: async () => false,
      };
      system.directory.attach('bottles', collaborator);

      await expect(
        system.registry.register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 })
      ).rejects.toThrow(CapabilityMissingError);
    });

    it('should treat a failing capability check as missing', async () => {
      const checkFailure = new Error('capability lookup exploded');
      const collaborator: AssetClassCollaborator = {
        ownerOf: async () => ALICE,
        transfer: async () => undefined,
        supportsCapability: async () => {
          throw checkFailure;
        },
      };
      system.directory.attach('bottles', collaborator);

      const error = await system.registry
        .register({ actor: ADMIN, classId: 'bottles', pointsPerUnit: 10 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CapabilityMissingError);
      expect(error).toHaveProperty('cause', checkFailure);
    });

    it('should reject registering an active class again', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });

      await expect(
        system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 200 })
      ).rejects.toThrow(AlreadyRegisteredError);
    });

    it('should reactivate an inactive class keeping registeredAt and counters', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });
      await system.processor.recycleByTransfer({ actor: ALICE, classId: 'cans', unitId: 'can-1' });
      await system.registry.deactivate({ actor: ADMIN, classId: 'cans' });

      const result = await system.registry.register({
        actor: ADMIN,
        classId: 'cans',
        pointsPerUnit: 250,
      });

      expect(result.active).toBe(true);
      expect(result.pointsPerUnit).toBe(250);
      expect(result.totalRecycled).toBe(1);
      expect(result.registeredAt).toBe(FIXED_NOW.getTime());
      expect(system.emitted.at(-1)).toMatchObject({
        type: 'class.registered',
        reactivated: true,
      });
    });
  });

  describe('updateRate', () => {
    it('should change the rate and emit the previous one', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });

      const result = await system.registry.updateRate({
        actor: ADMIN,
        classId: 'cans',
        pointsPerUnit: 200,
      });

      expect(result.pointsPerUnit).toBe(200);
      expect(system.emitted.at(-1)).toMatchObject({
        type: 'class.rate_updated',
        classId: 'cans',
        previousPointsPerUnit: 100,
        pointsPerUnit: 200,
      });
    });

    it('should fail for a class that was never registered', async () => {
      await expect(
        system.registry.updateRate({ actor: ADMIN, classId: 'cans', pointsPerUnit: 200 })
      ).rejects.toThrow(NotRegisteredError);
    });

    it('should reject a zero rate', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });

      await expect(
        system.registry.updateRate({ actor: ADMIN, classId: 'cans', pointsPerUnit: 0 })
      ).rejects.toThrow('Points per unit must be a positive integer, got 0');
    });
  });

  describe('setActive and deactivate', () => {
    it('should toggle the active flag', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });

      const inactive = await system.registry.setActive({
        actor: ADMIN,
        classId: 'cans',
        active: false,
      });
      expect(inactive.status).toBe('inactive');

      const active = await system.registry.setActive({
        actor: ADMIN,
        classId: 'cans',
        active: true,
      });
      expect(active.status).toBe('active');
      expect(system.emitted.map((e) => e.type)).toEqual([
        'class.registered',
        'class.status_changed',
        'class.status_changed',
      ]);
    });

    it('should fail for a class that was never registered', async () => {
      await expect(
        system.registry.setActive({ actor: ADMIN, classId: 'cans', active: true })
      ).rejects.toThrow(NotRegisteredError);
      await expect(
        system.registry.deactivate({ actor: ADMIN, classId: 'cans' })
      ).rejects.toThrow(NotRegisteredError);
    });

    it('should keep the configuration after deactivation', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });
      await system.registry.deactivate({ actor: ADMIN, classId: 'cans' });

      expect(system.registry.listClasses()).toEqual([
        expect.objectContaining({ classId: 'cans', active: false, pointsPerUnit: 100 }),
      ]);
      expect(system.emitted.at(-1)).toMatchObject({ type: 'class.removed', classId: 'cans' });
    });

    it('should reject non-admin deactivation', async () => {
      await system.registry.register({ actor: ADMIN, classId: 'cans', pointsPerUnit: 100 });

      await expect(
        system.registry.deactivate({ actor: ALICE, classId: 'cans' })
      ).rejects.toThrow(AuthorizationError);
    });
  });
});
