/**
 * Shared test fixtures for the core suites
 */

import { InMemoryAssetClass } from '../assets/in-memory-asset-class.js';
import { InMemoryAssetClassDirectory } from '../assets/asset-class.js';
import type { RecyclerConfig } from '../config.js';
import { RecyclerEventEmitter } from '../events/recycler-events.js';
import type { RecyclerEvent } from '../events/recycler-events.js';
import { createRecyclingSystem } from '../system.js';
import type { RecyclingSystem } from '../system.js';

export const ADMIN = 'admin-1';
export const CUSTODY = 'custody-vault';
export const ALICE = 'alice';
export const BOB = 'bob';
export const FIXED_NOW = new Date('2026-01-01T00:00:00.000Z');

export const TEST_CONFIG: RecyclerConfig = {
  adminId: ADMIN,
  custodyId: CUSTODY,
  maxPointsPerUnit: 10_000,
  classes: [],
};

export interface TestSystem extends RecyclingSystem {
  directory: InMemoryAssetClassDirectory;
  emitted: RecyclerEvent[];
}

export function createTestSystem(config: Partial<RecyclerConfig> = {}): TestSystem {
  const directory = new InMemoryAssetClassDirectory();
  const now = () => FIXED_NOW;
  const events = new RecyclerEventEmitter(now);
  const emitted: RecyclerEvent[] = [];
  events.on((event) => {
    emitted.push(event);
  });

  const system = createRecyclingSystem({
    config: { ...TEST_CONFIG, ...config },
    directory,
    events,
    now,
  });

  return { ...system, directory, emitted };
}

/**
 * Attach an in-memory class and mint the given units
 */
export function attachCollection(
  directory: InMemoryAssetClassDirectory,
  classId: string,
  units: Record<string, string>,
  options?: ConstructorParameters<typeof InMemoryAssetClass>[0]
): InMemoryAssetClass {
  const collection = new InMemoryAssetClass(options);
  for (const [unitId, owner] of Object.entries(units)) {
    collection.mint(unitId, owner);
  }
  directory.attach(classId, collection);
  return collection;
}

/**
 * Collection whose destroy() reports success without removing the unit
 */
export class PhantomDestroyCollection extends InMemoryAssetClass {
  override readonly destroy = async (_unitId: string): Promise<boolean> => true;
}
