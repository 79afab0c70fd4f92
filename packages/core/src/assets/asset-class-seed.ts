/**
 * Builds an in-memory directory from configured asset classes so a
 * standalone server has collections to register and recycle against.
 */

import { InMemoryAssetClassDirectory } from './asset-class.js';
import { InMemoryAssetClass } from './in-memory-asset-class.js';

export interface AssetClassSeed {
  classId: string;
  destructible: boolean;
  /** unitId -> owner */
  units: Record<string, string>;
}

export function createSeededDirectory(
  seeds: readonly AssetClassSeed[]
): InMemoryAssetClassDirectory {
  const directory = new InMemoryAssetClassDirectory();

  for (const seed of seeds) {
    const collection = new InMemoryAssetClass({ destructible: seed.destructible });
    for (const [unitId, owner] of Object.entries(seed.units)) {
      collection.mint(unitId, owner);
    }
    directory.attach(seed.classId, collection);
  }

  return directory;
}
