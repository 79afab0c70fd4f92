/**
 * Asset Class Repository
 *
 * In-memory store of asset class configurations.
 * No business rules; entries are never removed.
 */

import type { AssetClassConfig } from './registry-types.js';

export class AssetClassRepository {
  private readonly classes = new Map<string, AssetClassConfig>();

  findById(classId: string): AssetClassConfig | null {
    const config = this.classes.get(classId);
    return config ? { ...config } : null;
  }

  /**
   * Registration order is Map insertion order
   */
  findAll(): AssetClassConfig[] {
    return [...this.classes.values()].map((config) => ({ ...config }));
  }

  countActive(): number {
    let count = 0;
    for (const config of this.classes.values()) {
      if (config.active) {
        count += 1;
      }
    }
    return count;
  }

  save(config: AssetClassConfig): AssetClassConfig {
    this.classes.set(config.classId, { ...config });
    return { ...config };
  }

  incrementRecycled(classId: string): void {
    const config = this.classes.get(classId);
    if (!config) {
      throw new Error(`Cannot count recycling for unknown asset class ${classId}`);
    }
    config.totalRecycled += 1;
  }

  /**
   * Sum of per-class counters, compared against the ledger length in tests
   */
  totalRecycled(): number {
    let total = 0;
    for (const config of this.classes.values()) {
      total += config.totalRecycled;
    }
    return total;
  }
}
