/**
 * In-memory asset class
 *
 * Reference collaborator holding unit ownership in a Map. Used by embedders
 * that keep assets in-process and by the test suites.
 */

import { DESTRUCTION_CAPABILITY, OWNERSHIP_CAPABILITY } from './asset-class.js';
import type { AssetClassCollaborator } from './asset-class.js';

export interface InMemoryAssetClassOptions {
  /** Expose destroy(); defaults to true */
  destructible?: boolean;
  /** Capabilities reported in addition to the defaults */
  capabilities?: string[];
}

export class UnitDoesNotExistError extends Error {
  constructor(unitId: string) {
    super(`Unit ${unitId} does not exist`);
    this.name = 'UnitDoesNotExistError';
  }
}

export class InMemoryAssetClass implements AssetClassCollaborator {
  private readonly owners = new Map<string, string>();
  private readonly capabilities: Set<string>;
  readonly destroy?: (unitId: string) => Promise<boolean>;

  constructor(options: InMemoryAssetClassOptions = {}) {
    const destructible = options.destructible ?? true;
    this.capabilities = new Set([OWNERSHIP_CAPABILITY, ...(options.capabilities ?? [])]);

    if (destructible) {
      this.capabilities.add(DESTRUCTION_CAPABILITY);
      this.destroy = async (unitId: string) => {
        if (!this.owners.has(unitId)) {
          return false;
        }
        this.owners.delete(unitId);
        return true;
      };
    }
  }

  mint(unitId: string, owner: string): void {
    if (this.owners.has(unitId)) {
      throw new Error(`Unit ${unitId} already exists`);
    }
    this.owners.set(unitId, owner);
  }

  has(unitId: string): boolean {
    return this.owners.has(unitId);
  }

  async ownerOf(unitId: string): Promise<string> {
    const owner = this.owners.get(unitId);
    if (owner === undefined) {
      throw new UnitDoesNotExistError(unitId);
    }
    return owner;
  }

  async transfer(from: string, to: string, unitId: string): Promise<void> {
    const owner = await this.ownerOf(unitId);
    if (owner !== from) {
      throw new Error(`Unit ${unitId} is not owned by ${from}`);
    }
    this.owners.set(unitId, to);
  }

  async supportsCapability(capability: string): Promise<boolean> {
    return this.capabilities.has(capability);
  }
}
