/**
 * Asset Class Contract
 *
 * What the recycler requires from any registrable asset class.
 * Implementations are external and untrusted: every call may fail, and any call
 * may try to re-enter the recycler.
 */

/** Capability every registrable class must report through supportsCapability */
export const OWNERSHIP_CAPABILITY = 'asset-ownership/v1';

/** Optional capability advertised by classes that implement destroy() */
export const DESTRUCTION_CAPABILITY = 'asset-destruction/v1';

export interface AssetClassCollaborator {
  /**
   * Resolve the current owner of a unit.
   * Rejects when the unit does not exist.
   */
  ownerOf(unitId: string): Promise<string>;

  /** Authorized transfer of a unit between identities */
  transfer(from: string, to: string, unitId: string): Promise<void>;

  /**
   * Destroy a unit. Resolves false (or rejects) when destruction failed.
   * Absence is only discovered when a destructive exchange is attempted.
   */
  destroy?(unitId: string): Promise<boolean>;

  supportsCapability(capability: string): Promise<boolean>;
}

/**
 * Resolves an asset-class identifier to its collaborator
 */
export interface AssetClassDirectory {
  resolve(classId: string): AssetClassCollaborator | undefined;
}

export class InMemoryAssetClassDirectory implements AssetClassDirectory {
  private readonly collaborators = new Map<string, AssetClassCollaborator>();

  constructor(entries?: Iterable<readonly [string, AssetClassCollaborator]>) {
    if (entries) {
      for (const [classId, collaborator] of entries) {
        this.collaborators.set(classId, collaborator);
      }
    }
  }

  attach(classId: string, collaborator: AssetClassCollaborator): void {
    this.collaborators.set(classId, collaborator);
  }

  resolve(classId: string): AssetClassCollaborator | undefined {
    return this.collaborators.get(classId);
  }
}
