export {
  DESTRUCTION_CAPABILITY,
  OWNERSHIP_CAPABILITY,
  InMemoryAssetClassDirectory,
} from './asset-class.js';
export type { AssetClassCollaborator, AssetClassDirectory } from './asset-class.js';
export { InMemoryAssetClass, UnitDoesNotExistError } from './in-memory-asset-class.js';
export type { InMemoryAssetClassOptions } from './in-memory-asset-class.js';
export { createSeededDirectory } from './asset-class-seed.js';
export type { AssetClassSeed } from './asset-class-seed.js';
