/**
 * Service Registry
 *
 * Builds the process-wide recycling system from environment configuration.
 * Asset classes listed in RECYCLER_CLASSES are attached to the directory at
 * startup; an embedding process may attach more.
 */

import {
  createRecyclingSystem,
  createSeededDirectory,
  loadRecyclerConfig,
  recyclerEvents,
} from '@recycler/core';

export const recyclerConfig = loadRecyclerConfig();

export const assetClassDirectory = createSeededDirectory(recyclerConfig.classes);

export const recyclingSystem = createRecyclingSystem({
  config: recyclerConfig,
  directory: assetClassDirectory,
  events: recyclerEvents,
});
