/**
 * Recycling system composition
 *
 * Wires repositories and services around one shared guard, so that every
 * top-level mutation of a system is serialized against the others.
 */

import type { Authorizer } from './access/authorizer.js';
import { SingleAdminAuthorizer } from './access/authorizer.js';
import type { AssetClassDirectory } from './assets/asset-class.js';
import { BatchCoordinator } from './batch/batch-coordinator.js';
import type { RecyclerConfig } from './config.js';
import { ControlRepository } from './control/control-repository.js';
import { ControlService } from './control/control-service.js';
import { RecyclerEventEmitter } from './events/recycler-events.js';
import type { RecyclerEvents } from './events/recycler-events.js';
import { LedgerRepository } from './ledger/ledger-repository.js';
import { QueryService } from './queries/query-service.js';
import { ExchangeGuard } from './recycling/exchange-guard.js';
import { RecycleProcessor } from './recycling/recycle-processor.js';
import { AssetClassRepository } from './registry/registry-repository.js';
import { ClassRegistryService } from './registry/registry-service.js';

export interface RecyclingSystemOptions {
  config: RecyclerConfig;
  directory: AssetClassDirectory;
  authorizer?: Authorizer;
  events?: RecyclerEvents;
  now?: () => Date;
}

export interface RecyclingSystem {
  registry: ClassRegistryService;
  processor: RecycleProcessor;
  batch: BatchCoordinator;
  queries: QueryService;
  control: ControlService;
  events: RecyclerEvents;
  repositories: {
    classes: AssetClassRepository;
    ledger: LedgerRepository;
    control: ControlRepository;
  };
}

export function createRecyclingSystem(options: RecyclingSystemOptions): RecyclingSystem {
  const { config, directory, now } = options;
  const authorizer = options.authorizer ?? new SingleAdminAuthorizer(config.adminId);
  const events = options.events ?? new RecyclerEventEmitter(now);
  const guard = new ExchangeGuard();

  const classRepo = new AssetClassRepository();
  const ledgerRepo = new LedgerRepository();
  const controlRepo = new ControlRepository();

  const registry = new ClassRegistryService({
    classRepo,
    directory,
    authorizer,
    guard,
    events,
    limits: { maxPointsPerUnit: config.maxPointsPerUnit },
    now,
  });
  const processor = new RecycleProcessor({
    classRepo,
    ledgerRepo,
    controlRepo,
    directory,
    guard,
    events,
    custodyId: config.custodyId,
    now,
  });
  const batch = new BatchCoordinator(processor, guard, events);
  const queries = new QueryService({ classRepo, ledgerRepo, controlRepo, directory });
  const control = new ControlService({
    controlRepo,
    classRepo,
    directory,
    authorizer,
    guard,
    events,
    custodyId: config.custodyId,
    now,
  });

  return {
    registry,
    processor,
    batch,
    queries,
    control,
    events,
    repositories: { classes: classRepo, ledger: ledgerRepo, control: controlRepo },
  };
}
