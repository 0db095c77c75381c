import { AggregateRefresher } from './aggregates/refresher';
import { loadCatalogFile, type WarehouseCatalog } from './config/catalog';
import type { ServiceConfig } from './config/serviceConfig';
import { TableLocks } from './concurrency/tableLocks';
import { LoadCoordinator } from './loading/loadCoordinator';
import type { Logger } from './observability/logger';
import { PartitionManager } from './partitions/partitionManager';
import { Orchestrator } from './scheduler/orchestrator';
import { PipelineRunner } from './scheduler/pipeline';
import type { FetchLike } from './sources/jsonApiSource';
import type { RelationalQuery } from './sources/relationalSource';
import { SourceRegistry } from './sources/registry';
import type { SourceAdapter } from './sources/types';
import { StagingBuffer } from './staging/stagingBuffer';
import { createWarehouseStore } from './storage';
import type { WarehouseStore } from './storage/types';
import { storeReferenceResolver, ValidationEngine } from './validation/engine';

export interface WarehouseRuntime {
  config: ServiceConfig;
  catalog: WarehouseCatalog;
  logger: Logger;
  store: WarehouseStore;
  locks: TableLocks;
  staging: StagingBuffer;
  partitions: PartitionManager;
  sources: SourceRegistry;
  validation: ValidationEngine;
  loader: LoadCoordinator;
  refresher: AggregateRefresher;
  runner: PipelineRunner;
  orchestrator: Orchestrator;
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  catalog?: WarehouseCatalog;
  store?: WarehouseStore;
  adapters?: SourceAdapter[];
  fetchImpl?: FetchLike;
  relationalQuery?: RelationalQuery;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Wires the ETL engine from service configuration; the store is migrated before it is returned. */
export async function createWarehouseRuntime(
  config: ServiceConfig,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): Promise<WarehouseRuntime> {
  const catalog = overrides.catalog ?? loadCatalogFile(config.catalogPath);
  const store = overrides.store ?? createWarehouseStore(config, catalog, logger);
  const now = overrides.now;

  await store.migrate(catalog);

  const locks = new TableLocks(store);
  const staging = new StagingBuffer({
    maxPendingPerSource: config.staging.maxPendingPerSource,
    discardHistory: config.staging.discardHistory,
    now
  });
  const partitions = new PartitionManager({ store, catalog, locks, logger, pending: staging, now });
  const sources = new SourceRegistry(
    catalog,
    { fetchImpl: overrides.fetchImpl, relationalQuery: overrides.relationalQuery },
    overrides.adapters
  );
  const validation = new ValidationEngine({
    catalog,
    resolver: storeReferenceResolver(store),
    rejectionThreshold: config.validation.rejectionThreshold,
    rules: config.validation.rules,
    plausibleFrom: config.validation.plausibleFrom,
    futureToleranceDays: config.validation.futureToleranceDays,
    sampleSize: config.validation.sampleSize,
    logger,
    now
  });
  const loader = new LoadCoordinator({ catalog, store, locks, partitions, logger, now });
  const refresher = new AggregateRefresher({
    catalog,
    store,
    logger,
    defaultStrategy: config.aggregates.defaultStrategy,
    now
  });
  const runner = new PipelineRunner({
    catalog,
    store,
    sources,
    staging,
    validation,
    loader,
    logger,
    extractTimeoutMs: config.scheduler.extractTimeoutMs,
    now
  });
  const orchestrator = new Orchestrator({
    catalog,
    store,
    runner,
    refresher,
    partitions,
    logger,
    maxAttempts: config.scheduler.maxAttempts,
    concurrency: config.scheduler.concurrency,
    backoff: config.scheduler.backoff,
    now,
    sleep: overrides.sleep
  });

  return {
    config,
    catalog,
    logger,
    store,
    locks,
    staging,
    partitions,
    sources,
    validation,
    loader,
    refresher,
    runner,
    orchestrator,
    async close() {
      await sources.closeAll();
      await store.close();
    }
  };
}
