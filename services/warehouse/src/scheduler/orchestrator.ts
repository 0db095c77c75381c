import { randomUUID } from 'node:crypto';
import { planRetry, sleep, type BackoffOptions } from '@bankdw/shared';
import type { AggregateRefresher, RefreshResult } from '../aggregates/refresher';
import type { PipelineDefinition, WarehouseCatalog } from '../config/catalog';
import { describeError, isRetryable, PipelineCancelledError } from '../errors';
import type {
  Cadence,
  QualityReport,
  RefreshStrategy,
  StageKind,
  StageRunRecord,
  Watermark
} from '../model/types';
import type { Logger } from '../observability/logger';
import { observeStageRun } from '../observability/metrics';
import type { PartitionManager } from '../partitions/partitionManager';
import type { WarehouseStore } from '../storage/types';
import { maintainTable, partitionedTables, type TableMaintenanceResult } from './maintenance';
import { PipelineRunError, type PipelineRunner, type PipelineRunResult } from './pipeline';

export interface StageNode {
  id: string;
  kind: StageKind;
  dependsOn: string[];
  pipeline?: PipelineDefinition;
  /** Set on ETL stages planned only because a selected pipeline depends on them. */
  upstream?: boolean;
  aggregateId?: string;
  table?: string;
}

export interface CycleRequest {
  cadence?: Cadence;
  pipelineIds?: string[];
  /** Set to false for a cycle without ETL stages, e.g. maintenance only. */
  includeEtl?: boolean;
  /** Add refresh stages for aggregates reading the loaded tables. Defaults to true. */
  refreshAggregates?: boolean;
  refreshStrategy?: RefreshStrategy;
  /** Add partition maintenance stages for every partitioned table. */
  maintenance?: boolean;
  signal?: AbortSignal;
}

export type StageResult =
  | { kind: 'etl'; pipeline: PipelineRunResult }
  | { kind: 'refresh'; refresh: RefreshResult }
  | { kind: 'maintenance'; maintenance: TableMaintenanceResult };

export interface StageOutcome {
  stageId: string;
  kind: StageKind;
  status: 'succeeded' | 'failed' | 'blocked';
  attempts: number;
  watermark: Watermark | null;
  error: { code: string; message: string } | null;
  blockedBy: string[];
  safeToRerun: boolean;
  result: StageResult | null;
  /** Quality reports of every batch validated by the stage, including a failing one. */
  reports: QualityReport[];
}

export interface CycleResult {
  cycleId: string;
  startedAt: string;
  finishedAt: string;
  status: 'succeeded' | 'partial';
  stages: StageOutcome[];
  reports: QualityReport[];
}

export interface OrchestratorDeps {
  catalog: WarehouseCatalog;
  store: WarehouseStore;
  runner: PipelineRunner;
  refresher: AggregateRefresher;
  partitions: PartitionManager;
  logger: Logger;
  maxAttempts: number;
  concurrency: number;
  backoff: BackoffOptions;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  createId?: () => string;
}

export function selectPipelines(catalog: WarehouseCatalog, request: CycleRequest): PipelineDefinition[] {
  if (request.pipelineIds && request.pipelineIds.length > 0) {
    return request.pipelineIds.map((id) => {
      const pipeline = catalog.pipelines.find((candidate) => candidate.id === id);
      if (!pipeline) {
        throw new Error(`unknown pipeline '${id}'`);
      }
      return pipeline;
    });
  }
  return catalog.pipelines.filter((pipeline) => !request.cadence || pipeline.cadence === request.cadence);
}

/**
 * The selection plus every pipeline it depends on, transitively, in catalogue order. A
 * dependency with another cadence still has to load before the pipelines that read it.
 */
export function withUpstream(catalog: WarehouseCatalog, selection: PipelineDefinition[]): PipelineDefinition[] {
  const wanted = new Set<string>();
  const visit = (pipeline: PipelineDefinition) => {
    if (wanted.has(pipeline.id)) {
      return;
    }
    wanted.add(pipeline.id);
    for (const id of pipeline.dependsOn) {
      const upstream = catalog.pipelines.find((candidate) => candidate.id === id);
      if (!upstream) {
        throw new Error(`pipeline '${pipeline.id}' depends on unknown pipeline '${id}'`);
      }
      visit(upstream);
    }
  };
  selection.forEach(visit);
  return catalog.pipelines.filter((pipeline) => wanted.has(pipeline.id));
}

function assertAcyclic(nodes: StageNode[]): void {
  const byId = new Map(nodes.map((node) => [node.id, node]));
  const state = new Map<string, 'visiting' | 'done'>();
  const visit = (node: StageNode, trail: string[]) => {
    const current = state.get(node.id);
    if (current === 'done') {
      return;
    }
    if (current === 'visiting') {
      throw new Error(`pipeline dependency cycle: ${[...trail, node.id].join(' -> ')}`);
    }
    state.set(node.id, 'visiting');
    for (const dependency of node.dependsOn) {
      const target = byId.get(dependency);
      if (target) {
        visit(target, [...trail, node.id]);
      }
    }
    state.set(node.id, 'done');
  };
  nodes.forEach((node) => visit(node, []));
}

/**
 * One ETL stage per selected pipeline and per pipeline they depend on, ordered by `dependsOn`,
 * and one refresh stage per aggregate that reads a loaded table, after every load it reads.
 */
export function planCycle(
  catalog: WarehouseCatalog,
  request: CycleRequest,
  readersOf: (tables: Iterable<string>) => string[],
  aggregateTables: (aggregateId: string) => string[]
): StageNode[] {
  const selection = request.includeEtl === false ? [] : selectPipelines(catalog, request);
  const selected = new Set(selection.map((pipeline) => pipeline.id));
  const pipelines = withUpstream(catalog, selection);
  const nodes: StageNode[] = [];

  if (request.maintenance) {
    for (const table of partitionedTables(catalog)) {
      nodes.push({ id: `maintenance:${table}`, kind: 'maintenance', dependsOn: [], table });
    }
  }

  for (const pipeline of pipelines) {
    nodes.push({
      id: `etl:${pipeline.id}`,
      kind: 'etl',
      dependsOn: pipeline.dependsOn.map((id) => `etl:${id}`),
      pipeline,
      ...(selected.has(pipeline.id) ? {} : { upstream: true })
    });
  }

  if (request.refreshAggregates ?? true) {
    const loadedTables = new Set(pipelines.map((pipeline) => pipeline.targetTable));
    for (const aggregateId of readersOf(loadedTables)) {
      const reads = new Set(aggregateTables(aggregateId));
      nodes.push({
        id: `refresh:${aggregateId}`,
        kind: 'refresh',
        dependsOn: pipelines
          .filter((pipeline) => reads.has(pipeline.targetTable))
          .map((pipeline) => `etl:${pipeline.id}`),
        aggregateId
      });
    }
  }

  assertAcyclic(nodes);
  return nodes;
}

function failureWatermark(error: unknown): Watermark | null {
  return error instanceof PipelineRunError ? error.partial.watermark : null;
}

export class Orchestrator {
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly createId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
    this.createId = deps.createId ?? randomUUID;
  }

  plan(request: CycleRequest): StageNode[] {
    const { refresher } = this.deps;
    return planCycle(
      this.deps.catalog,
      request,
      (tables) => refresher.readersOf(tables),
      (aggregateId) => {
        const definition = refresher.definitions().find((candidate) => candidate.id === aggregateId);
        return definition ? [definition.factTable, ...definition.dimensionTables] : [];
      }
    );
  }

  async runCycle(request: CycleRequest = {}): Promise<CycleResult> {
    const cycleId = this.createId();
    const startedAt = this.now().toISOString();
    const nodes = this.plan(request);
    const outcomes = new Map<string, StageOutcome>();
    const running = new Map<string, Promise<void>>();
    const started = new Set<string>();
    const reports: QualityReport[] = [];
    const concurrency = Math.max(1, this.deps.concurrency);
    // Failures to record stage state; no new stage starts after the first.
    const faults: unknown[] = [];

    this.deps.logger.info(
      {
        cycleId,
        stages: nodes.map((node) => node.id),
        upstream: nodes.filter((node) => node.upstream).map((node) => node.id),
        cadence: request.cadence ?? null
      },
      'starting warehouse cycle'
    );

    const schedule = async () => {
      let progressed = true;
      while (progressed) {
        progressed = false;
        for (const node of nodes) {
          if (faults.length > 0) {
            return;
          }
          if (started.has(node.id)) {
            continue;
          }
          const dependencies = node.dependsOn.map((id) => outcomes.get(id));
          if (dependencies.some((outcome) => outcome === undefined)) {
            continue;
          }
          const unmet = node.dependsOn.filter((id) => outcomes.get(id)?.status !== 'succeeded');
          if (unmet.length > 0) {
            started.add(node.id);
            const outcome = this.blockedOutcome(node, unmet);
            outcomes.set(node.id, outcome);
            try {
              await this.recordBlocked(cycleId, node, outcome);
            } catch (err) {
              faults.push(err);
              return;
            }
            progressed = true;
            continue;
          }
          if (running.size >= concurrency) {
            return;
          }
          started.add(node.id);
          progressed = true;
          const task = this.runStage(cycleId, node, request)
            .then((outcome) => {
              outcomes.set(node.id, outcome);
              reports.push(...outcome.reports);
            })
            .catch((err: unknown) => {
              faults.push(err);
            })
            .finally(() => {
              running.delete(node.id);
            });
          running.set(node.id, task);
        }
      }
    };

    await schedule();
    while (running.size > 0) {
      await Promise.race(running.values());
      await schedule();
    }
    if (faults.length > 0) {
      this.deps.logger.error({ cycleId, err: faults[0] }, 'warehouse cycle aborted: stage state could not be recorded');
      throw faults[0];
    }

    const stages = nodes.map((node) => outcomes.get(node.id) ?? this.blockedOutcome(node, node.dependsOn));
    const status = stages.every((stage) => stage.status === 'succeeded') ? 'succeeded' : 'partial';
    const finishedAt = this.now().toISOString();
    this.deps.logger.info(
      {
        cycleId,
        status,
        failed: stages.filter((stage) => stage.status === 'failed').map((stage) => stage.stageId),
        blocked: stages.filter((stage) => stage.status === 'blocked').map((stage) => stage.stageId)
      },
      'warehouse cycle finished'
    );
    return { cycleId, startedAt, finishedAt, status, stages, reports };
  }

  private blockedOutcome(node: StageNode, blockedBy: string[]): StageOutcome {
    return {
      stageId: node.id,
      kind: node.kind,
      status: 'blocked',
      attempts: 0,
      watermark: null,
      error: null,
      blockedBy,
      safeToRerun: true,
      result: null,
      reports: []
    };
  }

  private async recordBlocked(cycleId: string, node: StageNode, outcome: StageOutcome): Promise<void> {
    const at = this.now().toISOString();
    await this.deps.store.recordStageRun({
      id: `${cycleId}:${node.id}`,
      cycleId,
      stageId: node.id,
      kind: node.kind,
      status: 'blocked',
      attempts: 0,
      startedAt: at,
      finishedAt: at,
      watermark: null,
      errorCode: null,
      errorMessage: `blocked by ${outcome.blockedBy.join(', ')}`,
      safeToRerun: true,
      details: { blockedBy: outcome.blockedBy }
    });
    observeStageRun({ kind: node.kind, status: 'blocked' });
    this.deps.logger.warn({ cycleId, stageId: node.id, blockedBy: outcome.blockedBy }, 'stage blocked');
  }

  private async runStage(cycleId: string, node: StageNode, request: CycleRequest): Promise<StageOutcome> {
    const run: StageRunRecord = {
      id: `${cycleId}:${node.id}`,
      cycleId,
      stageId: node.id,
      kind: node.kind,
      status: 'running',
      attempts: 0,
      startedAt: this.now().toISOString(),
      finishedAt: null,
      watermark: null,
      errorCode: null,
      errorMessage: null,
      safeToRerun: true,
      details: {}
    };
    const startedAt = process.hrtime.bigint();
    await this.deps.store.recordStageRun(run);

    let lastError: unknown = null;
    let reports: QualityReport[] = [];
    for (let attempt = 1; ; attempt += 1) {
      run.attempts = attempt;
      try {
        const result = await this.execute(node, request);
        const outcome: StageOutcome = {
          stageId: node.id,
          kind: node.kind,
          status: 'succeeded',
          attempts: attempt,
          watermark: result.kind === 'etl' ? result.pipeline.watermark : null,
          error: null,
          blockedBy: [],
          safeToRerun: true,
          result,
          reports: result.kind === 'etl' ? result.pipeline.reports : []
        };
        await this.finish(run, outcome, startedAt, this.stageDetails(result));
        return outcome;
      } catch (err) {
        lastError = err instanceof PipelineRunError ? err.failure : err;
        run.watermark = failureWatermark(err) ?? run.watermark;
        if (err instanceof PipelineRunError) {
          reports = err.partial.reports;
        }
        const decision = planRetry(attempt, this.deps.maxAttempts, isRetryable(lastError), this.deps.backoff);
        this.deps.logger.warn(
          { cycleId, stageId: node.id, attempt, retry: decision.retry, delayMs: decision.delayMs, err: lastError },
          'stage attempt failed'
        );
        if (!decision.retry) {
          break;
        }
        try {
          await this.sleep(decision.delayMs, request.signal);
        } catch (sleepError) {
          this.deps.logger.debug({ cycleId, stageId: node.id, err: sleepError }, 'retry wait interrupted');
          lastError = new PipelineCancelledError(node.id);
          break;
        }
      }
    }

    const error = describeError(lastError);
    const outcome: StageOutcome = {
      stageId: node.id,
      kind: node.kind,
      status: 'failed',
      attempts: run.attempts,
      watermark: run.watermark,
      error,
      blockedBy: [],
      safeToRerun: true,
      result: null,
      reports
    };
    await this.finish(run, outcome, startedAt, {});
    this.deps.logger.error(
      { cycleId, stageId: node.id, attempts: run.attempts, watermark: run.watermark, error },
      'stage failed'
    );
    return outcome;
  }

  private async execute(node: StageNode, request: CycleRequest): Promise<StageResult> {
    if (node.kind === 'etl' && node.pipeline) {
      return { kind: 'etl', pipeline: await this.deps.runner.run(node.pipeline, { signal: request.signal }) };
    }
    if (node.kind === 'refresh' && node.aggregateId) {
      return {
        kind: 'refresh',
        refresh: await this.deps.refresher.refresh(node.aggregateId, { strategy: request.refreshStrategy })
      };
    }
    if (node.kind === 'maintenance' && node.table) {
      return {
        kind: 'maintenance',
        maintenance: await maintainTable(this.deps.partitions, node.table, this.deps.logger)
      };
    }
    throw new Error(`stage ${node.id} has nothing to run`);
  }

  private stageDetails(result: StageResult): Record<string, unknown> {
    switch (result.kind) {
      case 'etl':
        return {
          batches: result.pipeline.batches.length,
          inserted: result.pipeline.batches.reduce((sum, batch) => sum + batch.load.inserted, 0),
          updated: result.pipeline.batches.reduce((sum, batch) => sum + batch.load.updated, 0),
          rejected: result.pipeline.batches.reduce((sum, batch) => sum + batch.rejected, 0)
        };
      case 'refresh':
        return { strategy: result.refresh.strategy, periods: result.refresh.periods, rows: result.refresh.rowCount };
      case 'maintenance':
        return {
          created: result.maintenance.created.map((partition) => partition.id),
          retired: result.maintenance.retention?.retired.map((partition) => partition.id) ?? []
        };
    }
  }

  private async finish(
    run: StageRunRecord,
    outcome: StageOutcome,
    startedAt: bigint,
    details: Record<string, unknown>
  ): Promise<void> {
    const finished: StageRunRecord = {
      ...run,
      status: outcome.status,
      attempts: outcome.attempts,
      finishedAt: this.now().toISOString(),
      watermark: outcome.watermark,
      errorCode: outcome.error?.code ?? null,
      errorMessage: outcome.error?.message ?? null,
      safeToRerun: outcome.safeToRerun,
      details
    };
    await this.deps.store.recordStageRun(finished);
    observeStageRun({
      kind: outcome.kind,
      status: outcome.status,
      durationSeconds: Number(process.hrtime.bigint() - startedAt) / 1e9
    });
  }
}
