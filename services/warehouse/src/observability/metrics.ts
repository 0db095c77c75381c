import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { RefreshStrategy, StageKind, StageStatus } from '../model/types';

export interface MetricsOptions {
  enabled: boolean;
  collectDefaultMetrics: boolean;
  prefix: string;
}

export interface BatchMetricsInput {
  sourceId: string;
  table: string;
  result: 'loaded' | 'noop' | 'rejected' | 'failed';
  durationSeconds?: number;
}

export interface RecordOutcomeMetricsInput {
  table: string;
  inserted: number;
  updated: number;
  skipped: number;
  rejected: number;
}

export interface StageMetricsInput {
  kind: StageKind;
  status: StageStatus;
  durationSeconds?: number;
}

export interface AggregateRefreshMetricsInput {
  aggregateId: string;
  strategy: RefreshStrategy;
  result: 'success' | 'failure';
  durationSeconds?: number;
}

export interface HttpMetricInput {
  method: string;
  route: string;
  statusCode: number;
  durationSeconds?: number;
}

interface MetricsState {
  enabled: boolean;
  registry: Registry;
  prefix: string;
  batchesTotal: Counter<string> | null;
  batchDurationSeconds: Histogram<string> | null;
  recordsTotal: Counter<string> | null;
  stageRunsTotal: Counter<string> | null;
  stageDurationSeconds: Histogram<string> | null;
  aggregateRefreshTotal: Counter<string> | null;
  aggregateRefreshDurationSeconds: Histogram<string> | null;
  partitionsGauge: Gauge<string> | null;
  stagingPendingGauge: Gauge<string> | null;
  httpRequestsTotal: Counter<string> | null;
  httpRequestDurationSeconds: Histogram<string> | null;
}

const BATCH_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 120];
const STAGE_BUCKETS = [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300, 900];
const HTTP_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

let metricsState: MetricsState | null = null;

export function setupMetrics(options: MetricsOptions): MetricsState {
  if (metricsState) {
    return metricsState;
  }

  const enabled = options.enabled;
  const prefix = options.prefix;
  const registry = new Registry();
  if (enabled && options.collectDefaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix });
  }
  const registers = enabled ? [registry] : undefined;

  const batchesTotal = enabled
    ? new Counter({
        name: `${prefix}batches_total`,
        help: 'Batches processed grouped by source, target table and result',
        labelNames: ['source', 'table', 'result'],
        registers
      })
    : null;

  const batchDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}batch_duration_seconds`,
        help: 'Duration of extract, validate and load for a single batch',
        labelNames: ['source', 'table'],
        buckets: BATCH_BUCKETS,
        registers
      })
    : null;

  const recordsTotal = enabled
    ? new Counter({
        name: `${prefix}records_total`,
        help: 'Records grouped by target table and outcome',
        labelNames: ['table', 'outcome'],
        registers
      })
    : null;

  const stageRunsTotal = enabled
    ? new Counter({
        name: `${prefix}stage_runs_total`,
        help: 'Orchestrated stage runs grouped by kind and final status',
        labelNames: ['kind', 'status'],
        registers
      })
    : null;

  const stageDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}stage_duration_seconds`,
        help: 'Stage run durations in seconds grouped by kind',
        labelNames: ['kind'],
        buckets: STAGE_BUCKETS,
        registers
      })
    : null;

  const aggregateRefreshTotal = enabled
    ? new Counter({
        name: `${prefix}aggregate_refresh_total`,
        help: 'Aggregate refreshes grouped by aggregate, strategy and result',
        labelNames: ['aggregate', 'strategy', 'result'],
        registers
      })
    : null;

  const aggregateRefreshDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}aggregate_refresh_duration_seconds`,
        help: 'Aggregate refresh durations in seconds',
        labelNames: ['aggregate', 'strategy'],
        buckets: STAGE_BUCKETS,
        registers
      })
    : null;

  const partitionsGauge = enabled
    ? new Gauge({
        name: `${prefix}partitions`,
        help: 'Registered partitions grouped by table and status',
        labelNames: ['table', 'status'],
        registers
      })
    : null;

  const stagingPendingGauge = enabled
    ? new Gauge({
        name: `${prefix}staging_pending_batches`,
        help: 'Batches waiting in the staging buffer grouped by staging key',
        labelNames: ['key'],
        registers
      })
    : null;

  const httpRequestsTotal = enabled
    ? new Counter({
        name: `${prefix}http_requests_total`,
        help: 'HTTP request totals grouped by method, route, and status',
        labelNames: ['method', 'route', 'status'],
        registers
      })
    : null;

  const httpRequestDurationSeconds = enabled
    ? new Histogram({
        name: `${prefix}http_request_duration_seconds`,
        help: 'HTTP request durations in seconds grouped by method and route',
        labelNames: ['method', 'route'],
        buckets: HTTP_BUCKETS,
        registers
      })
    : null;

  metricsState = {
    enabled,
    registry,
    prefix,
    batchesTotal,
    batchDurationSeconds,
    recordsTotal,
    stageRunsTotal,
    stageDurationSeconds,
    aggregateRefreshTotal,
    aggregateRefreshDurationSeconds,
    partitionsGauge,
    stagingPendingGauge,
    httpRequestsTotal,
    httpRequestDurationSeconds
  };
  return metricsState;
}

export function getMetrics(): MetricsState | null {
  return metricsState;
}

export function resetMetrics(): void {
  metricsState = null;
}

export function observeBatch(input: BatchMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.batchesTotal) {
    return;
  }
  state.batchesTotal.labels(input.sourceId, input.table, input.result).inc();
  if (input.durationSeconds !== undefined && state.batchDurationSeconds) {
    state.batchDurationSeconds.labels(input.sourceId, input.table).observe(sanitizeMetricValue(input.durationSeconds));
  }
}

export function recordRecordOutcomes(input: RecordOutcomeMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.recordsTotal) {
    return;
  }
  const outcomes: Array<[string, number]> = [
    ['inserted', input.inserted],
    ['updated', input.updated],
    ['skipped', input.skipped],
    ['rejected', input.rejected]
  ];
  for (const [outcome, count] of outcomes) {
    if (count > 0) {
      state.recordsTotal.labels(input.table, outcome).inc(count);
    }
  }
}

export function observeStageRun(input: StageMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.stageRunsTotal) {
    return;
  }
  state.stageRunsTotal.labels(input.kind, input.status).inc();
  if (input.durationSeconds !== undefined && state.stageDurationSeconds) {
    state.stageDurationSeconds.labels(input.kind).observe(sanitizeMetricValue(input.durationSeconds));
  }
}

export function observeAggregateRefresh(input: AggregateRefreshMetricsInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.aggregateRefreshTotal) {
    return;
  }
  state.aggregateRefreshTotal.labels(input.aggregateId, input.strategy, input.result).inc();
  if (input.durationSeconds !== undefined && state.aggregateRefreshDurationSeconds) {
    state.aggregateRefreshDurationSeconds
      .labels(input.aggregateId, input.strategy)
      .observe(sanitizeMetricValue(input.durationSeconds));
  }
}

export function setPartitionCounts(table: string, counts: { active: number; retired: number }): void {
  const state = metricsState;
  if (!state?.enabled || !state.partitionsGauge) {
    return;
  }
  state.partitionsGauge.labels(table, 'active').set(sanitizeMetricValue(counts.active));
  state.partitionsGauge.labels(table, 'retired').set(sanitizeMetricValue(counts.retired));
}

export function setStagingPending(key: string, pending: number): void {
  const state = metricsState;
  if (!state?.enabled || !state.stagingPendingGauge) {
    return;
  }
  state.stagingPendingGauge.labels(key).set(sanitizeMetricValue(pending));
}

export function observeHttpRequest(input: HttpMetricInput): void {
  const state = metricsState;
  if (!state?.enabled || !state.httpRequestsTotal) {
    return;
  }
  const route = input.route || 'unknown';
  const method = input.method || 'UNKNOWN';
  state.httpRequestsTotal.labels(method, route, String(input.statusCode)).inc();
  if (input.durationSeconds !== undefined && state.httpRequestDurationSeconds) {
    state.httpRequestDurationSeconds.labels(method, route).observe(sanitizeMetricValue(input.durationSeconds));
  }
}

export function metricsEnabled(): boolean {
  return Boolean(metricsState?.enabled);
}

export function getMetricsRegistry(): Registry | null {
  return metricsState?.registry ?? null;
}

function sanitizeMetricValue(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}
