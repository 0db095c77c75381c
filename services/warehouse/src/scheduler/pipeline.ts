import type { PipelineDefinition, WarehouseCatalog } from '../config/catalog';
import {
  isRetryable,
  PipelineCancelledError,
  QualityThresholdExceededError,
  SourceSchemaMismatchError,
  SourceUnavailableError,
  describeError,
  throwIfAborted
} from '../errors';
import type { LoadCoordinator } from '../loading/loadCoordinator';
import { toStoredRejections } from '../loading/loadCoordinator';
import type { Batch, LoadResult, QualityReport, SourceRecord, Watermark } from '../model/types';
import { deriveBatchId, sortByWatermark, trimToWatermarkBoundary } from '../model/watermarks';
import type { Logger } from '../observability/logger';
import { observeBatch } from '../observability/metrics';
import type { SourceAdapter } from '../sources/types';
import type { SourceRegistry } from '../sources/registry';
import type { StagingBuffer } from '../staging/stagingBuffer';
import type { WarehouseStore } from '../storage/types';
import type { ValidationEngine } from '../validation/engine';

/** Records sharing one watermark may widen a batch up to this multiple of the batch size. */
const MAX_WIDENING_FACTOR = 16;
const DEFAULT_MAX_BATCHES = 100;

export interface PipelineRunnerDeps {
  catalog: WarehouseCatalog;
  store: WarehouseStore;
  sources: SourceRegistry;
  staging: StagingBuffer;
  validation: ValidationEngine;
  loader: LoadCoordinator;
  logger: Logger;
  extractTimeoutMs: number;
  now?: () => Date;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  /** Upper bound on batches drained in one run. */
  maxBatches?: number;
}

export interface BatchOutcome {
  batchId: string;
  records: number;
  accepted: number;
  rejected: number;
  load: LoadResult;
}

export interface PipelineRunResult {
  pipelineId: string;
  sourceId: string;
  targetTable: string;
  batches: BatchOutcome[];
  /** The (source, table) watermark after the run. */
  watermark: Watermark | null;
  reports: QualityReport[];
}

/** Thrown by `run` with the state reached before the failure attached. */
export class PipelineRunError extends Error {
  constructor(
    readonly failure: unknown,
    readonly partial: PipelineRunResult
  ) {
    super(describeError(failure).message, { cause: failure });
    this.name = 'PipelineRunError';
  }
}

export class PipelineRunner {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineRunnerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Drains a pipeline's source: staged leftovers first, then fresh extracts, until the source
   * is empty or `maxBatches` batches have been applied.
   */
  async run(pipeline: PipelineDefinition, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const maxBatches = options.maxBatches ?? DEFAULT_MAX_BATCHES;
    const result: PipelineRunResult = {
      pipelineId: pipeline.id,
      sourceId: pipeline.sourceId,
      targetTable: pipeline.targetTable,
      batches: [],
      watermark: (await this.deps.store.getWatermark(pipeline.sourceId, pipeline.targetTable))?.watermark ?? null,
      reports: []
    };

    try {
      while (result.batches.length < maxBatches) {
        throwIfAborted(options.signal, 'extract');
        const batch =
          this.deps.staging.peek(pipeline.sourceId, pipeline.cadence) ??
          (await this.extract(pipeline, result.watermark, options.signal));
        if (!batch) {
          break;
        }
        const outcome = await this.process(batch, options.signal, result.reports);
        result.batches.push(outcome);
        result.watermark = outcome.load.watermark;
      }
    } catch (err) {
      throw new PipelineRunError(err, result);
    }

    this.deps.logger.info(
      {
        pipelineId: pipeline.id,
        batches: result.batches.length,
        watermark: result.watermark
      },
      result.batches.length > 0 ? 'pipeline drained' : 'pipeline source empty'
    );
    return result;
  }

  /** Extracts the next batch after `since`, or null when the source has nothing newer. */
  async extract(pipeline: PipelineDefinition, since: Watermark | null, signal?: AbortSignal): Promise<Batch | null> {
    const source = this.deps.sources.definition(pipeline.sourceId);
    const adapter = this.deps.sources.get(pipeline.sourceId);
    const extractedAt = this.now().toISOString();
    const records = await this.extractWindow(adapter, source.batchSize, since, extractedAt, signal);
    const last = records[records.length - 1];
    if (!last) {
      return null;
    }
    const batch: Batch = {
      id: deriveBatchId({
        sourceId: pipeline.sourceId,
        cadence: pipeline.cadence,
        targetTable: pipeline.targetTable,
        from: since,
        to: last.sourceWatermark
      }),
      sourceId: pipeline.sourceId,
      cadence: pipeline.cadence,
      targetTable: pipeline.targetTable,
      extractedAt,
      watermarkRange: { from: since, to: last.sourceWatermark },
      records
    };
    if (this.deps.staging.stage(batch)) {
      this.deps.logger.debug(
        { batchId: batch.id, sourceId: batch.sourceId, records: records.length, to: batch.watermarkRange.to },
        'staged batch'
      );
    }
    return batch;
  }

  private async extractWindow(
    adapter: SourceAdapter,
    batchSize: number,
    since: Watermark | null,
    extractedAt: string,
    signal?: AbortSignal
  ): Promise<SourceRecord[]> {
    let limit = batchSize + 1;
    const ceiling = batchSize * MAX_WIDENING_FACTOR;
    for (;;) {
      const records = sortByWatermark(
        await this.withTimeout(adapter, (inner) => adapter.extract({ since, limit, extractedAt, signal: inner }), signal)
      );
      if (records.length <= batchSize) {
        return records;
      }
      const trimmed = trimToWatermarkBoundary(records, batchSize);
      const saturated = trimmed.length === records.length && records.length >= limit;
      if (!saturated) {
        return trimmed;
      }
      if (limit > ceiling) {
        const watermark = records[0]?.sourceWatermark ?? '';
        throw new SourceSchemaMismatchError(adapter.id, `more than ${ceiling} records share watermark '${watermark}'`);
      }
      limit *= 2;
    }
  }

  private async withTimeout<T>(
    adapter: SourceAdapter,
    run: (signal: AbortSignal) => Promise<T>,
    parent?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutMs = this.deps.extractTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const onParentAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new SourceUnavailableError(adapter.id, `extract timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          if (parent?.aborted) {
            reject(new PipelineCancelledError('extract'));
          }
        },
        { once: true }
      );
    });
    // Either side may settle after the race is decided.
    timeout.catch(() => undefined);
    cancelled.catch(() => undefined);

    try {
      if (parent?.aborted) {
        throw new PipelineCancelledError('extract');
      }
      return await Promise.race([run(controller.signal), timeout, cancelled]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private async process(batch: Batch, signal: AbortSignal | undefined, reports: QualityReport[]): Promise<BatchOutcome> {
    const { staging, validation, loader, logger } = this.deps;
    const started = process.hrtime.bigint();
    const elapsed = () => Number(process.hrtime.bigint() - started) / 1e9;

    staging.claim(batch.id);
    try {
      const validated = await validation.validate(batch, { signal });
      reports.push(validated.report);
      logger.info({ report: validated.report }, 'data quality report');
      const rejections = toStoredRejections(batch, validated.rejected, this.now().toISOString());

      if (validated.thresholdExceeded) {
        await loader.recordRejections(rejections);
        staging.discard(batch.id, 'quality threshold exceeded');
        observeBatch({ sourceId: batch.sourceId, table: batch.targetTable, result: 'rejected', durationSeconds: elapsed() });
        throw new QualityThresholdExceededError(
          batch.id,
          validated.rejected.length,
          batch.records.length,
          validation.rejectionThreshold
        );
      }

      const load = await loader.load(batch, validated.accepted, batch.targetTable, { signal, rejections });
      staging.commit(batch.id);
      observeBatch({
        sourceId: batch.sourceId,
        table: batch.targetTable,
        result: load.applied ? 'loaded' : 'noop',
        durationSeconds: elapsed()
      });
      return {
        batchId: batch.id,
        records: batch.records.length,
        accepted: validated.accepted.length,
        rejected: validated.rejected.length,
        load
      };
    } catch (err) {
      if (err instanceof QualityThresholdExceededError) {
        throw err;
      }
      if (isRetryable(err)) {
        staging.release(batch.id);
      } else {
        staging.discard(batch.id, describeError(err).message);
      }
      observeBatch({ sourceId: batch.sourceId, table: batch.targetTable, result: 'failed', durationSeconds: elapsed() });
      throw err;
    }
  }
}
