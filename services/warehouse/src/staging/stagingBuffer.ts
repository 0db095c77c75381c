import { StagingConflictError, StagingQueueFullError } from '../errors';
import type { Batch, Cadence } from '../model/types';
import { compareWatermarks } from '../model/watermarks';
import { setStagingPending } from '../observability/metrics';
import type { PendingDatesProvider } from '../partitions/partitionManager';

export interface StagingBufferOptions {
  maxPendingPerSource: number;
  discardHistory: number;
  now?: () => Date;
}

export interface DiscardedBatch {
  batchId: string;
  sourceId: string;
  cadence: Cadence;
  targetTable: string;
  recordCount: number;
  reason: string;
  discardedAt: string;
}

export interface StagedBatchSummary {
  batchId: string;
  stagingKey: string;
  targetTable: string;
  watermarkTo: string;
  recordCount: number;
  claimed: boolean;
  stagedAt: string;
}

interface StagedEntry {
  batch: Batch;
  stagedAt: string;
  claimed: boolean;
}

export function stagingKey(sourceId: string, cadence: Cadence): string {
  return `${sourceId}:${cadence}`;
}

function freezeBatch(batch: Batch): Batch {
  const records = Object.freeze(batch.records.map((record) => Object.freeze({ ...record })));
  return Object.freeze({ ...batch, watermarkRange: Object.freeze({ ...batch.watermarkRange }), records });
}

/**
 * Holds extracted batches until they are validated and loaded. Queues are kept per
 * (source, cadence) in watermark order, and each queue has at most one claimed batch.
 */
export class StagingBuffer implements PendingDatesProvider {
  private readonly queues = new Map<string, StagedEntry[]>();
  private readonly history: DiscardedBatch[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: StagingBufferOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Returns false when a batch with the same id is already staged. */
  stage(batch: Batch): boolean {
    if (this.locate(batch.id)) {
      return false;
    }
    const key = stagingKey(batch.sourceId, batch.cadence);
    const queue = this.queues.get(key) ?? [];
    if (queue.length >= this.options.maxPendingPerSource) {
      throw new StagingQueueFullError(key, this.options.maxPendingPerSource);
    }
    queue.push({ batch: freezeBatch(batch), stagedAt: this.now().toISOString(), claimed: false });
    queue.sort((a, b) => compareWatermarks(a.batch.watermarkRange.to, b.batch.watermarkRange.to));
    this.queues.set(key, queue);
    setStagingPending(key, queue.length);
    return true;
  }

  peek(sourceId: string, cadence?: Cadence): Batch | null {
    if (cadence) {
      return this.queues.get(stagingKey(sourceId, cadence))?.[0]?.batch ?? null;
    }
    for (const queue of this.queues.values()) {
      const head = queue[0];
      if (head && head.batch.sourceId === sourceId) {
        return head.batch;
      }
    }
    return null;
  }

  claim(batchId: string): Batch {
    const located = this.locate(batchId);
    if (!located) {
      throw new Error(`batch '${batchId}' is not staged`);
    }
    const { key, queue, entry } = located;
    const inFlight = queue.find((candidate) => candidate.claimed);
    if (inFlight) {
      throw new StagingConflictError(key, inFlight.batch.id);
    }
    if (queue[0] !== entry) {
      throw new Error(`batch '${batchId}' is not next in watermark order for ${key}`);
    }
    entry.claimed = true;
    return entry.batch;
  }

  /** Returns a claimed batch to the queue so a later attempt can claim it again. */
  release(batchId: string): void {
    const located = this.locate(batchId);
    if (located) {
      located.entry.claimed = false;
    }
  }

  commit(batchId: string): void {
    const located = this.locate(batchId);
    if (!located) {
      throw new Error(`batch '${batchId}' is not staged`);
    }
    this.remove(located.key, located.queue, located.entry);
  }

  discard(batchId: string, reason: string): DiscardedBatch {
    const located = this.locate(batchId);
    if (!located) {
      throw new Error(`batch '${batchId}' is not staged`);
    }
    this.remove(located.key, located.queue, located.entry);
    const { batch } = located.entry;
    const discarded: DiscardedBatch = {
      batchId: batch.id,
      sourceId: batch.sourceId,
      cadence: batch.cadence,
      targetTable: batch.targetTable,
      recordCount: batch.records.length,
      reason,
      discardedAt: this.now().toISOString()
    };
    this.history.push(discarded);
    while (this.history.length > this.options.discardHistory) {
      this.history.shift();
    }
    return discarded;
  }

  pendingEventDates(table: string): string[] {
    const dates = new Set<string>();
    for (const queue of this.queues.values()) {
      for (const { batch } of queue) {
        if (batch.targetTable !== table) {
          continue;
        }
        for (const record of batch.records) {
          dates.add(record.eventDate);
        }
      }
    }
    return [...dates].sort();
  }

  discarded(): DiscardedBatch[] {
    return this.history.map((entry) => ({ ...entry }));
  }

  snapshot(): StagedBatchSummary[] {
    const summaries: StagedBatchSummary[] = [];
    for (const [key, queue] of this.queues) {
      for (const entry of queue) {
        summaries.push({
          batchId: entry.batch.id,
          stagingKey: key,
          targetTable: entry.batch.targetTable,
          watermarkTo: entry.batch.watermarkRange.to,
          recordCount: entry.batch.records.length,
          claimed: entry.claimed,
          stagedAt: entry.stagedAt
        });
      }
    }
    return summaries;
  }

  private locate(batchId: string): { key: string; queue: StagedEntry[]; entry: StagedEntry } | null {
    for (const [key, queue] of this.queues) {
      const entry = queue.find((candidate) => candidate.batch.id === batchId);
      if (entry) {
        return { key, queue, entry };
      }
    }
    return null;
  }

  private remove(key: string, queue: StagedEntry[], entry: StagedEntry): void {
    const index = queue.indexOf(entry);
    if (index >= 0) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.queues.delete(key);
    }
    setStagingPending(key, queue.length);
  }
}
