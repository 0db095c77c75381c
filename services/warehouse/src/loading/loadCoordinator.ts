import { findSource, findTable, type TableDefinition, type WarehouseCatalog } from '../config/catalog';
import type { TableLocks } from '../concurrency/tableLocks';
import { NoPartitionForDateError, throwIfAborted, UnknownTableError } from '../errors';
import type {
  Batch,
  LoadResult,
  PartitionRecord,
  RejectedRecord,
  SourceRecord,
  StoredRejection,
  UpsertOutcome,
  WarehouseRow
} from '../model/types';
import { isAtOrBefore, padCursor } from '../model/watermarks';
import type { Logger } from '../observability/logger';
import { recordRecordOutcomes } from '../observability/metrics';
import type { PartitionManager } from '../partitions/partitionManager';
import { monthKey, rangeContains } from '../partitions/ranges';
import type { WarehouseStore, WarehouseTransaction } from '../storage/types';

export interface LoadCoordinatorDeps {
  catalog: WarehouseCatalog;
  store: WarehouseStore;
  locks: TableLocks;
  partitions: PartitionManager;
  logger: Logger;
  now?: () => Date;
}

export interface LoadOptions {
  signal?: AbortSignal;
  /** Rejections of the same batch, written in the load's transaction. */
  rejections?: StoredRejection[];
}

interface IncomingWrite {
  naturalKey: string;
  extractedAt: string;
  sourcePriority: number;
}

/**
 * Conflict policy for a natural key written by more than one load: the later extraction wins,
 * a tie goes to the higher source priority, and an exact tie is a replay that rewrites the row.
 */
export function incomingWins(incoming: IncomingWrite, existing: WarehouseRow): boolean {
  if (incoming.extractedAt !== existing.extractedAt) {
    return incoming.extractedAt > existing.extractedAt;
  }
  return incoming.sourcePriority >= existing.sourcePriority;
}

function mergePayload(
  table: TableDefinition,
  existing: WarehouseRow | null,
  incoming: Record<string, unknown>
): Record<string, unknown> {
  if (!existing || !table.mutableFields) {
    return { ...incoming };
  }
  const merged = { ...existing.payload };
  for (const field of table.mutableFields) {
    if (field in incoming) {
      merged[field] = incoming[field];
    }
  }
  return merged;
}

/** `offset` continues the numbering after rejections already recorded for the batch. */
export function toStoredRejections(
  batch: Batch,
  rejected: readonly RejectedRecord[],
  rejectedAt: string,
  offset = 0
): StoredRejection[] {
  return rejected.map(({ record, reasons }, index) => ({
    id: `${batch.id}#${padCursor(offset + index, 6)}`,
    batchId: batch.id,
    sourceId: batch.sourceId,
    targetTable: batch.targetTable,
    naturalKey: record.naturalKey,
    eventDate: record.eventDate,
    payload: { ...record.payload },
    reasons: reasons.map((reason) => ({ ...reason })),
    rejectedAt
  }));
}

function unroutableRejection(record: SourceRecord, error: NoPartitionForDateError): RejectedRecord {
  return {
    record,
    reasons: [{ code: 'NoPartitionForDate', check: 'validity', field: 'eventDate', message: error.message }]
  };
}

function activeCovering(partitions: readonly PartitionRecord[], date: string): PartitionRecord | undefined {
  return partitions.find(
    (partition) =>
      partition.status === 'active' && rangeContains({ start: partition.rangeStart, end: partition.rangeEnd }, date)
  );
}

export class LoadCoordinator {
  private readonly now: () => Date;

  constructor(private readonly deps: LoadCoordinatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Applies accepted records and advances the (source, table) watermark in one transaction
   * under the table's exclusive section. A batch at or behind the watermark is a no-op.
   *
   * Fact partitions are ensured beforehand in their own short transaction. A record whose
   * date no partition may hold is stored as a `NoPartitionForDate` rejection and the rest of
   * the batch still loads.
   */
  async load(
    batch: Batch,
    accepted: readonly SourceRecord[],
    targetTable: string,
    options: LoadOptions = {}
  ): Promise<LoadResult> {
    const table = findTable(this.deps.catalog, targetTable);
    if (!table) {
      throw new UnknownTableError(targetTable);
    }
    const sourcePriority = findSource(this.deps.catalog, batch.sourceId)?.priority ?? 0;
    const unroutable =
      table.kind === 'fact'
        ? (await this.deps.partitions.resolvePartitions(targetTable, accepted.map((record) => record.eventDate)))
            .unroutable
        : new Map<string, NoPartitionForDateError>();
    const rejectedAt = this.now().toISOString();

    const result = await this.deps.locks.withTable(targetTable, async (tx) => {
      const current = await tx.getWatermark(batch.sourceId, targetTable);
      if (current && isAtOrBefore(batch.watermarkRange.to, current.watermark)) {
        return {
          batchId: batch.id,
          targetTable,
          inserted: 0,
          updated: 0,
          skipped: accepted.length,
          unroutable: 0,
          applied: false,
          watermark: current.watermark,
          loadSequence: null
        } satisfies LoadResult;
      }

      const loadSequence = await tx.nextLoadSequence(targetTable);
      const appliedAt = this.now().toISOString();
      const periods = new Set<string>();
      const counts: Record<UpsertOutcome, number> = { inserted: 0, updated: 0, skipped: 0 };
      const partitions = table.kind === 'fact' ? await tx.listPartitions(targetTable) : [];
      const unplaced: RejectedRecord[] = [];

      for (const record of accepted) {
        throwIfAborted(options.signal, 'load');
        let partitionId: string | null = null;
        if (table.kind === 'fact') {
          const partition = unroutable.has(record.eventDate) ? undefined : activeCovering(partitions, record.eventDate);
          if (!partition) {
            const error =
              unroutable.get(record.eventDate) ?? new NoPartitionForDateError(targetTable, record.eventDate, 'archived');
            unplaced.push(unroutableRejection(record, error));
            continue;
          }
          partitionId = partition.id;
        }
        const outcome = await this.upsert(tx, table, batch, record, partitionId, {
          sourcePriority,
          loadSequence,
          appliedAt,
          periods
        });
        counts[outcome] += 1;
      }

      const rejections = [
        ...(options.rejections ?? []),
        ...toStoredRejections(batch, unplaced, rejectedAt, options.rejections?.length ?? 0)
      ];

      await tx.appendChange({
        table: targetTable,
        loadSequence,
        batchId: batch.id,
        periods: [...periods].sort(),
        recordedAt: appliedAt
      });
      if (rejections.length > 0) {
        await tx.insertRejections(rejections);
      }
      throwIfAborted(options.signal, 'load');
      await tx.setWatermark({
        sourceId: batch.sourceId,
        targetTable,
        watermark: batch.watermarkRange.to,
        batchId: batch.id,
        loadSequence,
        appliedAt
      });

      return {
        batchId: batch.id,
        targetTable,
        ...counts,
        unroutable: unplaced.length,
        applied: true,
        watermark: batch.watermarkRange.to,
        loadSequence
      } satisfies LoadResult;
    });

    recordRecordOutcomes({
      table: targetTable,
      inserted: result.inserted,
      updated: result.updated,
      skipped: result.skipped,
      rejected: (options.rejections?.length ?? 0) + result.unroutable
    });
    if (result.unroutable > 0) {
      this.deps.logger.warn(
        { batchId: batch.id, table: targetTable, unroutable: result.unroutable },
        'records outside any retained partition were rejected'
      );
    }
    this.deps.logger.info(
      {
        batchId: batch.id,
        sourceId: batch.sourceId,
        table: targetTable,
        inserted: result.inserted,
        updated: result.updated,
        skipped: result.skipped,
        applied: result.applied,
        watermark: result.watermark
      },
      result.applied ? 'loaded batch' : 'batch already applied'
    );
    return result;
  }

  /** Persists the rejections of a batch that will not be loaded. */
  async recordRejections(rejections: StoredRejection[]): Promise<void> {
    if (rejections.length === 0) {
      return;
    }
    await this.deps.store.transaction((tx) => tx.insertRejections(rejections));
  }

  private async upsert(
    tx: WarehouseTransaction,
    table: TableDefinition,
    batch: Batch,
    record: SourceRecord,
    partitionId: string | null,
    load: { sourcePriority: number; loadSequence: number; appliedAt: string; periods: Set<string> }
  ): Promise<UpsertOutcome> {
    const existing = await tx.findRow(table.name, record.naturalKey);
    const incoming = {
      naturalKey: record.naturalKey,
      extractedAt: batch.extractedAt,
      sourcePriority: load.sourcePriority
    };
    if (existing && !incomingWins(incoming, existing)) {
      return 'skipped';
    }

    if (existing && existing.eventDate !== record.eventDate) {
      await tx.deleteRow(table.name, existing.naturalKey, existing.eventDate);
      load.periods.add(monthKey(existing.eventDate));
    }

    await tx.putRow(table.name, {
      naturalKey: record.naturalKey,
      eventDate: record.eventDate,
      partitionId,
      payload: mergePayload(table, existing, record.payload),
      sourceId: batch.sourceId,
      sourcePriority: load.sourcePriority,
      extractedAt: batch.extractedAt,
      batchId: batch.id,
      loadSequence: load.loadSequence,
      lastUpdated: load.appliedAt
    });
    load.periods.add(monthKey(record.eventDate));
    return existing ? 'updated' : 'inserted';
  }
}
