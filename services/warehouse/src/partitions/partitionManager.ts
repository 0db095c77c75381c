import type { PartitioningPolicy, TableDefinition, WarehouseCatalog } from '../config/catalog';
import { findTable } from '../config/catalog';
import type { TableLocks } from '../concurrency/tableLocks';
import { NoPartitionForDateError, UnknownTableError } from '../errors';
import type { PartitionRecord } from '../model/types';
import type { Logger } from '../observability/logger';
import { setPartitionCounts } from '../observability/metrics';
import type { RetireMode, WarehouseStore, WarehouseTransaction } from '../storage/types';
import {
  addPeriods,
  enumeratePeriods,
  parseIsoDate,
  partitionName,
  periodRange,
  periodStart,
  rangeContains,
  todayUtc,
  type DateRange,
  type PartitionGranularity
} from './ranges';

/** Supplies event dates that are staged but not yet loaded, per target table. */
export interface PendingDatesProvider {
  pendingEventDates(table: string): string[];
}

export interface PartitionManagerDeps {
  store: WarehouseStore;
  catalog: WarehouseCatalog;
  locks: TableLocks;
  logger: Logger;
  pending?: PendingDatesProvider;
  now?: () => Date;
}

export interface RetireResult {
  table: string;
  before: string;
  retired: PartitionRecord[];
  /** The oldest partition that was eligible but still has staged work. Retirement stops there. */
  blockedBy: PartitionRecord | null;
}

export interface PartitionCoverage {
  table: string;
  granularity: PartitionGranularity;
  partitions: PartitionRecord[];
  /** Contiguous runs of active partitions, oldest first. */
  ranges: DateRange[];
  gaps: DateRange[];
  earliest: string | null;
  latest: string | null;
  active: number;
  retired: number;
}

export interface PartitionResolution {
  /** Active partition per routable event date. */
  routed: Map<string, PartitionRecord>;
  /** Event dates no partition may hold, with the reason. */
  unroutable: Map<string, NoPartitionForDateError>;
}

interface EnsureOutcome {
  partition: PartitionRecord;
  created: PartitionRecord[];
}

type PartitionedTable = TableDefinition & { partitioning: PartitioningPolicy };

function isPartitioned(table: TableDefinition): table is PartitionedTable {
  return table.kind === 'fact' && table.partitioning !== undefined;
}

function findCovering(partitions: PartitionRecord[], date: string): PartitionRecord | undefined {
  return partitions.find((partition) => rangeContains({ start: partition.rangeStart, end: partition.rangeEnd }, date));
}

/** Dates before this boundary belong to retired history and are never recreated. */
function retiredBoundary(partitions: PartitionRecord[]): string | null {
  let boundary: string | null = null;
  for (const partition of partitions) {
    if (partition.status === 'retired' && (boundary === null || partition.rangeEnd > boundary)) {
      boundary = partition.rangeEnd;
    }
  }
  return boundary;
}

export class PartitionManager {
  private readonly now: () => Date;

  constructor(private readonly deps: PartitionManagerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  partitionedTable(table: string): PartitionedTable {
    const definition = findTable(this.deps.catalog, table);
    if (!definition || !isPartitioned(definition)) {
      throw new UnknownTableError(table);
    }
    return definition;
  }

  async ensurePartition(table: string, date: string): Promise<PartitionRecord> {
    this.partitionedTable(table);
    const outcome = await this.deps.locks.withTable(table, (tx) => this.ensureWithin(tx, table, date));
    await this.afterChange(table, outcome.created);
    return outcome.partition;
  }

  /**
   * Ensures partitions for every date of a batch in one short transaction, so partition DDL
   * never runs inside a load transaction. Dates that cannot be routed are reported, not thrown.
   */
  async resolvePartitions(table: string, dates: Iterable<string>): Promise<PartitionResolution> {
    this.partitionedTable(table);
    const distinct = [...new Set(dates)].sort();
    const { resolution, created } = await this.deps.locks.withTable(table, async (tx) => {
      const collected: PartitionRecord[] = [];
      const routed = new Map<string, PartitionRecord>();
      const unroutable = new Map<string, NoPartitionForDateError>();
      for (const date of distinct) {
        try {
          const outcome = await this.ensureWithin(tx, table, date);
          routed.set(date, outcome.partition);
          collected.push(...outcome.created);
        } catch (err) {
          if (!(err instanceof NoPartitionForDateError)) {
            throw err;
          }
          unroutable.set(date, err);
        }
      }
      return { resolution: { routed, unroutable } satisfies PartitionResolution, created: collected };
    });
    await this.afterChange(table, created);
    return resolution;
  }

  async route(table: string, date: string): Promise<PartitionRecord> {
    this.partitionedTable(table);
    parseIsoDate(date);
    const partitions = await this.deps.store.listPartitions(table);
    const covering = findCovering(partitions, date);
    if (covering && covering.status === 'active') {
      return covering;
    }
    const boundary = retiredBoundary(partitions);
    if (covering || (boundary !== null && date < boundary)) {
      throw new NoPartitionForDateError(table, date, 'archived');
    }
    throw new NoPartitionForDateError(table, date, 'missing');
  }

  async precreate(table: string, periods?: number, from?: string): Promise<PartitionRecord[]> {
    const definition = this.partitionedTable(table);
    const granularity = definition.partitioning.granularity;
    const ahead = periods ?? definition.partitioning.precreatePeriods;
    const current = periodStart(from ?? todayUtc(this.now()), granularity);

    const created = await this.deps.locks.withTable(table, async (tx) => {
      const collected: PartitionRecord[] = [];
      for (let offset = 0; offset <= ahead; offset += 1) {
        const outcome = await this.ensureWithin(tx, table, addPeriods(current, granularity, offset), true);
        collected.push(...outcome.created);
      }
      return collected;
    });
    await this.afterChange(table, created);
    return created;
  }

  async retire(table: string, before: string, mode?: RetireMode): Promise<RetireResult> {
    const definition = this.partitionedTable(table);
    parseIsoDate(before);
    const retireMode = mode ?? definition.partitioning.retention?.mode ?? 'detach';
    const pendingDates = this.deps.pending?.pendingEventDates(table) ?? [];

    const result = await this.deps.locks.withTable(table, async (tx) => {
      const partitions = await tx.listPartitions(table);
      const eligible = partitions.filter((partition) => partition.status === 'active' && partition.rangeEnd <= before);
      const retired: PartitionRecord[] = [];
      let blockedBy: PartitionRecord | null = null;
      const retiredAt = this.now().toISOString();

      for (const partition of eligible) {
        const range = { start: partition.rangeStart, end: partition.rangeEnd };
        if (pendingDates.some((date) => rangeContains(range, date))) {
          blockedBy = partition;
          break;
        }
        await tx.retirePartition(partition, retireMode, retiredAt);
        retired.push({ ...partition, status: 'retired', retiredAt });
      }

      return { table, before, retired, blockedBy } satisfies RetireResult;
    });

    if (result.blockedBy) {
      this.deps.logger.warn(
        { table, partition: result.blockedBy.id },
        'partition retirement stopped at a partition with staged records'
      );
    }
    if (result.retired.length > 0) {
      this.deps.logger.info(
        { table, mode: retireMode, retired: result.retired.map((partition) => partition.id) },
        'retired warehouse partitions'
      );
    }
    await this.refreshGauges(table);
    return result;
  }

  /** Retire everything older than the table's retention window, if it declares one. */
  async applyRetention(table: string): Promise<RetireResult | null> {
    const definition = this.partitionedTable(table);
    const retention = definition.partitioning.retention;
    if (!retention) {
      return null;
    }
    const granularity = definition.partitioning.granularity;
    const current = periodStart(todayUtc(this.now()), granularity);
    const before = addPeriods(current, granularity, -retention.keepPeriods);
    return this.retire(table, before, retention.mode);
  }

  async coverage(table: string): Promise<PartitionCoverage> {
    const definition = this.partitionedTable(table);
    const partitions = await this.deps.store.listPartitions(table);
    const active = partitions.filter((partition) => partition.status === 'active');
    const ranges: DateRange[] = [];
    const gaps: DateRange[] = [];
    for (const partition of active) {
      const last = ranges[ranges.length - 1];
      if (last && last.end === partition.rangeStart) {
        last.end = partition.rangeEnd;
        continue;
      }
      if (last) {
        gaps.push({ start: last.end, end: partition.rangeStart });
      }
      ranges.push({ start: partition.rangeStart, end: partition.rangeEnd });
    }
    return {
      table,
      granularity: definition.partitioning.granularity,
      partitions,
      ranges,
      gaps,
      earliest: active[0]?.rangeStart ?? null,
      latest: active[active.length - 1]?.rangeEnd ?? null,
      active: active.length,
      retired: partitions.length - active.length
    };
  }

  private async ensureWithin(
    tx: WarehouseTransaction,
    table: string,
    date: string,
    force = false
  ): Promise<EnsureOutcome> {
    const definition = this.partitionedTable(table);
    parseIsoDate(date);
    const granularity = definition.partitioning.granularity;
    const partitions = await tx.listPartitions(table);

    const covering = findCovering(partitions, date);
    if (covering) {
      if (covering.status === 'retired') {
        throw new NoPartitionForDateError(table, date, 'archived');
      }
      return { partition: covering, created: [] };
    }

    const boundary = retiredBoundary(partitions);
    if (boundary !== null && date < boundary) {
      throw new NoPartitionForDateError(table, date, 'archived');
    }
    if (!definition.partitioning.autoCreate && !force) {
      throw new NoPartitionForDateError(table, date, 'missing');
    }

    const target = periodRange(date, granularity);
    const active = partitions.filter((partition) => partition.status === 'active');
    const earliest = active[0];
    const latest = active[active.length - 1];

    // With every partition retired, contiguity resumes from the retired boundary.
    const lowerBound = latest ? latest.rangeEnd : boundary;
    let fill: DateRange = target;
    if (lowerBound !== null && target.start >= lowerBound) {
      fill = { start: lowerBound, end: target.end };
    } else if (earliest && target.end <= earliest.rangeStart) {
      fill = { start: target.start, end: earliest.rangeStart };
    }

    const createdAt = this.now().toISOString();
    const created: PartitionRecord[] = [];
    for (const range of enumeratePeriods(fill.start, fill.end, granularity)) {
      const record: PartitionRecord = {
        id: partitionName(table, range.start, granularity),
        table,
        rangeStart: range.start,
        rangeEnd: range.end,
        status: 'active',
        createdAt,
        retiredAt: null
      };
      await tx.createPartition(record);
      created.push(record);
    }

    const partition = findCovering(created, date);
    if (!partition) {
      throw new Error(`partition fill for ${table} did not cover ${date}`);
    }
    return { partition, created };
  }

  private async afterChange(table: string, created: PartitionRecord[]): Promise<void> {
    if (created.length > 0) {
      this.deps.logger.info({ table, created: created.map((partition) => partition.id) }, 'created warehouse partitions');
    }
    await this.refreshGauges(table);
  }

  private async refreshGauges(table: string): Promise<void> {
    const partitions = await this.deps.store.listPartitions(table);
    const active = partitions.filter((partition) => partition.status === 'active').length;
    setPartitionCounts(table, { active, retired: partitions.length - active });
  }
}
