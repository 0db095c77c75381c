import type { WarehouseCatalog } from '../config/catalog';
import { StorageUnavailableError } from '../errors';
import type {
  AggregateRow,
  AggregateState,
  LoadWatermarkRecord,
  PartitionRecord,
  StageRunRecord,
  StoredRejection,
  WarehouseRow
} from '../model/types';
import { rangeContains, type DateRange } from '../partitions/ranges';
import type {
  ChangeLogEntry,
  RejectionQuery,
  RetireMode,
  SnapshotReader,
  StageRunQuery,
  TransactionOptions,
  WarehouseStore,
  WarehouseTransaction
} from './types';

export interface MemoryState {
  watermarks: Map<string, LoadWatermarkRecord>;
  sequences: Map<string, number>;
  /** table -> natural key -> row. A natural key has at most one live row per table. */
  tables: Map<string, Map<string, WarehouseRow>>;
  archived: Map<string, WarehouseRow[]>;
  changes: ChangeLogEntry[];
  rejections: StoredRejection[];
  partitions: PartitionRecord[];
  aggregateRows: Map<string, AggregateRow[]>;
  aggregateStates: Map<string, AggregateState>;
}

function emptyState(): MemoryState {
  return {
    watermarks: new Map(),
    sequences: new Map(),
    tables: new Map(),
    archived: new Map(),
    changes: [],
    rejections: [],
    partitions: [],
    aggregateRows: new Map(),
    aggregateStates: new Map()
  };
}

function watermarkKey(sourceId: string, table: string): string {
  return `${sourceId}::${table}`;
}

function byNaturalKey(a: WarehouseRow, b: WarehouseRow): number {
  if (a.naturalKey === b.naturalKey) {
    return a.eventDate < b.eventDate ? -1 : a.eventDate > b.eventDate ? 1 : 0;
  }
  return a.naturalKey < b.naturalKey ? -1 : 1;
}

function byAggregateKey(a: AggregateRow, b: AggregateRow): number {
  if (a.period !== b.period) {
    return a.period < b.period ? -1 : 1;
  }
  return a.groupKey < b.groupKey ? -1 : a.groupKey > b.groupKey ? 1 : 0;
}

export class MemoryTransaction implements WarehouseTransaction {
  constructor(protected readonly state: MemoryState) {}

  async getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null> {
    const record = this.state.watermarks.get(watermarkKey(sourceId, table));
    return record ? { ...record } : null;
  }

  async setWatermark(record: LoadWatermarkRecord): Promise<void> {
    this.state.watermarks.set(watermarkKey(record.sourceId, record.targetTable), { ...record });
  }

  async nextLoadSequence(table: string): Promise<number> {
    const next = (this.state.sequences.get(table) ?? 0) + 1;
    this.state.sequences.set(table, next);
    return next;
  }

  async findRow(table: string, naturalKey: string): Promise<WarehouseRow | null> {
    const row = this.state.tables.get(table)?.get(naturalKey);
    return row ? structuredClone(row) : null;
  }

  async putRow(table: string, row: WarehouseRow): Promise<void> {
    const hasPartitions = this.state.partitions.some((partition) => partition.table === table);
    if (hasPartitions) {
      const covering = this.state.partitions.find(
        (partition) =>
          partition.table === table &&
          partition.status === 'active' &&
          rangeContains({ start: partition.rangeStart, end: partition.rangeEnd }, row.eventDate)
      );
      if (!covering) {
        throw new Error(`no partition of relation "${table}" found for row (event_date ${row.eventDate})`);
      }
    }
    let rows = this.state.tables.get(table);
    if (!rows) {
      rows = new Map();
      this.state.tables.set(table, rows);
    }
    rows.set(row.naturalKey, structuredClone(row));
  }

  async deleteRow(table: string, naturalKey: string, eventDate: string): Promise<void> {
    const rows = this.state.tables.get(table);
    const existing = rows?.get(naturalKey);
    if (rows && existing && existing.eventDate === eventDate) {
      rows.delete(naturalKey);
    }
  }

  async appendChange(entry: ChangeLogEntry): Promise<void> {
    this.state.changes.push({ ...entry, periods: [...entry.periods] });
  }

  async insertRejections(rejections: StoredRejection[]): Promise<void> {
    const known = new Set(this.state.rejections.map((rejection) => rejection.id));
    for (const rejection of rejections) {
      if (known.has(rejection.id)) {
        continue;
      }
      known.add(rejection.id);
      this.state.rejections.push(structuredClone(rejection));
    }
  }

  async listPartitions(table: string): Promise<PartitionRecord[]> {
    return this.state.partitions
      .filter((partition) => partition.table === table)
      .sort((a, b) => (a.rangeStart < b.rangeStart ? -1 : a.rangeStart > b.rangeStart ? 1 : 0))
      .map((partition) => ({ ...partition }));
  }

  async createPartition(partition: PartitionRecord): Promise<void> {
    const clash = this.state.partitions.find(
      (existing) => existing.table === partition.table && existing.rangeStart === partition.rangeStart
    );
    if (clash) {
      throw new Error(`partition ${clash.id} already registered for ${partition.table} at ${partition.rangeStart}`);
    }
    this.state.partitions.push({ ...partition });
  }

  async retirePartition(partition: PartitionRecord, mode: RetireMode, retiredAt: string): Promise<void> {
    const target = this.state.partitions.find((existing) => existing.id === partition.id);
    if (!target) {
      throw new Error(`partition ${partition.id} is not registered`);
    }
    const range: DateRange = { start: target.rangeStart, end: target.rangeEnd };
    const rows = this.state.tables.get(target.table);
    const moved: WarehouseRow[] = [];
    if (rows) {
      for (const [key, row] of rows) {
        if (rangeContains(range, row.eventDate)) {
          moved.push(row);
          rows.delete(key);
        }
      }
    }
    if (mode === 'detach') {
      this.state.archived.set(target.id, moved);
    }
    target.status = 'retired';
    target.retiredAt = retiredAt;
  }

  async replaceAggregateRows(aggregateId: string, periods: string[] | null, rows: AggregateRow[]): Promise<void> {
    const current = this.state.aggregateRows.get(aggregateId) ?? [];
    const replaced = periods === null ? new Set<string>() : new Set(periods);
    const kept = periods === null ? [] : current.filter((row) => !replaced.has(row.period));
    this.state.aggregateRows.set(aggregateId, [...kept, ...rows.map((row) => structuredClone(row))].sort(byAggregateKey));
  }

  async setAggregateState(state: AggregateState): Promise<void> {
    this.state.aggregateStates.set(state.aggregateId, structuredClone(state));
  }
}

/**
 * Process-local store backing `WAREHOUSE_STORAGE=inline`. Each transaction works on a copy of
 * the committed state and swaps it in on success; writers run one at a time.
 */
export class MemoryWarehouseStore implements WarehouseStore {
  readonly driver = 'inline' as const;
  private state: MemoryState = emptyState();
  private readonly stageRuns = new Map<string, StageRunRecord>();
  private writeTail: Promise<void> = Promise.resolve();
  private closed = false;

  protected createTransaction(draft: MemoryState): WarehouseTransaction {
    return new MemoryTransaction(draft);
  }

  async migrate(_catalog: WarehouseCatalog): Promise<void> {
    this.ensureOpen();
  }

  async ping(): Promise<void> {
    this.ensureOpen();
  }

  async transaction<T>(fn: (tx: WarehouseTransaction) => Promise<T>, _options?: TransactionOptions): Promise<T> {
    this.ensureOpen();
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.state);
      const result = await fn(this.createTransaction(draft));
      this.state = draft;
      return result;
    };
    const next = this.writeTail.then(run, run);
    this.writeTail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  async readSnapshot<T>(fn: (reader: SnapshotReader) => Promise<T>): Promise<T> {
    this.ensureOpen();
    const snapshot = new MemoryWarehouseStore();
    snapshot.state = structuredClone(this.state);
    return fn(snapshot);
  }

  async getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null> {
    const record = this.state.watermarks.get(watermarkKey(sourceId, table));
    return record ? { ...record } : null;
  }

  async listWatermarks(): Promise<LoadWatermarkRecord[]> {
    return [...this.state.watermarks.values()]
      .map((record) => ({ ...record }))
      .sort((a, b) => watermarkKey(a.sourceId, a.targetTable).localeCompare(watermarkKey(b.sourceId, b.targetTable)));
  }

  async getTableSequence(table: string): Promise<number> {
    return this.state.sequences.get(table) ?? 0;
  }

  async listChanges(table: string, afterSequence: number): Promise<ChangeLogEntry[]> {
    return this.state.changes
      .filter((entry) => entry.table === table && entry.loadSequence > afterSequence)
      .sort((a, b) => a.loadSequence - b.loadSequence)
      .map((entry) => ({ ...entry, periods: [...entry.periods] }));
  }

  async scanRows(table: string, range?: DateRange): Promise<WarehouseRow[]> {
    const rows = [...(this.state.tables.get(table)?.values() ?? [])];
    return rows
      .filter((row) => !range || rangeContains(range, row.eventDate))
      .sort(byNaturalKey)
      .map((row) => structuredClone(row));
  }

  async countRows(table: string): Promise<number> {
    return this.state.tables.get(table)?.size ?? 0;
  }

  async findExistingKeys(table: string, naturalKeys: string[]): Promise<Set<string>> {
    const rows = this.state.tables.get(table);
    return new Set(naturalKeys.filter((key) => rows?.has(key) ?? false));
  }

  async listPartitions(table?: string): Promise<PartitionRecord[]> {
    return this.state.partitions
      .filter((partition) => table === undefined || partition.table === table)
      .sort((a, b) => (a.table === b.table ? a.rangeStart.localeCompare(b.rangeStart) : a.table.localeCompare(b.table)))
      .map((partition) => ({ ...partition }));
  }

  async listRejections(query: RejectionQuery): Promise<StoredRejection[]> {
    const matches = this.state.rejections.filter(
      (rejection) =>
        rejection.rejectedAt >= query.since &&
        rejection.rejectedAt < query.until &&
        (query.table === undefined || rejection.targetTable === query.table) &&
        (query.sourceId === undefined || rejection.sourceId === query.sourceId)
    );
    const sorted = matches.sort((a, b) => a.rejectedAt.localeCompare(b.rejectedAt) || a.id.localeCompare(b.id));
    return (query.limit === undefined ? sorted : sorted.slice(0, query.limit)).map((rejection) =>
      structuredClone(rejection)
    );
  }

  async listAggregateRows(aggregateId: string, period?: string): Promise<AggregateRow[]> {
    return (this.state.aggregateRows.get(aggregateId) ?? [])
      .filter((row) => period === undefined || row.period === period)
      .map((row) => structuredClone(row));
  }

  async getAggregateState(aggregateId: string): Promise<AggregateState | null> {
    const state = this.state.aggregateStates.get(aggregateId);
    return state ? structuredClone(state) : null;
  }

  async listAggregateStates(): Promise<AggregateState[]> {
    return [...this.state.aggregateStates.values()]
      .map((state) => structuredClone(state))
      .sort((a, b) => a.aggregateId.localeCompare(b.aggregateId));
  }

  async recordStageRun(run: StageRunRecord): Promise<void> {
    this.ensureOpen();
    this.stageRuns.set(run.id, structuredClone(run));
  }

  async listStageRuns(query: StageRunQuery = {}): Promise<StageRunRecord[]> {
    const runs = [...this.stageRuns.values()]
      .filter(
        (run) =>
          (query.cycleId === undefined || run.cycleId === query.cycleId) &&
          (query.stageId === undefined || run.stageId === query.stageId)
      )
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt) || a.stageId.localeCompare(b.stageId));
    return (query.limit === undefined ? runs : runs.slice(0, query.limit)).map((run) => structuredClone(run));
  }

  /** Rows moved out of the live table by a detaching retirement. */
  archivedRows(partitionId: string): WarehouseRow[] {
    return (this.state.archived.get(partitionId) ?? []).map((row) => structuredClone(row));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageUnavailableError('inline store is closed');
    }
  }
}
