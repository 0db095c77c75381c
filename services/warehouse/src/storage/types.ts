import type { WarehouseCatalog } from '../config/catalog';
import type {
  AggregateRow,
  AggregateState,
  LoadWatermarkRecord,
  PartitionRecord,
  StageRunRecord,
  StoredRejection,
  WarehouseRow
} from '../model/types';
import type { DateRange } from '../partitions/ranges';

export type RetireMode = 'detach' | 'drop';

export interface ChangeLogEntry {
  table: string;
  loadSequence: number;
  batchId: string;
  /** Calendar months (YYYY-MM) touched by the load. */
  periods: string[];
  recordedAt: string;
}

export interface RejectionQuery {
  since: string;
  until: string;
  table?: string;
  sourceId?: string;
  limit?: number;
}

export interface StageRunQuery {
  cycleId?: string;
  stageId?: string;
  limit?: number;
}

export interface TransactionOptions {
  /** Keys held exclusively until the transaction ends, e.g. `warehouse:table:transaction_fact`. */
  lockKeys?: string[];
}

/**
 * Work performed inside one storage transaction. Nothing written here is visible to
 * readers of the store until the surrounding `transaction` callback resolves.
 */
export interface WarehouseTransaction {
  getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null>;
  setWatermark(record: LoadWatermarkRecord): Promise<void>;
  nextLoadSequence(table: string): Promise<number>;
  findRow(table: string, naturalKey: string): Promise<WarehouseRow | null>;
  putRow(table: string, row: WarehouseRow): Promise<void>;
  deleteRow(table: string, naturalKey: string, eventDate: string): Promise<void>;
  appendChange(entry: ChangeLogEntry): Promise<void>;
  insertRejections(rejections: StoredRejection[]): Promise<void>;
  listPartitions(table: string): Promise<PartitionRecord[]>;
  createPartition(partition: PartitionRecord): Promise<void>;
  retirePartition(partition: PartitionRecord, mode: RetireMode, retiredAt: string): Promise<void>;
  replaceAggregateRows(aggregateId: string, periods: string[] | null, rows: AggregateRow[]): Promise<void>;
  setAggregateState(state: AggregateState): Promise<void>;
}

/** Reads that all observe one committed state of the store. */
export interface SnapshotReader {
  getTableSequence(table: string): Promise<number>;
  listChanges(table: string, afterSequence: number): Promise<ChangeLogEntry[]>;
  scanRows(table: string, range?: DateRange): Promise<WarehouseRow[]>;
  listAggregateRows(aggregateId: string, period?: string): Promise<AggregateRow[]>;
  getAggregateState(aggregateId: string): Promise<AggregateState | null>;
}

export interface WarehouseStore extends SnapshotReader {
  readonly driver: 'postgres' | 'inline';
  migrate(catalog: WarehouseCatalog): Promise<void>;
  ping(): Promise<void>;
  transaction<T>(fn: (tx: WarehouseTransaction) => Promise<T>, options?: TransactionOptions): Promise<T>;
  /** Runs `fn` against a read-only snapshot; loads committed meanwhile stay invisible to it. */
  readSnapshot<T>(fn: (reader: SnapshotReader) => Promise<T>): Promise<T>;

  getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null>;
  listWatermarks(): Promise<LoadWatermarkRecord[]>;
  countRows(table: string): Promise<number>;
  /** The subset of `naturalKeys` that currently has a row in `table`. */
  findExistingKeys(table: string, naturalKeys: string[]): Promise<Set<string>>;
  listPartitions(table?: string): Promise<PartitionRecord[]>;
  listRejections(query: RejectionQuery): Promise<StoredRejection[]>;
  listAggregateStates(): Promise<AggregateState[]>;
  recordStageRun(run: StageRunRecord): Promise<void>;
  listStageRuns(query?: StageRunQuery): Promise<StageRunRecord[]>;
  close(): Promise<void>;
}

export function tableLockKey(table: string): string {
  return `warehouse:table:${table}`;
}
