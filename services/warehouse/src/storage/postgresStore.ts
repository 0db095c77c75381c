import type { PoolClient, QueryResultRow } from 'pg';
import { quoteIdentifier } from '@bankdw/shared';
import type { TableDefinition, WarehouseCatalog } from '../config/catalog';
import type { WarehouseDatabase } from '../db/client';
import { buildCreatePartitionStatement, buildRetirePartitionStatement, buildTableStatements } from '../db/schema';
import { StorageUnavailableError, UnknownTableError, isWarehouseError } from '../errors';
import type {
  AggregateRow,
  AggregateState,
  LoadWatermarkRecord,
  PartitionRecord,
  PartitionStatus,
  RefreshStrategy,
  RejectionReason,
  StageKind,
  StageRunRecord,
  StageStatus,
  StoredRejection,
  WarehouseRow
} from '../model/types';
import { isIsoDate, type DateRange } from '../partitions/ranges';
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

type Timestamp = Date | string;

type WarehouseRowRecord = {
  natural_key: string;
  event_date: string;
  partition_id: string;
  payload: Record<string, unknown>;
  source_id: string;
  source_priority: number;
  extracted_at: Timestamp;
  batch_id: string;
  load_seq: number;
  last_updated: Timestamp;
};

type WatermarkRecordRow = {
  source_id: string;
  target_table: string;
  watermark: string;
  batch_id: string;
  load_seq: number;
  applied_at: Timestamp;
};

type PartitionRow = {
  id: string;
  table_name: string;
  range_start: string;
  range_end: string;
  status: PartitionStatus;
  created_at: Timestamp;
  retired_at: Timestamp | null;
};

type ChangeLogRow = {
  table_name: string;
  load_seq: number;
  batch_id: string;
  periods: string[];
  recorded_at: Timestamp;
};

type RejectionRow = {
  id: string;
  batch_id: string;
  source_id: string;
  target_table: string;
  natural_key: string;
  event_date: string | null;
  payload: Record<string, unknown>;
  reasons: RejectionReason[];
  rejected_at: Timestamp;
};

type AggregateRowRecord = {
  aggregate_id: string;
  period: string;
  group_key: string;
  values: Record<string, number | string | null>;
};

type AggregateStateRow = {
  aggregate_id: string;
  refreshed_through: Record<string, number>;
  strategy: RefreshStrategy;
  refreshed_at: Timestamp;
  row_count: number;
};

type StageRunRow = {
  id: string;
  cycle_id: string;
  stage_id: string;
  kind: StageKind;
  status: StageStatus;
  attempts: number;
  started_at: Timestamp;
  finished_at: Timestamp | null;
  watermark: string | null;
  error_code: string | null;
  error_message: string | null;
  safe_to_rerun: boolean;
  details: Record<string, unknown>;
};

const ROW_SELECT = `natural_key, event_date, tableoid::regclass::text AS partition_id, payload, source_id,
  source_priority, extracted_at, batch_id, load_seq, last_updated`;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'EPIPE',
  '57P01',
  '57P02',
  '57P03',
  '53300'
]);

function toIso(value: Timestamp): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toIsoOrNull(value: Timestamp | null): string | null {
  return value === null ? null : toIso(value);
}

function errorCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }
  if (err instanceof Error) {
    return /connection terminated|timeout exceeded when trying to connect|cannot use a pool after calling end/i.test(
      err.message
    );
  }
  return false;
}

function mapStorageError(operation: string, err: unknown): unknown {
  if (isWarehouseError(err)) {
    return err;
  }
  if (isConnectionError(err)) {
    const detail = err instanceof Error ? err.message : String(err);
    return new StorageUnavailableError(`${operation}: ${detail}`, { cause: err });
  }
  return err;
}

function mapWarehouseRow(row: WarehouseRowRecord, kind: TableDefinition['kind']): WarehouseRow {
  return {
    naturalKey: row.natural_key,
    eventDate: row.event_date,
    partitionId: kind === 'fact' ? row.partition_id : null,
    payload: row.payload,
    sourceId: row.source_id,
    sourcePriority: row.source_priority,
    extractedAt: toIso(row.extracted_at),
    batchId: row.batch_id,
    loadSequence: row.load_seq,
    lastUpdated: toIso(row.last_updated)
  };
}

function mapWatermark(row: WatermarkRecordRow): LoadWatermarkRecord {
  return {
    sourceId: row.source_id,
    targetTable: row.target_table,
    watermark: row.watermark,
    batchId: row.batch_id,
    loadSequence: row.load_seq,
    appliedAt: toIso(row.applied_at)
  };
}

function mapPartition(row: PartitionRow): PartitionRecord {
  return {
    id: row.id,
    table: row.table_name,
    rangeStart: row.range_start,
    rangeEnd: row.range_end,
    status: row.status,
    createdAt: toIso(row.created_at),
    retiredAt: toIsoOrNull(row.retired_at)
  };
}

function mapChange(row: ChangeLogRow): ChangeLogEntry {
  return {
    table: row.table_name,
    loadSequence: row.load_seq,
    batchId: row.batch_id,
    periods: row.periods,
    recordedAt: toIso(row.recorded_at)
  };
}

function mapRejection(row: RejectionRow): StoredRejection {
  return {
    id: row.id,
    batchId: row.batch_id,
    sourceId: row.source_id,
    targetTable: row.target_table,
    naturalKey: row.natural_key,
    eventDate: row.event_date ?? '',
    payload: row.payload,
    reasons: row.reasons,
    rejectedAt: toIso(row.rejected_at)
  };
}

function mapAggregateRow(row: AggregateRowRecord): AggregateRow {
  return {
    aggregateId: row.aggregate_id,
    period: row.period,
    groupKey: row.group_key,
    values: row.values
  };
}

function mapAggregateState(row: AggregateStateRow): AggregateState {
  return {
    aggregateId: row.aggregate_id,
    refreshedThrough: row.refreshed_through,
    strategy: row.strategy,
    refreshedAt: toIso(row.refreshed_at),
    rowCount: row.row_count
  };
}

function mapStageRun(row: StageRunRow): StageRunRecord {
  return {
    id: row.id,
    cycleId: row.cycle_id,
    stageId: row.stage_id,
    kind: row.kind,
    status: row.status,
    attempts: row.attempts,
    startedAt: toIso(row.started_at),
    finishedAt: toIsoOrNull(row.finished_at),
    watermark: row.watermark,
    errorCode: row.error_code,
    errorMessage: row.error_message,
    safeToRerun: row.safe_to_rerun,
    details: row.details
  };
}

class PostgresTransaction implements WarehouseTransaction {
  constructor(
    private readonly client: PoolClient,
    private readonly resolveTable: (name: string) => TableDefinition
  ) {}

  async getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null> {
    const { rows } = await this.client.query<WatermarkRecordRow>(
      `SELECT * FROM load_watermarks WHERE source_id = $1 AND target_table = $2 FOR UPDATE`,
      [sourceId, table]
    );
    return rows[0] ? mapWatermark(rows[0]) : null;
  }

  async setWatermark(record: LoadWatermarkRecord): Promise<void> {
    await this.client.query(
      `INSERT INTO load_watermarks (source_id, target_table, watermark, batch_id, load_seq, applied_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (source_id, target_table) DO UPDATE
         SET watermark = EXCLUDED.watermark,
             batch_id = EXCLUDED.batch_id,
             load_seq = EXCLUDED.load_seq,
             applied_at = EXCLUDED.applied_at`,
      [record.sourceId, record.targetTable, record.watermark, record.batchId, record.loadSequence, record.appliedAt]
    );
  }

  async nextLoadSequence(table: string): Promise<number> {
    const { rows } = await this.client.query<{ last_seq: number }>(
      `INSERT INTO table_load_sequences (table_name, last_seq) VALUES ($1, 1)
       ON CONFLICT (table_name) DO UPDATE SET last_seq = table_load_sequences.last_seq + 1
       RETURNING last_seq`,
      [table]
    );
    const next = rows[0]?.last_seq;
    if (next === undefined) {
      throw new Error(`failed to allocate a load sequence for ${table}`);
    }
    return next;
  }

  async findRow(table: string, naturalKey: string): Promise<WarehouseRow | null> {
    const definition = this.resolveTable(table);
    const { rows } = await this.client.query<WarehouseRowRecord>(
      `SELECT ${ROW_SELECT} FROM ${quoteIdentifier(table)} WHERE natural_key = $1 FOR UPDATE`,
      [naturalKey]
    );
    return rows[0] ? mapWarehouseRow(rows[0], definition.kind) : null;
  }

  async putRow(table: string, row: WarehouseRow): Promise<void> {
    const definition = this.resolveTable(table);
    const conflictTarget = definition.kind === 'fact' ? '(natural_key, event_date)' : '(natural_key)';
    await this.client.query(
      `INSERT INTO ${quoteIdentifier(table)}
         (natural_key, event_date, payload, source_id, source_priority, extracted_at, batch_id, load_seq, last_updated)
       VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7, $8, $9)
       ON CONFLICT ${conflictTarget} DO UPDATE
         SET event_date = EXCLUDED.event_date,
             payload = EXCLUDED.payload,
             source_id = EXCLUDED.source_id,
             source_priority = EXCLUDED.source_priority,
             extracted_at = EXCLUDED.extracted_at,
             batch_id = EXCLUDED.batch_id,
             load_seq = EXCLUDED.load_seq,
             last_updated = EXCLUDED.last_updated`,
      [
        row.naturalKey,
        row.eventDate,
        JSON.stringify(row.payload),
        row.sourceId,
        row.sourcePriority,
        row.extractedAt,
        row.batchId,
        row.loadSequence,
        row.lastUpdated
      ]
    );
  }

  async deleteRow(table: string, naturalKey: string, eventDate: string): Promise<void> {
    this.resolveTable(table);
    await this.client.query(`DELETE FROM ${quoteIdentifier(table)} WHERE natural_key = $1 AND event_date = $2`, [
      naturalKey,
      eventDate
    ]);
  }

  async appendChange(entry: ChangeLogEntry): Promise<void> {
    await this.client.query(
      `INSERT INTO fact_change_log (table_name, load_seq, batch_id, periods, recorded_at)
       VALUES ($1, $2, $3, $4::text[], $5)`,
      [entry.table, entry.loadSequence, entry.batchId, entry.periods, entry.recordedAt]
    );
  }

  async insertRejections(rejections: StoredRejection[]): Promise<void> {
    for (const rejection of rejections) {
      await this.client.query(
        `INSERT INTO rejected_records
           (id, batch_id, source_id, target_table, natural_key, event_date, payload, reasons, rejected_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::jsonb, $9)
         ON CONFLICT (id) DO NOTHING`,
        [
          rejection.id,
          rejection.batchId,
          rejection.sourceId,
          rejection.targetTable,
          rejection.naturalKey,
          isIsoDate(rejection.eventDate) ? rejection.eventDate : null,
          JSON.stringify(rejection.payload),
          JSON.stringify(rejection.reasons),
          rejection.rejectedAt
        ]
      );
    }
  }

  async listPartitions(table: string): Promise<PartitionRecord[]> {
    const { rows } = await this.client.query<PartitionRow>(
      `SELECT * FROM warehouse_partitions WHERE table_name = $1 ORDER BY range_start FOR UPDATE`,
      [table]
    );
    return rows.map(mapPartition);
  }

  async createPartition(partition: PartitionRecord): Promise<void> {
    await this.client.query(
      buildCreatePartitionStatement(partition.table, partition.id, partition.rangeStart, partition.rangeEnd)
    );
    await this.client.query(
      `INSERT INTO warehouse_partitions (id, table_name, range_start, range_end, status, created_at)
       VALUES ($1, $2, $3, $4, 'active', $5)`,
      [partition.id, partition.table, partition.rangeStart, partition.rangeEnd, partition.createdAt]
    );
  }

  async retirePartition(partition: PartitionRecord, mode: RetireMode, retiredAt: string): Promise<void> {
    await this.client.query(buildRetirePartitionStatement(partition.table, partition.id, mode));
    await this.client.query(`UPDATE warehouse_partitions SET status = 'retired', retired_at = $2 WHERE id = $1`, [
      partition.id,
      retiredAt
    ]);
  }

  async replaceAggregateRows(aggregateId: string, periods: string[] | null, rows: AggregateRow[]): Promise<void> {
    if (periods === null) {
      await this.client.query('DELETE FROM aggregate_rows WHERE aggregate_id = $1', [aggregateId]);
    } else if (periods.length > 0) {
      await this.client.query('DELETE FROM aggregate_rows WHERE aggregate_id = $1 AND period = ANY($2::text[])', [
        aggregateId,
        periods
      ]);
    }
    for (const row of rows) {
      await this.client.query(
        `INSERT INTO aggregate_rows (aggregate_id, period, group_key, "values") VALUES ($1, $2, $3, $4::jsonb)`,
        [row.aggregateId, row.period, row.groupKey, JSON.stringify(row.values)]
      );
    }
  }

  async setAggregateState(state: AggregateState): Promise<void> {
    await this.client.query(
      `INSERT INTO aggregate_state (aggregate_id, refreshed_through, strategy, refreshed_at, row_count)
       VALUES ($1, $2::jsonb, $3, $4, $5)
       ON CONFLICT (aggregate_id) DO UPDATE
         SET refreshed_through = EXCLUDED.refreshed_through,
             strategy = EXCLUDED.strategy,
             refreshed_at = EXCLUDED.refreshed_at,
             row_count = EXCLUDED.row_count`,
      [state.aggregateId, JSON.stringify(state.refreshedThrough), state.strategy, state.refreshedAt, state.rowCount]
    );
  }
}

/** Plain reads over one client; inside a REPEATABLE READ transaction they share a snapshot. */
class PostgresReader implements SnapshotReader {
  constructor(
    private readonly client: PoolClient,
    private readonly resolveTable: (name: string) => TableDefinition
  ) {}

  async getTableSequence(table: string): Promise<number> {
    const { rows } = await this.client.query<{ last_seq: number }>(
      'SELECT last_seq FROM table_load_sequences WHERE table_name = $1',
      [table]
    );
    return rows[0]?.last_seq ?? 0;
  }

  async listChanges(table: string, afterSequence: number): Promise<ChangeLogEntry[]> {
    const { rows } = await this.client.query<ChangeLogRow>(
      'SELECT * FROM fact_change_log WHERE table_name = $1 AND load_seq > $2 ORDER BY load_seq',
      [table, afterSequence]
    );
    return rows.map(mapChange);
  }

  async scanRows(table: string, range?: DateRange): Promise<WarehouseRow[]> {
    const definition = this.resolveTable(table);
    const { rows } = await this.client.query<WarehouseRowRecord>(
      `SELECT ${ROW_SELECT} FROM ${quoteIdentifier(table)}
        WHERE ($1::date IS NULL OR event_date >= $1::date)
          AND ($2::date IS NULL OR event_date < $2::date)
        ORDER BY natural_key, event_date`,
      [range?.start ?? null, range?.end ?? null]
    );
    return rows.map((row) => mapWarehouseRow(row, definition.kind));
  }

  async listAggregateRows(aggregateId: string, period?: string): Promise<AggregateRow[]> {
    const { rows } = await this.client.query<AggregateRowRecord>(
      `SELECT * FROM aggregate_rows WHERE aggregate_id = $1 AND ($2::text IS NULL OR period = $2)
        ORDER BY period, group_key`,
      [aggregateId, period ?? null]
    );
    return rows.map(mapAggregateRow);
  }

  async getAggregateState(aggregateId: string): Promise<AggregateState | null> {
    const { rows } = await this.client.query<AggregateStateRow>(
      'SELECT * FROM aggregate_state WHERE aggregate_id = $1',
      [aggregateId]
    );
    return rows[0] ? mapAggregateState(rows[0]) : null;
  }
}

export class PostgresWarehouseStore implements WarehouseStore {
  readonly driver = 'postgres' as const;
  private readonly tables: Map<string, TableDefinition>;

  constructor(private readonly db: WarehouseDatabase, catalog: WarehouseCatalog) {
    this.tables = new Map(catalog.tables.map((table) => [table.name, table]));
  }

  async migrate(catalog: WarehouseCatalog): Promise<void> {
    await this.guard('migrate', async () => {
      await this.db.ensureSchemaReady();
      await this.db.withTransaction(async (client) => {
        for (const table of catalog.tables) {
          this.tables.set(table.name, table);
          for (const statement of buildTableStatements(table)) {
            await client.query(statement);
          }
        }
      }, { lockKeys: ['warehouse:migrate'] });
    });
  }

  async ping(): Promise<void> {
    await this.guard('ping', async () => {
      await this.db.withConnection(async (client) => {
        await client.query('SELECT 1');
      });
    });
  }

  async transaction<T>(fn: (tx: WarehouseTransaction) => Promise<T>, options?: TransactionOptions): Promise<T> {
    return this.guard('transaction', () =>
      this.db.withTransaction((client) => fn(new PostgresTransaction(client, (name) => this.resolveTable(name))), {
        lockKeys: options?.lockKeys
      })
    );
  }

  async readSnapshot<T>(fn: (reader: SnapshotReader) => Promise<T>): Promise<T> {
    return this.guard('readSnapshot', () =>
      this.db.withTransaction((client) => fn(this.reader(client)), { isolation: 'repeatable read', readOnly: true })
    );
  }

  async getTableSequence(table: string): Promise<number> {
    return this.read('getTableSequence', (reader) => reader.getTableSequence(table));
  }

  async listChanges(table: string, afterSequence: number): Promise<ChangeLogEntry[]> {
    return this.read('listChanges', (reader) => reader.listChanges(table, afterSequence));
  }

  async scanRows(table: string, range?: DateRange): Promise<WarehouseRow[]> {
    return this.read('scanRows', (reader) => reader.scanRows(table, range));
  }

  async listAggregateRows(aggregateId: string, period?: string): Promise<AggregateRow[]> {
    return this.read('listAggregateRows', (reader) => reader.listAggregateRows(aggregateId, period));
  }

  async getAggregateState(aggregateId: string): Promise<AggregateState | null> {
    return this.read('getAggregateState', (reader) => reader.getAggregateState(aggregateId));
  }

  async getWatermark(sourceId: string, table: string): Promise<LoadWatermarkRecord | null> {
    const rows = await this.select<WatermarkRecordRow>(
      'getWatermark',
      'SELECT * FROM load_watermarks WHERE source_id = $1 AND target_table = $2',
      [sourceId, table]
    );
    return rows[0] ? mapWatermark(rows[0]) : null;
  }

  async listWatermarks(): Promise<LoadWatermarkRecord[]> {
    const rows = await this.select<WatermarkRecordRow>(
      'listWatermarks',
      'SELECT * FROM load_watermarks ORDER BY source_id, target_table'
    );
    return rows.map(mapWatermark);
  }

  async countRows(table: string): Promise<number> {
    this.resolveTable(table);
    const rows = await this.select<{ count: number }>(
      'countRows',
      `SELECT COUNT(*)::bigint AS count FROM ${quoteIdentifier(table)}`
    );
    return rows[0]?.count ?? 0;
  }

  async findExistingKeys(table: string, naturalKeys: string[]): Promise<Set<string>> {
    this.resolveTable(table);
    if (naturalKeys.length === 0) {
      return new Set();
    }
    const rows = await this.select<{ natural_key: string }>(
      'findExistingKeys',
      `SELECT DISTINCT natural_key FROM ${quoteIdentifier(table)} WHERE natural_key = ANY($1::text[])`,
      [naturalKeys]
    );
    return new Set(rows.map((row) => row.natural_key));
  }

  async listPartitions(table?: string): Promise<PartitionRecord[]> {
    const rows = await this.select<PartitionRow>(
      'listPartitions',
      `SELECT * FROM warehouse_partitions WHERE ($1::text IS NULL OR table_name = $1) ORDER BY table_name, range_start`,
      [table ?? null]
    );
    return rows.map(mapPartition);
  }

  async listRejections(query: RejectionQuery): Promise<StoredRejection[]> {
    const rows = await this.select<RejectionRow>(
      'listRejections',
      `SELECT * FROM rejected_records
        WHERE rejected_at >= $1 AND rejected_at < $2
          AND ($3::text IS NULL OR target_table = $3)
          AND ($4::text IS NULL OR source_id = $4)
        ORDER BY rejected_at, id
        LIMIT $5`,
      [query.since, query.until, query.table ?? null, query.sourceId ?? null, query.limit ?? null]
    );
    return rows.map(mapRejection);
  }

  async listAggregateStates(): Promise<AggregateState[]> {
    const rows = await this.select<AggregateStateRow>(
      'listAggregateStates',
      'SELECT * FROM aggregate_state ORDER BY aggregate_id'
    );
    return rows.map(mapAggregateState);
  }

  async recordStageRun(run: StageRunRecord): Promise<void> {
    await this.guard('recordStageRun', () =>
      this.db.withConnection(async (client) => {
        await client.query(
          `INSERT INTO stage_runs
             (id, cycle_id, stage_id, kind, status, attempts, started_at, finished_at, watermark,
              error_code, error_message, safe_to_rerun, details)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13::jsonb)
           ON CONFLICT (id) DO UPDATE
             SET status = EXCLUDED.status,
                 attempts = EXCLUDED.attempts,
                 finished_at = EXCLUDED.finished_at,
                 watermark = EXCLUDED.watermark,
                 error_code = EXCLUDED.error_code,
                 error_message = EXCLUDED.error_message,
                 safe_to_rerun = EXCLUDED.safe_to_rerun,
                 details = EXCLUDED.details`,
          [
            run.id,
            run.cycleId,
            run.stageId,
            run.kind,
            run.status,
            run.attempts,
            run.startedAt,
            run.finishedAt,
            run.watermark,
            run.errorCode,
            run.errorMessage,
            run.safeToRerun,
            JSON.stringify(run.details)
          ]
        );
      })
    );
  }

  async listStageRuns(query: StageRunQuery = {}): Promise<StageRunRecord[]> {
    const rows = await this.select<StageRunRow>(
      'listStageRuns',
      `SELECT * FROM stage_runs
        WHERE ($1::text IS NULL OR cycle_id = $1)
          AND ($2::text IS NULL OR stage_id = $2)
        ORDER BY started_at DESC, stage_id
        LIMIT $3`,
      [query.cycleId ?? null, query.stageId ?? null, query.limit ?? null]
    );
    return rows.map(mapStageRun);
  }

  async close(): Promise<void> {
    await this.db.closePool();
  }

  private resolveTable(name: string): TableDefinition {
    const table = this.tables.get(name);
    if (!table) {
      throw new UnknownTableError(name);
    }
    return table;
  }

  private reader(client: PoolClient): PostgresReader {
    return new PostgresReader(client, (name) => this.resolveTable(name));
  }

  private async read<T>(operation: string, fn: (reader: PostgresReader) => Promise<T>): Promise<T> {
    return this.guard(operation, () => this.db.withConnection((client) => fn(this.reader(client))));
  }

  private async select<R extends QueryResultRow>(operation: string, text: string, values: unknown[] = []): Promise<R[]> {
    return this.guard(operation, () =>
      this.db.withConnection(async (client) => {
        const { rows } = await client.query<R>(text, values);
        return rows;
      })
    );
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw mapStorageError(operation, err);
    }
  }
}
