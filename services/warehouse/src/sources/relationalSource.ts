import { createPostgresPool, type PostgresHelpers } from '@bankdw/shared';
import type { RelationalSourceDefinition } from '../config/catalog';
import { SourceSchemaMismatchError, SourceUnavailableError } from '../errors';
import type { SourceRecord } from '../model/types';
import { compareWatermarks, sortByWatermark } from '../model/watermarks';
import { isConnectionError } from '../storage/postgresStore';
import { normalizeRow, type RawRow } from './normalize';
import type { ExtractRequest, SourceAdapter } from './types';

export type RelationalQuery = (text: string, values: unknown[]) => Promise<RawRow[]>;

export interface RelationalSourceOptions {
  /** Replaces the pooled connection, e.g. with an in-process stand-in. */
  query?: RelationalQuery;
}

/**
 * Pulls rows from an operational Postgres database. The configured query receives the last applied
 * watermark as $1 (NULL on first run) and a row limit as $2, and must order by the watermark column.
 */
export class RelationalSource implements SourceAdapter {
  readonly kind = 'relational' as const;
  private pool: PostgresHelpers | null = null;

  constructor(
    private readonly definition: RelationalSourceDefinition,
    private readonly options: RelationalSourceOptions = {}
  ) {}

  get id(): string {
    return this.definition.id;
  }

  async extract(request: ExtractRequest): Promise<SourceRecord[]> {
    const rows = await this.runQuery([request.since, request.limit]);
    const records = rows.map((row) =>
      normalizeRow(row, { sourceId: this.id, mapping: this.definition.mapping, extractedAt: request.extractedAt })
    );
    const since = request.since;
    const fresh = since === null ? records : records.filter((record) => compareWatermarks(record.sourceWatermark, since) > 0);
    return sortByWatermark(fresh).slice(0, request.limit);
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.closePool();
    }
  }

  private async runQuery(values: unknown[]): Promise<RawRow[]> {
    const query = this.options.query ?? this.pooledQuery();
    try {
      return await query(this.definition.query, values);
    } catch (err) {
      if (isConnectionError(err)) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new SourceUnavailableError(this.id, detail, { cause: err });
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new SourceSchemaMismatchError(this.id, `query failed: ${detail}`);
    }
  }

  private pooledQuery(): RelationalQuery {
    if (!this.pool) {
      this.pool = createPostgresPool({
        connectionString: this.definition.connectionString,
        max: 2,
        connectionTimeoutMillis: this.definition.timeoutMs,
        statement_timeout: this.definition.timeoutMs
      });
    }
    const pool = this.pool;
    return (text, values) =>
      pool.withConnection(async (client) => {
        const result = await client.query<RawRow>(text, values);
        return result.rows;
      });
  }
}
