import type { PoolClient } from 'pg';

interface Migration {
  id: string;
  statements: string[];
}

const migrations: Migration[] = [
  {
    id: '001_warehouse_bookkeeping',
    statements: [
      `CREATE TABLE IF NOT EXISTS warehouse_partitions (
         id TEXT PRIMARY KEY,
         table_name TEXT NOT NULL,
         range_start DATE NOT NULL,
         range_end DATE NOT NULL,
         status TEXT NOT NULL DEFAULT 'active',
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         retired_at TIMESTAMPTZ,
         UNIQUE (table_name, range_start),
         CHECK (range_start < range_end),
         CHECK (status IN ('active', 'retired'))
       );`,
      `CREATE INDEX IF NOT EXISTS idx_warehouse_partitions_table
         ON warehouse_partitions(table_name, range_start);`,
      `CREATE TABLE IF NOT EXISTS load_watermarks (
         source_id TEXT NOT NULL,
         target_table TEXT NOT NULL,
         watermark TEXT NOT NULL,
         batch_id TEXT NOT NULL,
         load_seq BIGINT NOT NULL,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (source_id, target_table)
       );`,
      `CREATE TABLE IF NOT EXISTS table_load_sequences (
         table_name TEXT PRIMARY KEY,
         last_seq BIGINT NOT NULL DEFAULT 0
       );`,
      `CREATE TABLE IF NOT EXISTS fact_change_log (
         table_name TEXT NOT NULL,
         load_seq BIGINT NOT NULL,
         batch_id TEXT NOT NULL,
         periods TEXT[] NOT NULL DEFAULT '{}',
         recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (table_name, load_seq)
       );`,
      `CREATE TABLE IF NOT EXISTS rejected_records (
         id TEXT PRIMARY KEY,
         batch_id TEXT NOT NULL,
         source_id TEXT NOT NULL,
         target_table TEXT NOT NULL,
         natural_key TEXT NOT NULL,
         event_date DATE,
         payload JSONB NOT NULL DEFAULT '{}'::jsonb,
         reasons JSONB NOT NULL DEFAULT '[]'::jsonb,
         rejected_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE INDEX IF NOT EXISTS idx_rejected_records_window
         ON rejected_records(rejected_at, target_table);`
    ]
  },
  {
    id: '002_warehouse_aggregates_and_runs',
    statements: [
      `CREATE TABLE IF NOT EXISTS aggregate_rows (
         aggregate_id TEXT NOT NULL,
         period TEXT NOT NULL,
         group_key TEXT NOT NULL,
         "values" JSONB NOT NULL DEFAULT '{}'::jsonb,
         PRIMARY KEY (aggregate_id, period, group_key)
       );`,
      `CREATE TABLE IF NOT EXISTS aggregate_state (
         aggregate_id TEXT PRIMARY KEY,
         refreshed_through JSONB NOT NULL DEFAULT '{}'::jsonb,
         strategy TEXT NOT NULL,
         refreshed_at TIMESTAMPTZ NOT NULL,
         row_count INTEGER NOT NULL DEFAULT 0,
         CHECK (strategy IN ('full', 'incremental'))
       );`,
      `CREATE TABLE IF NOT EXISTS stage_runs (
         id TEXT PRIMARY KEY,
         cycle_id TEXT NOT NULL,
         stage_id TEXT NOT NULL,
         kind TEXT NOT NULL,
         status TEXT NOT NULL,
         attempts INTEGER NOT NULL DEFAULT 0,
         started_at TIMESTAMPTZ NOT NULL,
         finished_at TIMESTAMPTZ,
         watermark TEXT,
         error_code TEXT,
         error_message TEXT,
         safe_to_rerun BOOLEAN NOT NULL DEFAULT TRUE,
         details JSONB NOT NULL DEFAULT '{}'::jsonb
       );`,
      `CREATE INDEX IF NOT EXISTS idx_stage_runs_cycle ON stage_runs(cycle_id);`,
      `CREATE INDEX IF NOT EXISTS idx_stage_runs_started ON stage_runs(started_at DESC);`
    ]
  }
];

export async function runMigrations(client: PoolClient): Promise<void> {
  await ensureSchemaMigrationsTable(client);

  const { rows } = await client.query<{ id: string }>('SELECT id FROM schema_migrations');
  const applied = new Set(rows.map((row) => row.id));

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1) ON CONFLICT DO NOTHING', [migration.id]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}

async function ensureSchemaMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}
