import { quoteIdentifier } from '@bankdw/shared';
import type { TableDefinition } from '../config/catalog';

const ROW_COLUMNS = `
  natural_key TEXT NOT NULL,
  event_date DATE NOT NULL,
  payload JSONB NOT NULL DEFAULT '{}'::jsonb,
  source_id TEXT NOT NULL,
  source_priority INTEGER NOT NULL DEFAULT 0,
  extracted_at TIMESTAMPTZ NOT NULL,
  batch_id TEXT NOT NULL,
  load_seq BIGINT NOT NULL,
  last_updated TIMESTAMPTZ NOT NULL DEFAULT NOW()`;

/**
 * Every warehouse table shares one physical layout: bookkeeping columns plus the typed record in
 * `payload`. Fact tables are range partitioned on event_date; partitions are created on demand.
 */
export function buildTableStatements(table: TableDefinition): string[] {
  const name = quoteIdentifier(table.name);
  if (table.kind === 'fact') {
    return [
      `CREATE TABLE IF NOT EXISTS ${name} (${ROW_COLUMNS},
         PRIMARY KEY (natural_key, event_date)
       ) PARTITION BY RANGE (event_date);`,
      `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${table.name}_natural_key`)} ON ${name}(natural_key);`,
      `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${table.name}_load_seq`)} ON ${name}(load_seq);`
    ];
  }
  return [
    `CREATE TABLE IF NOT EXISTS ${name} (${ROW_COLUMNS},
       PRIMARY KEY (natural_key)
     );`
  ];
}

export function buildCreatePartitionStatement(table: string, partitionId: string, start: string, end: string): string {
  return (
    `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(partitionId)} PARTITION OF ${quoteIdentifier(table)} ` +
    `FOR VALUES FROM ('${start}') TO ('${end}')`
  );
}

export function buildRetirePartitionStatement(table: string, partitionId: string, mode: 'detach' | 'drop'): string {
  if (mode === 'drop') {
    return `DROP TABLE IF EXISTS ${quoteIdentifier(partitionId)}`;
  }
  return `ALTER TABLE ${quoteIdentifier(table)} DETACH PARTITION ${quoteIdentifier(partitionId)}`;
}
