import type { WarehouseCatalog } from '../config/catalog';
import type { PartitionRecord } from '../model/types';
import type { Logger } from '../observability/logger';
import type { PartitionManager, RetireResult } from '../partitions/partitionManager';

export interface TableMaintenanceResult {
  table: string;
  created: PartitionRecord[];
  retention: RetireResult | null;
}

export function partitionedTables(catalog: WarehouseCatalog): string[] {
  return catalog.tables
    .filter((table) => table.kind === 'fact' && table.partitioning !== undefined)
    .map((table) => table.name);
}

/** Pre-creates upcoming partitions and applies the retention policy for one table. */
export async function maintainTable(
  partitions: PartitionManager,
  table: string,
  logger: Logger
): Promise<TableMaintenanceResult> {
  const created = await partitions.precreate(table);
  const retention = await partitions.applyRetention(table);
  logger.info(
    {
      table,
      created: created.length,
      retired: retention?.retired.length ?? 0,
      blockedBy: retention?.blockedBy?.id ?? null
    },
    'partition maintenance complete'
  );
  return { table, created, retention };
}
