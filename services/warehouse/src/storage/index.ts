import type { WarehouseCatalog } from '../config/catalog';
import type { ServiceConfig } from '../config/serviceConfig';
import { createWarehouseDatabase } from '../db/client';
import type { Logger } from '../observability/logger';
import { MemoryWarehouseStore } from './memoryStore';
import { PostgresWarehouseStore } from './postgresStore';
import type { WarehouseStore } from './types';

export * from './types';
export { MemoryWarehouseStore, MemoryTransaction } from './memoryStore';
export { PostgresWarehouseStore, isConnectionError } from './postgresStore';

export function createWarehouseStore(config: ServiceConfig, catalog: WarehouseCatalog, logger: Logger): WarehouseStore {
  if (config.storage.driver === 'inline') {
    logger.info('using inline warehouse storage');
    return new MemoryWarehouseStore();
  }
  const database = createWarehouseDatabase(config, (err) => {
    logger.error({ err }, 'unexpected error on idle postgres client');
  });
  return new PostgresWarehouseStore(database, catalog);
}
