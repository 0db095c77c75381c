import { createPostgresPool, quoteIdentifier, type PostgresHelpers } from '@bankdw/shared';
import type { ServiceConfig } from '../config/serviceConfig';
import { runMigrations } from './migrations';

export interface WarehouseDatabase extends PostgresHelpers {
  schema: string;
  ensureSchemaReady(): Promise<void>;
}

export function createWarehouseDatabase(
  config: ServiceConfig,
  onIdleError?: (err: Error) => void
): WarehouseDatabase {
  const helpers = createPostgresPool({
    connectionString: config.database.url,
    max: config.database.maxConnections,
    idleTimeoutMillis: config.database.idleTimeoutMs,
    connectionTimeoutMillis: config.database.connectionTimeoutMs,
    schema: config.database.schema,
    onIdleError
  });

  let schemaReadyPromise: Promise<void> | null = null;

  async function prepareSchema(): Promise<void> {
    const rawClient = await helpers.getClient({ setSearchPath: false });
    try {
      await rawClient.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(config.database.schema)}`);
    } finally {
      rawClient.release();
    }
    await helpers.withConnection(async (client) => {
      await runMigrations(client);
    });
  }

  async function ensureSchemaReady(): Promise<void> {
    if (!schemaReadyPromise) {
      schemaReadyPromise = prepareSchema().catch((err: unknown) => {
        schemaReadyPromise = null;
        throw err;
      });
    }
    await schemaReadyPromise;
  }

  return {
    ...helpers,
    schema: config.database.schema,
    ensureSchemaReady
  };
}
