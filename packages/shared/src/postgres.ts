import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let parsersConfigured = false;

function configureGlobalParsers(): void {
  if (parsersConfigured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  // DATE columns stay as YYYY-MM-DD strings; the warehouse never wants a local-time Date here.
  pg.types.setTypeParser(pg.types.builtins.DATE, (value: string) => value);
  // NUMERIC keeps its exact decimal text; amounts beyond 2^53 cents do not survive a double.
  pg.types.setTypeParser(pg.types.builtins.NUMERIC, (value: string) => value);
  parsersConfigured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface PostgresAcquireOptions {
  setSearchPath?: boolean;
}

export interface PostgresTransactionOptions extends PostgresAcquireOptions {
  /**
   * Keys serialised with `pg_advisory_xact_lock` for the lifetime of the transaction.
   * Locks are taken in sorted order so two transactions naming the same keys cannot deadlock.
   */
  lockKeys?: string[];
  /** Defaults to the server's READ COMMITTED. */
  isolation?: 'read committed' | 'repeatable read' | 'serializable';
  readOnly?: boolean;
}

export function beginStatement(options: PostgresTransactionOptions | undefined): string {
  const modes: string[] = [];
  if (options?.isolation) {
    modes.push(`ISOLATION LEVEL ${options.isolation.toUpperCase()}`);
  }
  if (options?.readOnly) {
    modes.push('READ ONLY');
  }
  return modes.length > 0 ? `BEGIN ${modes.join(' ')}` : 'BEGIN';
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
  onIdleError?: (err: Error) => void;
}

export interface PostgresHelpers {
  getClient(options?: PostgresAcquireOptions): Promise<PoolClient>;
  withConnection<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresTransactionOptions): Promise<T>;
  closePool(): Promise<void>;
  getPool(): Pool;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, onIdleError, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    if (onIdleError) {
      onIdleError(err);
      return;
    }
    console.error('[postgres] unexpected error on idle client', err);
  });

  async function prepareClient(client: PoolClient, setSearchPath: boolean | undefined): Promise<void> {
    if (schema && setSearchPath !== false) {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    }
  }

  async function getClient(acquire?: PostgresAcquireOptions): Promise<PoolClient> {
    const client = await pool.connect();
    try {
      await prepareClient(client, acquire?.setSearchPath);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>, acquire?: PostgresAcquireOptions): Promise<T> {
    const client = await getClient(acquire);
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(
    fn: (client: PoolClient) => Promise<T>,
    transaction?: PostgresTransactionOptions
  ): Promise<T> {
    return withConnection(async (client) => {
      await client.query(beginStatement(transaction));
      try {
        const lockKeys = [...new Set(transaction?.lockKeys ?? [])].sort();
        for (const key of lockKeys) {
          await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
        }
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          console.error('[postgres] failed to rollback transaction', rollbackErr);
        }
        throw err;
      }
    }, transaction);
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  function getPool(): Pool {
    return pool;
  }

  return {
    getClient,
    withConnection,
    withTransaction,
    closePool,
    getPool
  };
}
