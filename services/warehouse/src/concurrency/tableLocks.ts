import { tableLockKey, type WarehouseStore, type WarehouseTransaction } from '../storage/types';
import { KeyedMutex } from './keyedMutex';

/**
 * Exclusive write sections per warehouse table: an in-process mutex for this worker plus
 * transaction-scoped advisory locks for other processes sharing the database.
 */
export class TableLocks {
  constructor(
    private readonly store: WarehouseStore,
    private readonly mutex: KeyedMutex = new KeyedMutex()
  ) {}

  async withTables<T>(tables: string[], fn: (tx: WarehouseTransaction) => Promise<T>): Promise<T> {
    const keys = [...new Set(tables)].map(tableLockKey);
    return this.mutex.runExclusiveMany(keys, () => this.store.transaction(fn, { lockKeys: keys }));
  }

  async withTable<T>(table: string, fn: (tx: WarehouseTransaction) => Promise<T>): Promise<T> {
    return this.withTables([table], fn);
  }

  isLocked(table: string): boolean {
    return this.mutex.isLocked(tableLockKey(table));
  }
}
