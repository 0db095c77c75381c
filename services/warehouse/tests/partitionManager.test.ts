import './testEnv';

import assert from 'node:assert/strict';
import { beforeEach, describe, test } from 'node:test';
import { parseCatalog } from '../src/config/catalog';
import { TableLocks } from '../src/concurrency/tableLocks';
import { NoPartitionForDateError, UnknownTableError } from '../src/errors';
import type { WarehouseRow } from '../src/model/types';
import { createSilentLogger } from '../src/observability/logger';
import { PartitionManager, type PendingDatesProvider } from '../src/partitions/partitionManager';
import { MemoryWarehouseStore } from '../src/storage/memoryStore';
import { buildCatalog, fixedClock } from './fixtures';

function factRow(naturalKey: string, eventDate: string): WarehouseRow {
  return {
    naturalKey,
    eventDate,
    partitionId: null,
    payload: { transaction_id: naturalKey },
    sourceId: 'core_transactions',
    sourcePriority: 50,
    extractedAt: '2024-02-15T06:00:00.000Z',
    batchId: 'batch-seed',
    loadSequence: 1,
    lastUpdated: '2024-02-15T06:00:00.000Z'
  };
}

function isNoPartition(reason: 'archived' | 'missing') {
  return (error: unknown) => error instanceof NoPartitionForDateError && error.reason === reason;
}

describe('PartitionManager', () => {
  let store: MemoryWarehouseStore;
  let pendingDates: string[];
  let manager: PartitionManager;

  beforeEach(() => {
    store = new MemoryWarehouseStore();
    pendingDates = [];
    const pending: PendingDatesProvider = { pendingEventDates: () => pendingDates };
    manager = new PartitionManager({
      store,
      catalog: buildCatalog(),
      locks: new TableLocks(store),
      logger: createSilentLogger(),
      pending,
      now: fixedClock
    });
  });

  test('creates the covering month and back-fills an earlier month', async () => {
    const march = await manager.ensurePartition('transaction_fact', '2023-03-15');
    assert.equal(march.id, 'transaction_fact_y2023m03');
    assert.equal(march.rangeStart, '2023-03-01');
    assert.equal(march.rangeEnd, '2023-04-01');

    const february = await manager.ensurePartition('transaction_fact', '2023-02-10');
    assert.equal(february.rangeStart, '2023-02-01');
    assert.equal(february.rangeEnd, '2023-03-01');

    const partitions = await store.listPartitions('transaction_fact');
    assert.deepEqual(
      partitions.map((partition) => partition.id),
      ['transaction_fact_y2023m02', 'transaction_fact_y2023m03']
    );
  });

  test('is idempotent for dates inside an existing partition', async () => {
    const first = await manager.ensurePartition('transaction_fact', '2023-03-01');
    const second = await manager.ensurePartition('transaction_fact', '2023-03-31');
    assert.equal(second.id, first.id);
    assert.equal((await store.listPartitions('transaction_fact')).length, 1);
  });

  test('fills gaps so coverage stays contiguous', async () => {
    await manager.ensurePartition('transaction_fact', '2023-03-15');
    await manager.ensurePartition('transaction_fact', '2023-06-20');

    const coverage = await manager.coverage('transaction_fact');
    assert.equal(coverage.active, 4);
    assert.deepEqual(coverage.ranges, [{ start: '2023-03-01', end: '2023-07-01' }]);
    assert.deepEqual(coverage.gaps, []);
    assert.equal(coverage.earliest, '2023-03-01');
    assert.equal(coverage.latest, '2023-07-01');
  });

  test('precreates the current period and the configured number ahead', async () => {
    const created = await manager.precreate('transaction_fact');
    assert.deepEqual(
      created.map((partition) => partition.id),
      ['transaction_fact_y2024m02', 'transaction_fact_y2024m03', 'transaction_fact_y2024m04']
    );
    assert.deepEqual(await manager.precreate('transaction_fact'), []);
  });

  test('retires whole partitions before the cutoff and refuses archived dates afterwards', async () => {
    await manager.ensurePartition('transaction_fact', '2023-03-15');
    await manager.ensurePartition('transaction_fact', '2023-06-20');

    const result = await manager.retire('transaction_fact', '2023-05-01');
    assert.deepEqual(
      result.retired.map((partition) => partition.id),
      ['transaction_fact_y2023m03', 'transaction_fact_y2023m04']
    );
    assert.equal(result.blockedBy, null);

    await assert.rejects(manager.route('transaction_fact', '2023-03-20'), isNoPartition('archived'));
    await assert.rejects(manager.ensurePartition('transaction_fact', '2023-01-05'), isNoPartition('archived'));
    assert.equal((await manager.route('transaction_fact', '2023-05-02')).id, 'transaction_fact_y2023m05');

    const coverage = await manager.coverage('transaction_fact');
    assert.equal(coverage.active, 2);
    assert.equal(coverage.retired, 2);
  });

  test('resumes contiguous coverage from the retired boundary once every partition is retired', async () => {
    await manager.ensurePartition('transaction_fact', '2023-03-15');
    await manager.retire('transaction_fact', '2023-04-01');

    const june = await manager.ensurePartition('transaction_fact', '2023-06-20');
    assert.equal(june.id, 'transaction_fact_y2023m06');

    const coverage = await manager.coverage('transaction_fact');
    assert.deepEqual(coverage.ranges, [{ start: '2023-04-01', end: '2023-07-01' }]);
    assert.deepEqual(coverage.gaps, []);
    assert.equal(coverage.active, 3);
  });

  test('resolves a batch of dates and reports the ones that cannot be routed', async () => {
    await manager.ensurePartition('transaction_fact', '2023-11-05');
    await manager.ensurePartition('transaction_fact', '2024-02-05');
    await manager.retire('transaction_fact', '2023-12-01');

    const resolution = await manager.resolvePartitions('transaction_fact', [
      '2024-02-01',
      '2023-11-20',
      '2024-02-02',
      '2024-03-09'
    ]);

    assert.deepEqual(
      [...resolution.routed].map(([date, partition]) => [date, partition.id]),
      [
        ['2024-02-01', 'transaction_fact_y2024m02'],
        ['2024-02-02', 'transaction_fact_y2024m02'],
        ['2024-03-09', 'transaction_fact_y2024m03']
      ]
    );
    assert.deepEqual([...resolution.unroutable.keys()], ['2023-11-20']);
    assert.equal(resolution.unroutable.get('2023-11-20')?.reason, 'archived');
  });

  test('stops retirement at a partition that still has staged records', async () => {
    await manager.ensurePartition('transaction_fact', '2023-03-15');
    await manager.ensurePartition('transaction_fact', '2023-04-15');
    pendingDates = ['2023-03-10'];

    const result = await manager.retire('transaction_fact', '2023-05-01');
    assert.deepEqual(result.retired, []);
    assert.equal(result.blockedBy?.id, 'transaction_fact_y2023m03');
    assert.equal((await store.listPartitions('transaction_fact')).every((partition) => partition.status === 'active'), true);
  });

  test('detaching keeps retired rows archived while dropping discards them', async () => {
    await manager.ensurePartition('transaction_fact', '2023-03-15');
    await manager.ensurePartition('transaction_fact', '2023-04-15');
    await store.transaction(async (tx) => {
      await tx.putRow('transaction_fact', factRow('T1', '2023-03-20'));
      await tx.putRow('transaction_fact', factRow('T2', '2023-04-02'));
    });

    await manager.retire('transaction_fact', '2023-04-01', 'detach');
    assert.deepEqual(
      store.archivedRows('transaction_fact_y2023m03').map((row) => row.naturalKey),
      ['T1']
    );

    await manager.retire('transaction_fact', '2023-05-01', 'drop');
    assert.deepEqual(store.archivedRows('transaction_fact_y2023m04'), []);
    assert.equal(await store.countRows('transaction_fact'), 0);
  });

  test('rejects dimension tables', async () => {
    await assert.rejects(manager.ensurePartition('branch', '2023-03-15'), UnknownTableError);
  });

  test('reports missing partitions when auto-creation is disabled', async () => {
    const catalog = parseCatalog({
      sources: [],
      pipelines: [],
      tables: [
        {
          name: 'loan_fact',
          kind: 'fact',
          fields: [{ name: 'loan_id', type: 'string' }],
          partitioning: { granularity: 'year', autoCreate: false }
        }
      ]
    });
    const strict = new PartitionManager({
      store,
      catalog,
      locks: new TableLocks(store),
      logger: createSilentLogger(),
      now: fixedClock
    });

    await assert.rejects(strict.ensurePartition('loan_fact', '2023-03-15'), isNoPartition('missing'));
    const created = await strict.precreate('loan_fact', 0);
    assert.deepEqual(
      created.map((partition) => [partition.id, partition.rangeStart, partition.rangeEnd]),
      [['loan_fact_y2024', '2024-01-01', '2025-01-01']]
    );
    assert.equal((await strict.ensurePartition('loan_fact', '2024-07-04')).id, 'loan_fact_y2024');
  });
});
