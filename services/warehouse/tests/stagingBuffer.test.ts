import './testEnv';

import assert from 'node:assert/strict';
import { beforeEach, describe, test } from 'node:test';
import { StagingConflictError, StagingQueueFullError } from '../src/errors';
import { StagingBuffer } from '../src/staging/stagingBuffer';
import { buildBatch, fixedClock, transactionRecord } from './fixtures';

describe('StagingBuffer', () => {
  let staging: StagingBuffer;

  beforeEach(() => {
    staging = new StagingBuffer({ maxPendingPerSource: 3, discardHistory: 2, now: fixedClock });
  });

  test('orders queued batches by watermark and ignores a repeated id', () => {
    const later = buildBatch([transactionRecord(4), transactionRecord(5)], { id: 'b-later' });
    const earlier = buildBatch([transactionRecord(1), transactionRecord(2)], { id: 'b-earlier' });

    assert.equal(staging.stage(later), true);
    assert.equal(staging.stage(earlier), true);
    assert.equal(staging.stage(earlier), false);

    assert.equal(staging.peek('core_transactions')?.id, 'b-earlier');
    assert.equal(staging.peek('core_transactions', 'daily')?.id, 'b-earlier');
    assert.equal(staging.peek('core_transactions', 'weekly'), null);
    assert.deepEqual(
      staging.snapshot().map((entry) => [entry.batchId, entry.stagingKey, entry.watermarkTo, entry.claimed]),
      [
        ['b-earlier', 'core_transactions:daily', '2', false],
        ['b-later', 'core_transactions:daily', '5', false]
      ]
    );
  });

  test('staged batches are immutable', () => {
    staging.stage(buildBatch([transactionRecord(1)]));
    const batch = staging.peek('core_transactions');
    assert.ok(batch);
    assert.equal(Object.isFrozen(batch), true);
    assert.equal(Object.isFrozen(batch.records), true);
    assert.equal(Object.isFrozen(batch.records[0]), true);
  });

  test('allows one claimed batch per source and cadence, taken from the head', () => {
    staging.stage(buildBatch([transactionRecord(1)], { id: 'b1' }));
    staging.stage(buildBatch([transactionRecord(2)], { id: 'b2' }));

    assert.throws(() => staging.claim('b2'), /not next in watermark order for core_transactions:daily/);
    assert.equal(staging.claim('b1').id, 'b1');
    assert.throws(() => staging.claim('b1'), StagingConflictError);

    staging.release('b1');
    assert.equal(staging.claim('b1').id, 'b1');
    staging.commit('b1');
    assert.equal(staging.claim('b2').id, 'b2');
    assert.throws(() => staging.claim('missing'), /batch 'missing' is not staged/);
  });

  test('queues per cadence do not block each other', () => {
    staging.stage(buildBatch([transactionRecord(1)], { id: 'daily-1' }));
    staging.stage(buildBatch([transactionRecord(1)], { id: 'weekly-1', cadence: 'weekly' }));
    staging.claim('daily-1');
    assert.equal(staging.claim('weekly-1').id, 'weekly-1');
  });

  test('rejects staging beyond the per-source limit', () => {
    for (const seq of [1, 2, 3]) {
      staging.stage(buildBatch([transactionRecord(seq)], { id: `b${seq}` }));
    }
    assert.throws(() => staging.stage(buildBatch([transactionRecord(4)], { id: 'b4' })), StagingQueueFullError);
  });

  test('keeps a bounded history of discarded batches', () => {
    for (const seq of [1, 2, 3]) {
      staging.stage(buildBatch([transactionRecord(seq)], { id: `b${seq}` }));
    }
    const first = staging.discard('b1', 'rejection rate 0.5 exceeds threshold 0.05');
    assert.deepEqual(first, {
      batchId: 'b1',
      sourceId: 'core_transactions',
      cadence: 'daily',
      targetTable: 'transaction_fact',
      recordCount: 1,
      reason: 'rejection rate 0.5 exceeds threshold 0.05',
      discardedAt: '2024-02-15T12:00:00.000Z'
    });
    staging.discard('b2', 'second');
    staging.discard('b3', 'third');

    assert.deepEqual(
      staging.discarded().map((entry) => entry.batchId),
      ['b2', 'b3']
    );
    assert.deepEqual(staging.snapshot(), []);
  });

  test('reports the event dates still waiting for a table', () => {
    staging.stage(
      buildBatch([transactionRecord(1, { transaction_date: '2024-03-02' }), transactionRecord(2)], { id: 'b1' })
    );
    staging.stage(buildBatch([transactionRecord(1)], { id: 'c1', targetTable: 'customer', sourceId: 'crm_customers' }));

    assert.deepEqual(staging.pendingEventDates('transaction_fact'), ['2024-01-10', '2024-03-02']);
    staging.commit('b1');
    assert.deepEqual(staging.pendingEventDates('transaction_fact'), []);
  });
});
