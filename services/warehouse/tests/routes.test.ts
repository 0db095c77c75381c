import './testEnv';

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, test } from 'node:test';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app';
import type { StoredRejection } from '../src/model/types';
import { buildBatch, buildTestRuntime, seedBranches, transactionRecord, type TestRuntime } from './fixtures';

function rejection(index: number, targetTable: string): StoredRejection {
  return {
    id: `batch-test-0001#00000${index}`,
    batchId: 'batch-test-0001',
    sourceId: 'core_transactions',
    targetTable,
    naturalKey: `T${index}`,
    eventDate: '2024-01-10',
    payload: { transaction_id: `T${index}`, amount: 'abc' },
    reasons: [{ code: 'InvalidType', check: 'validity', field: 'amount', message: "amount 'abc' is not a decimal" }],
    rejectedAt: `2024-02-15T0${index}:30:00.000Z`
  };
}

describe('HTTP routes', () => {
  let fixture: TestRuntime;
  let app: FastifyInstance;

  beforeEach(async () => {
    fixture = await buildTestRuntime();
    app = await buildApp(fixture.runtime, { logger: false });
  });

  afterEach(async () => {
    await app.close();
    await fixture.runtime.close();
  });

  test('reports health and readiness', async () => {
    const health = await app.inject({ method: 'GET', url: '/health' });
    assert.equal(health.statusCode, 200);
    assert.deepEqual(health.json(), {
      status: 'ok',
      storage: 'inline',
      queue: { inline: true, ready: true, lastError: null }
    });

    const ready = await app.inject({ method: 'GET', url: '/ready' });
    assert.deepEqual(ready.json(), { status: 'ready', storage: 'inline' });
  });

  test('is not ready once storage is gone', async () => {
    await fixture.store.close();
    const ready = await app.inject({ method: 'GET', url: '/ready' });
    assert.equal(ready.statusCode, 503);
    assert.deepEqual(ready.json(), {
      status: 'unavailable',
      reason: 'warehouse storage is unavailable: inline store is closed'
    });
  });

  test('lists watermarks and partition coverage after a load', async () => {
    await seedBranches(fixture.store);
    const records = [transactionRecord(1), transactionRecord(2)];
    await fixture.runtime.loader.load(buildBatch(records), records, 'transaction_fact');

    const watermarks = await app.inject({ method: 'GET', url: '/status/watermarks' });
    const body: { watermarks: Array<{ sourceId: string; targetTable: string; watermark: string }> } = watermarks.json();
    assert.deepEqual(
      body.watermarks.map((record) => [record.sourceId, record.targetTable, record.watermark]),
      [['core_transactions', 'transaction_fact', '2']]
    );

    const coverage = await app.inject({ method: 'GET', url: '/status/partitions/transaction_fact' });
    assert.equal(coverage.statusCode, 200);
    const partitions: { granularity: string; ranges: unknown[]; gaps: unknown[]; active: number } = coverage.json();
    assert.equal(partitions.granularity, 'month');
    assert.deepEqual(partitions.ranges, [{ start: '2024-01-01', end: '2024-02-01' }]);
    assert.deepEqual(partitions.gaps, []);
    assert.equal(partitions.active, 1);
  });

  test('answers 404 for tables without partitions', async () => {
    const response = await app.inject({ method: 'GET', url: '/status/partitions/branch' });
    assert.equal(response.statusCode, 404);
    assert.deepEqual(response.json(), { error: "unknown warehouse table 'branch'", code: 'UnknownTable' });
  });

  test('shows aggregate freshness and staged batches', async () => {
    fixture.runtime.staging.stage(buildBatch([transactionRecord(1)]));

    const aggregates = await app.inject({ method: 'GET', url: '/status/aggregates' });
    const aggregateBody: { aggregates: Array<{ aggregateId: string; stale: boolean; state: unknown }> } =
      aggregates.json();
    assert.deepEqual(
      aggregateBody.aggregates.map((status) => [status.aggregateId, status.stale, status.state]),
      [['monthly_branch_performance', true, null]]
    );

    const staging = await app.inject({ method: 'GET', url: '/status/staging' });
    const stagingBody: { staged: Array<{ batchId: string; stagingKey: string }>; discarded: unknown[] } = staging.json();
    assert.deepEqual(
      stagingBody.staged.map((entry) => [entry.batchId, entry.stagingKey]),
      [['batch-test-0001', 'core_transactions:daily']]
    );
    assert.deepEqual(stagingBody.discarded, []);
  });

  test('lists stage runs of a cycle', async () => {
    const result = await fixture.runtime.orchestrator.runCycle({ pipelineIds: ['customers'] });

    const response = await app.inject({ method: 'GET', url: `/status/stages?cycleId=${result.cycleId}` });
    const body: { runs: Array<{ stageId: string; status: string }> } = response.json();
    assert.deepEqual(
      body.runs.map((run) => [run.stageId, run.status]),
      [['etl:customers', 'succeeded']]
    );
  });

  test('returns rejections inside a window', async () => {
    await fixture.runtime.loader.recordRejections([rejection(1, 'transaction_fact'), rejection(2, 'transaction_fact')]);

    const response = await app.inject({
      method: 'GET',
      url: '/rejects?since=2024-02-15&until=2024-02-15T02:00:00Z'
    });
    assert.equal(response.statusCode, 200);
    const body: { since: string; until: string; count: number; rejections: Array<{ id: string }> } = response.json();
    assert.equal(body.since, '2024-02-15T00:00:00.000Z');
    assert.equal(body.until, '2024-02-15T02:00:00.000Z');
    assert.equal(body.count, 1);
    assert.deepEqual(
      body.rejections.map((entry) => entry.id),
      ['batch-test-0001#000001']
    );

    const filtered = await app.inject({
      method: 'GET',
      url: '/rejects?since=2024-02-15&until=2024-02-16&table=customer'
    });
    assert.equal(filtered.json().count, 0);
  });

  test('validates the rejection window', async () => {
    const missing = await app.inject({ method: 'GET', url: '/rejects?since=2024-02-15' });
    assert.equal(missing.statusCode, 400);
    assert.equal(missing.json().error, 'invalid request');

    const inverted = await app.inject({ method: 'GET', url: '/rejects?since=2024-02-16&until=2024-02-15' });
    assert.equal(inverted.statusCode, 400);
    assert.deepEqual(inverted.json(), { error: 'since must be earlier than until' });

    const badLimit = await app.inject({ method: 'GET', url: '/rejects?since=2024-02-15&until=2024-02-16&limit=0' });
    assert.equal(badLimit.statusCode, 400);
  });

  test('serves a disabled metrics endpoint', async () => {
    const response = await app.inject({ method: 'GET', url: '/metrics' });
    assert.equal(response.statusCode, 503);
    assert.equal(response.body, 'metrics disabled');
  });
});
