import './testEnv';

import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import {
  createCycleWorker,
  enqueueCycleJob,
  ensureCycleQueue,
  getQueueHealth,
  isInlineQueue,
  plannedSchedules,
  verifyQueueConnection
} from '../src/scheduler/queue';
import { FIXED_NOW, testConfig } from './fixtures';

describe('cycle queue', () => {
  test('plans one repeatable job per cadence and one for maintenance', () => {
    const config = testConfig();
    const jobs = plannedSchedules(
      { ...config, scheduler: { ...config.scheduler, cadenceCrons: { ...config.scheduler.cadenceCrons, daily: '15 3 * * *' } } },
      FIXED_NOW
    );

    assert.deepEqual(
      jobs.map((job) => [job.name, job.pattern]),
      [
        ['cycle:daily', '15 3 * * *'],
        ['cycle:weekly', '0 3 * * 0'],
        ['cycle:monthly', '0 4 1 * *'],
        ['cycle:quarterly', '0 5 1 1,4,7,10 *'],
        ['maintenance', '30 1 * * *']
      ]
    );
    assert.deepEqual(jobs[1]?.payload, {
      type: 'cycle',
      cadence: 'weekly',
      trigger: 'schedule',
      requestedAt: '2024-02-15T12:00:00.000Z'
    });
    assert.deepEqual(jobs[4]?.payload, { type: 'maintenance', trigger: 'schedule', requestedAt: '2024-02-15T12:00:00.000Z' });
  });

  test('inline mode has no queue', async () => {
    const config = testConfig();
    assert.equal(isInlineQueue(config), true);
    await verifyQueueConnection(config);
    assert.deepEqual(getQueueHealth(config), { inline: true, ready: true, lastError: null });

    assert.throws(() => ensureCycleQueue(config), /ETL queue unavailable in inline mode/);
    assert.throws(
      () => createCycleWorker(config, async () => undefined),
      /ETL worker unavailable in inline mode/
    );
    await assert.rejects(
      enqueueCycleJob(config, { type: 'maintenance', trigger: 'manual', requestedAt: FIXED_NOW.toISOString() }),
      /Cannot enqueue ETL jobs when REDIS_URL=inline/
    );
  });
});
