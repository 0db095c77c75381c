import './testEnv';

import assert from 'node:assert/strict';
import path from 'node:path';
import { afterEach, beforeEach, test } from 'node:test';
import { loadServiceConfig, resetCachedServiceConfig } from '../src/config/serviceConfig';

const TOUCHED_KEYS = [
  'WAREHOUSE_PORT',
  'PORT',
  'WAREHOUSE_REJECTION_THRESHOLD',
  'WAREHOUSE_RULES_REFERENTIAL',
  'WAREHOUSE_CRON_WEEKLY',
  'WAREHOUSE_CRON_MAINTENANCE',
  'WAREHOUSE_PIPELINES_PATH',
  'WAREHOUSE_AGGREGATE_STRATEGY',
  'WAREHOUSE_QUALITY_REPORT_DIR',
  'WAREHOUSE_STAGE_MAX_ATTEMPTS'
];

let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = {};
  for (const key of TOUCHED_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
  resetCachedServiceConfig();
});

afterEach(() => {
  for (const key of TOUCHED_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  resetCachedServiceConfig();
});

test('loadServiceConfig falls back to documented defaults', () => {
  const config = loadServiceConfig();

  assert.equal(config.port, 4300);
  assert.equal(config.validation.rejectionThreshold, 0.1);
  assert.deepEqual(config.validation.rules, {
    completeness: true,
    validity: true,
    referential: true,
    business: true
  });
  assert.equal(config.scheduler.maxAttempts, 3);
  assert.equal(config.scheduler.cadenceCrons.daily, '0 2 * * *');
  assert.equal(config.scheduler.maintenanceCron, '30 1 * * *');
  assert.equal(config.aggregates.defaultStrategy, 'incremental');
  assert.equal(config.reports.qualityReportDirectory, null);
  assert.equal(path.basename(config.catalogPath), 'pipelines.json');
});

test('loadServiceConfig reads overrides from the environment', () => {
  process.env.WAREHOUSE_PORT = '5100';
  process.env.WAREHOUSE_REJECTION_THRESHOLD = '0.25';
  process.env.WAREHOUSE_RULES_REFERENTIAL = 'false';
  process.env.WAREHOUSE_CRON_WEEKLY = '15 3 * * 1';
  process.env.WAREHOUSE_CRON_MAINTENANCE = '0 0 * * *';
  process.env.WAREHOUSE_PIPELINES_PATH = 'custom/pipelines.json';
  process.env.WAREHOUSE_AGGREGATE_STRATEGY = 'full';
  process.env.WAREHOUSE_QUALITY_REPORT_DIR = '/tmp/reports';

  const config = loadServiceConfig();

  assert.equal(config.port, 5100);
  assert.equal(config.validation.rejectionThreshold, 0.25);
  assert.equal(config.validation.rules.referential, false);
  assert.equal(config.validation.rules.business, true);
  assert.equal(config.scheduler.cadenceCrons.weekly, '15 3 * * 1');
  assert.equal(config.scheduler.cadenceCrons.monthly, '0 4 1 * *');
  assert.equal(config.scheduler.maintenanceCron, '0 0 * * *');
  assert.equal(config.catalogPath, path.resolve('custom/pipelines.json'));
  assert.equal(config.aggregates.defaultStrategy, 'full');
  assert.equal(config.reports.qualityReportDirectory, '/tmp/reports');
});

test('loadServiceConfig ignores thresholds outside [0, 1] and non-positive attempt limits', () => {
  process.env.WAREHOUSE_REJECTION_THRESHOLD = '1.5';
  process.env.WAREHOUSE_STAGE_MAX_ATTEMPTS = '0';

  const config = loadServiceConfig();

  assert.equal(config.validation.rejectionThreshold, 0.1);
  assert.equal(config.scheduler.maxAttempts, 3);
});

test('loadServiceConfig caches until reset', () => {
  const first = loadServiceConfig();
  process.env.WAREHOUSE_PORT = '6200';
  assert.equal(loadServiceConfig(), first);

  resetCachedServiceConfig();
  assert.equal(loadServiceConfig().port, 6200);
});
