import './testEnv';

import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  compareWatermarks,
  deriveBatchId,
  isAtOrBefore,
  padCursor,
  sortByWatermark,
  trimToWatermarkBoundary
} from '../src/model/watermarks';
import type { SourceRecord } from '../src/model/types';

function record(key: string, watermark: string): SourceRecord {
  return { naturalKey: key, eventDate: '2024-01-10', payload: {}, sourceWatermark: watermark };
}

test('compareWatermarks orders integer offsets numerically and other values as text', () => {
  assert.equal(compareWatermarks('9', '10'), -1);
  assert.equal(compareWatermarks('120', '120'), 0);
  assert.equal(compareWatermarks('2024-01-02T00:00:00.000Z', '2024-01-10T00:00:00.000Z'), -1);
  assert.equal(compareWatermarks('b.csv#000000002', 'a.csv#000000009'), 1);
});

test('isAtOrBefore treats a missing current watermark as nothing applied', () => {
  assert.equal(isAtOrBefore('5', null), false);
  assert.equal(isAtOrBefore('5', '5'), true);
  assert.equal(isAtOrBefore('4', '5'), true);
  assert.equal(isAtOrBefore('6', '5'), false);
});

test('sortByWatermark breaks ties by natural key', () => {
  const sorted = sortByWatermark([record('c', '2'), record('b', '1'), record('a', '2')]);
  assert.deepEqual(
    sorted.map((entry) => entry.naturalKey),
    ['b', 'a', 'c']
  );
});

test('trimToWatermarkBoundary defers records sharing the boundary watermark', () => {
  const records = [record('a', '1'), record('b', '2'), record('c', '3'), record('d', '3'), record('e', '4')];
  const trimmed = trimToWatermarkBoundary(records, 3);
  assert.deepEqual(
    trimmed.map((entry) => entry.naturalKey),
    ['a', 'b']
  );
});

test('trimToWatermarkBoundary keeps a batch made of a single watermark whole', () => {
  const records = [record('a', '7'), record('b', '7'), record('c', '7'), record('d', '8')];
  const trimmed = trimToWatermarkBoundary(records, 2);
  assert.deepEqual(
    trimmed.map((entry) => entry.naturalKey),
    ['a', 'b', 'c']
  );
});

test('deriveBatchId is stable for the same extraction window', () => {
  const parts = {
    sourceId: 'core_transactions',
    cadence: 'daily' as const,
    targetTable: 'transaction_fact',
    from: '10',
    to: '20'
  };
  const id = deriveBatchId(parts);
  assert.match(id, /^batch-[0-9a-f]{20}$/);
  assert.equal(deriveBatchId({ ...parts }), id);
  assert.notEqual(deriveBatchId({ ...parts, from: null }), id);
});

test('padCursor pads to nine digits by default', () => {
  assert.equal(padCursor(42), '000000042');
  assert.equal(padCursor(3, 6), '000003');
});
