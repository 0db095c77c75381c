import { test } from 'node:test';
import assert from 'node:assert/strict';
import { firstDefined, parseBoolean, parseList, parseNumber } from '../src/env';

test('parseNumber falls back on missing or invalid input', () => {
  assert.equal(parseNumber(undefined, 5), 5);
  assert.equal(parseNumber('abc', 5), 5);
  assert.equal(parseNumber('12', 5), 12);
});

test('parseBoolean understands common spellings', () => {
  assert.equal(parseBoolean('YES', false), true);
  assert.equal(parseBoolean(' off ', true), false);
  assert.equal(parseBoolean('maybe', true), true);
  assert.equal(parseBoolean(undefined, false), false);
});

test('parseList trims and drops empty entries', () => {
  assert.deepEqual(parseList(' a, b ,,c '), ['a', 'b', 'c']);
  assert.deepEqual(parseList(undefined), []);
});

test('firstDefined returns the first non-blank key', () => {
  const env = { A: '  ', B: ' value ', C: 'other' };
  assert.equal(firstDefined(env, 'A', 'B', 'C'), 'value');
  assert.equal(firstDefined(env, 'Z'), undefined);
});
