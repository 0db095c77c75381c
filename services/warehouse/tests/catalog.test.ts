import './testEnv';

import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import { ZodError } from 'zod';
import { findAggregateDefinition } from '../src/aggregates/definitions';
import { findTable, loadCatalogFile, parseCatalog } from '../src/config/catalog';
import { createSilentLogger } from '../src/observability/logger';
import { ValidationEngine } from '../src/validation/engine';
import { buildCatalog } from './fixtures';

const shippedCatalogPath = path.resolve(__dirname, '..', 'config', 'pipelines.json');

function issueMessages(error: unknown): string[] {
  assert.ok(error instanceof ZodError);
  return error.issues.map((issue) => issue.message);
}

test('shipped catalogue parses and names only known aggregates', () => {
  const catalog = loadCatalogFile(shippedCatalogPath);

  assert.equal(catalog.pipelines.length, 14);
  assert.deepEqual(catalog.aggregates, [
    'monthly_branch_performance',
    'monthly_segment_performance',
    'monthly_loan_portfolio'
  ]);
  for (const aggregateId of catalog.aggregates) {
    const definition = findAggregateDefinition(aggregateId);
    assert.ok(definition, `definition for ${aggregateId}`);
    assert.equal(findTable(catalog, definition.factTable)?.kind, 'fact');
    for (const dimension of definition.dimensionTables) {
      assert.equal(findTable(catalog, dimension)?.kind, 'dimension');
    }
  }
});

test('shipped catalogue only derives fields and applies rules the validator knows', () => {
  const catalog = loadCatalogFile(shippedCatalogPath);
  assert.doesNotThrow(
    () =>
      new ValidationEngine({
        catalog,
        resolver: { existingKeys: async () => new Set<string>() },
        rejectionThreshold: 0.1,
        rules: { completeness: true, validity: true, referential: true, business: true },
        plausibleFrom: '1900-01-01',
        futureToleranceDays: 1,
        sampleSize: 5,
        logger: createSilentLogger()
      })
  );
});

test('parseCatalog applies field and partitioning defaults', () => {
  const catalog = buildCatalog();
  const fact = findTable(catalog, 'transaction_fact');
  assert.ok(fact?.partitioning);
  assert.equal(fact.partitioning.autoCreate, true);
  assert.equal(fact.partitioning.precreatePeriods, 2);
  assert.equal(fact.partitioning.retention, undefined);
  assert.equal(findTable(catalog, 'branch')?.fields[0]?.required, true);
  assert.equal(findTable(catalog, 'customer')?.fields[2]?.required, false);
});

test('parseCatalog rejects fact tables without a partitioning policy', () => {
  const input = {
    sources: [],
    pipelines: [],
    tables: [{ name: 'loan_fact', kind: 'fact', fields: [{ name: 'loan_id', type: 'string' }] }]
  };
  assert.throws(
    () => parseCatalog(input),
    (error: unknown) => issueMessages(error).includes('fact tables must declare a partitioning policy')
  );
});

test('parseCatalog rejects references to fact tables and unknown pipeline wiring', () => {
  const input = {
    sources: [],
    tables: [
      {
        name: 'payment_fact',
        kind: 'fact',
        fields: [{ name: 'payment_id', type: 'string' }],
        partitioning: {}
      },
      {
        name: 'refund_fact',
        kind: 'fact',
        fields: [{ name: 'payment_id', type: 'string' }],
        references: [{ field: 'payment_id', table: 'payment_fact' }],
        partitioning: {}
      }
    ],
    pipelines: [{ id: 'payments', sourceId: 'missing_source', cadence: 'daily', targetTable: 'payment_fact', dependsOn: ['ghost'] }]
  };
  assert.throws(
    () => parseCatalog(input),
    (error: unknown) => {
      const messages = issueMessages(error);
      return (
        messages.includes('reference payment_id -> payment_fact must point at a dimension table') &&
        messages.includes("unknown source 'missing_source'") &&
        messages.includes("unknown pipeline dependency 'ghost'")
      );
    }
  );
});

test('parseCatalog rejects fields whose minimum exceeds the maximum', () => {
  const input = {
    sources: [],
    pipelines: [],
    tables: [
      {
        name: 'branch',
        kind: 'dimension',
        fields: [{ name: 'staff', type: 'integer', min: 10, max: 1 }]
      }
    ]
  };
  assert.throws(
    () => parseCatalog(input),
    (error: unknown) => issueMessages(error).includes("field 'staff' has min greater than max")
  );
});
