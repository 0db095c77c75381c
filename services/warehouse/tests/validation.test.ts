import './testEnv';

import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, test } from 'node:test';
import { parseCatalog, type WarehouseCatalog } from '../src/config/catalog';
import { createSilentLogger } from '../src/observability/logger';
import { coerceValue } from '../src/validation/coercion';
import { applyDerivations } from '../src/validation/derivations';
import { ValidationEngine, type RuleToggles } from '../src/validation/engine';
import { writeQualityReport } from '../src/validation/qualityReport';
import { checkBusinessRules, type ReferenceResolver } from '../src/validation/rules';
import { buildBatch, buildCatalog, fixedClock, transactionRecord } from './fixtures';

const ALL_RULES: RuleToggles = { completeness: true, validity: true, referential: true, business: true };

function knownKeysResolver(known: Record<string, string[]>): ReferenceResolver & { calls: Array<[string, string[]]> } {
  const calls: Array<[string, string[]]> = [];
  return {
    calls,
    existingKeys: async (table, naturalKeys) => {
      calls.push([table, [...naturalKeys].sort()]);
      const present = new Set(known[table] ?? []);
      return new Set(naturalKeys.filter((key) => present.has(key)));
    }
  };
}

function createEngine(
  options: { rules?: RuleToggles; resolver?: ReferenceResolver; catalog?: WarehouseCatalog; threshold?: number } = {}
): ValidationEngine {
  return new ValidationEngine({
    catalog: options.catalog ?? buildCatalog(),
    resolver: options.resolver ?? knownKeysResolver({ branch: ['B1', 'B2'] }),
    rejectionThreshold: options.threshold ?? 0.1,
    rules: options.rules ?? ALL_RULES,
    plausibleFrom: '1990-01-01',
    futureToleranceDays: 1,
    sampleSize: 2,
    logger: createSilentLogger(),
    now: fixedClock
  });
}

describe('ValidationEngine', () => {
  test('accepts clean records with coerced and derived payloads', async () => {
    const engine = createEngine();
    const result = await engine.validate(
      buildBatch([transactionRecord(1), transactionRecord(2, { transaction_date: '2024-01-13', amount: ' 42.50 ' })])
    );

    assert.equal(result.rejected.length, 0);
    assert.equal(result.thresholdExceeded, false);
    assert.deepEqual(
      result.accepted.map((record) => [record.naturalKey, record.payload.amount, record.payload.is_weekend]),
      [
        ['T1', 100, false],
        ['T2', 42.5, true]
      ]
    );
    assert.equal(result.accepted[0]?.payload.seq, '1');
  });

  test('attaches a reason per failed rule and trips the rejection threshold', async () => {
    const engine = createEngine();
    const batch = buildBatch([
      transactionRecord(1),
      transactionRecord(2, { amount: '' }),
      transactionRecord(3, { amount: 'abc' }),
      transactionRecord(4, { branch_id: 'B9' }),
      transactionRecord(5, { transaction_date: '2031-01-01' }),
      transactionRecord(6, { transaction_kind: 'reversal', amount: '50' }),
      transactionRecord(7, { currency: 'JPY' }),
      transactionRecord(8, { amount: '20000' })
    ]);

    const result = await engine.validate(batch);

    assert.deepEqual(
      result.accepted.map((record) => record.naturalKey),
      ['T1']
    );
    assert.deepEqual(
      result.rejected.map(({ record, reasons }) => [record.naturalKey, reasons.map((reason) => reason.code)]),
      [
        ['T2', ['MissingField']],
        ['T3', ['InvalidType']],
        ['T4', ['DanglingReference']],
        ['T5', ['ImplausibleDate']],
        ['T6', ['BusinessRule']],
        ['T7', ['InvalidDomain']],
        ['T8', ['OutOfRange']]
      ]
    );
    assert.equal(result.rejected[2]?.reasons[0]?.message, 'branch_id=B9 has no row in branch');
    assert.equal(result.thresholdExceeded, true);

    assert.equal(result.report.totalRecords, 8);
    assert.equal(result.report.acceptedCount, 1);
    assert.equal(result.report.rejectedCount, 7);
    assert.deepEqual(
      result.report.checks.map((check) => [check.checkKind, check.passedCount, check.failedCount]),
      [
        ['completeness', 7, 1],
        ['validity', 4, 4],
        ['referential', 7, 1],
        ['business', 7, 1]
      ]
    );
    const validity = result.report.checks.find((check) => check.checkKind === 'validity');
    assert.deepEqual(
      validity?.sampleFailures.map((sample) => sample.naturalKey),
      ['T3', 'T5']
    );
  });

  test('does not trip the threshold at exactly the configured ratio', async () => {
    const engine = createEngine();
    const records = Array.from({ length: 10 }, (_, index) => transactionRecord(index + 1));
    records[9] = transactionRecord(10, { amount: '' });

    const result = await engine.validate(buildBatch(records));
    assert.equal(result.rejected.length, 1);
    assert.equal(result.thresholdExceeded, false);
  });

  test('resolves references with one lookup per referenced table', async () => {
    const resolver = knownKeysResolver({ branch: ['B1', 'B2'] });
    const engine = createEngine({ resolver });
    await engine.validate(
      buildBatch([
        transactionRecord(1, { branch_id: 'B2' }),
        transactionRecord(2),
        transactionRecord(3, { branch_id: ' B1 ' })
      ])
    );
    assert.deepEqual(resolver.calls, [['branch', ['B1', 'B2']]]);
  });

  test('skips disabled rule families but still rejects unplaceable records', async () => {
    const engine = createEngine({
      rules: { completeness: true, validity: false, referential: false, business: true }
    });
    const result = await engine.validate(
      buildBatch([
        transactionRecord(1, { amount: 'abc' }),
        transactionRecord(2, { branch_id: 'B9', transaction_date: '2031-01-01' }),
        transactionRecord(3, { transaction_date: 'not-a-date' })
      ])
    );

    assert.deepEqual(
      result.accepted.map((record) => [record.naturalKey, record.payload.amount]),
      [
        ['T1', 'abc'],
        ['T2', 100]
      ]
    );
    assert.deepEqual(
      result.rejected.map(({ record, reasons }) => [record.naturalKey, reasons.map((reason) => reason.code)]),
      [['T3', ['InvalidType']]]
    );
    assert.deepEqual(
      result.report.checks.map((check) => check.checkKind),
      ['completeness', 'validity', 'business']
    );
  });

  test('derives age and tenure from the extraction date', async () => {
    const engine = createEngine();
    const result = await engine.validate(
      buildBatch(
        [
          {
            naturalKey: 'C1',
            eventDate: '2024-02-15',
            sourceWatermark: '1',
            payload: {
              customer_id: 'C1',
              full_name: 'Test Customer',
              date_of_birth: '1990-06-20',
              acquisition_date: '2024-01-16'
            }
          }
        ],
        { sourceId: 'crm_customers', cadence: 'weekly', targetTable: 'customer' }
      )
    );

    assert.equal(result.accepted.length, 1);
    assert.equal(result.accepted[0]?.payload.age, 33);
    assert.equal(result.accepted[0]?.payload.customer_tenure_days, 30);
  });

  test('refuses catalogues naming unknown derivations', () => {
    const catalog = parseCatalog({
      sources: [],
      pipelines: [],
      tables: [
        {
          name: 'branch',
          kind: 'dimension',
          fields: [{ name: 'branch_id', type: 'string' }],
          derive: ['shoe_size']
        }
      ]
    });
    assert.throws(() => createEngine({ catalog }), /table 'branch' derives unknown field 'shoe_size'/);
  });
});

describe('validation helpers', () => {
  test('coerceValue handles booleans, integers and timestamps', () => {
    assert.deepEqual(coerceValue('Yes', 'boolean'), { ok: true, value: true });
    assert.deepEqual(coerceValue('0', 'boolean'), { ok: true, value: false });
    assert.deepEqual(coerceValue('12', 'integer'), { ok: true, value: 12 });
    assert.deepEqual(coerceValue('12.5', 'integer'), { ok: false });
    assert.deepEqual(coerceValue('2024-01-10T08:30:00+02:00', 'timestamp'), {
      ok: true,
      value: '2024-01-10T06:30:00.000Z'
    });
    assert.deepEqual(coerceValue('2024-02-30', 'date'), { ok: false });
  });

  test('fixed holidays and weekends are derived from the event date', () => {
    const derived = applyDerivations({}, ['is_weekend', 'is_holiday'], {
      eventDate: '2023-12-25',
      referenceDate: '2024-01-01'
    });
    assert.deepEqual(derived, { is_weekend: false, is_holiday: true });
  });

  test('loan dates must be ordered and unknown rules are refused', () => {
    const reasons = checkBusinessRules(
      { application_date: '2024-01-10', approval_date: '2024-01-02' },
      ['loan_dates_ordered']
    );
    assert.deepEqual(reasons, [
      {
        code: 'BusinessRule',
        check: 'business',
        field: 'loan_dates_ordered',
        message: 'approval_date 2024-01-02 precedes application_date 2024-01-10'
      }
    ]);
    assert.throws(() => checkBusinessRules({}, ['no_such_rule']), /unknown business rule 'no_such_rule'/);
  });

  test('writeQualityReport summarises batches into a JSON file', async () => {
    const directory = await mkdtemp(path.join(tmpdir(), 'warehouse-quality-'));
    try {
      const engine = createEngine();
      const { report } = await engine.validate(buildBatch([transactionRecord(1), transactionRecord(2, { amount: '' })]));
      const target = path.join(directory, 'nested', 'report.json');

      const summary = await writeQualityReport(target, [report], '2024-02-15T12:00:00.000Z');
      const written: unknown = JSON.parse(await readFile(target, 'utf8'));

      assert.equal(summary.totalChecks, 4);
      assert.equal(summary.failedChecks, 1);
      assert.equal(summary.passedChecks, 3);
      assert.deepEqual(written, summary);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
