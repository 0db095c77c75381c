import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computeExponentialBackoff, planRetry, sleep } from '../src/retries/backoff';

describe('computeExponentialBackoff', () => {
  it('applies exponential growth with deterministic jitter', () => {
    const delay = computeExponentialBackoff(1, {
      baseMs: 1_000,
      factor: 2,
      maxMs: 10_000,
      jitterRatio: 0.1,
      random: () => 1
    });

    assert.equal(delay, 1_100);
  });

  it('caps the delay at maxMs', () => {
    const delay = computeExponentialBackoff(10, {
      baseMs: 1_000,
      factor: 2,
      maxMs: 10_000,
      jitterRatio: 0
    });

    assert.equal(delay, 10_000);
  });
});

describe('planRetry', () => {
  it('retries retryable failures until the attempt limit', () => {
    const options = { baseMs: 100, factor: 2, maxMs: 1_000, jitterRatio: 0 };
    assert.deepEqual(planRetry(1, 3, true, options), { retry: true, delayMs: 100 });
    assert.deepEqual(planRetry(2, 3, true, options), { retry: true, delayMs: 200 });
    assert.deepEqual(planRetry(3, 3, true, options), { retry: false, delayMs: 0 });
  });

  it('never retries non-retryable failures', () => {
    assert.deepEqual(planRetry(1, 5, false), { retry: false, delayMs: 0 });
  });
});

describe('sleep', () => {
  it('rejects when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('cancelled'));
    await assert.rejects(pending, /cancelled/);
  });
});
