import test from 'node:test';
import assert from 'node:assert/strict';
import { computeExponentialBackoff, withRetries } from '../src/retries/backoff';

test('grows exponentially and caps at maxMs', () => {
  assert.equal(computeExponentialBackoff(1, { jitterRatio: 0 }), 500);
  assert.equal(computeExponentialBackoff(2, { jitterRatio: 0 }), 1000);
  assert.equal(computeExponentialBackoff(3, { jitterRatio: 0 }), 2000);
  assert.equal(computeExponentialBackoff(10, { jitterRatio: 0 }), 10_000);
});

test('applies jitter within the configured bounds', () => {
  assert.equal(computeExponentialBackoff(1, { random: () => 1 }), 600);
  assert.equal(computeExponentialBackoff(2, { random: () => 0 }), 800);
  // never below the base delay
  assert.equal(computeExponentialBackoff(1, { random: () => 0 }), 500);
});

test('retries until the operation succeeds', async () => {
  const sleeps: number[] = [];
  const retried: number[] = [];
  let calls = 0;

  const result = await withRetries(
    async (attempt) => {
      calls += 1;
      if (attempt < 3) {
        throw new Error(`attempt ${attempt} failed`);
      }
      return 'connected';
    },
    {
      attempts: 3,
      baseMs: 100,
      jitterRatio: 0,
      onRetry: (_err, attempt) => {
        retried.push(attempt);
      },
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    }
  );

  assert.equal(result, 'connected');
  assert.equal(calls, 3);
  assert.deepEqual(retried, [1, 2]);
  assert.deepEqual(sleeps, [100, 200]);
});

test('rethrows the last error once attempts are exhausted', async () => {
  let calls = 0;
  await assert.rejects(
    withRetries(
      async (attempt) => {
        calls += 1;
        throw new Error(`attempt ${attempt} failed`);
      },
      { attempts: 3, jitterRatio: 0, sleep: async () => undefined }
    ),
    { message: 'attempt 3 failed' }
  );
  assert.equal(calls, 3);
});

test('stops immediately when shouldRetry declines', async () => {
  let calls = 0;
  await assert.rejects(
    withRetries(
      async () => {
        calls += 1;
        throw new Error('syntax error');
      },
      { attempts: 5, shouldRetry: () => false, sleep: async () => undefined }
    ),
    { message: 'syntax error' }
  );
  assert.equal(calls, 1);
});
