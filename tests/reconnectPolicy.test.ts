import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('doubles the delay per attempt up to the cap', async () => {
  const { ReconnectPolicy } = await import('../src/ami/reconnectPolicy');
  const policy = new ReconnectPolicy({
    baseDelayMs: 1000,
    maxDelayMs: 10_000,
    jitterRatio: 0.2,
    maxAttempts: 0,
    random: () => 0,
  });

  const delays = Array.from({ length: 6 }, () => policy.nextDelay());

  assert.deepEqual(delays, [1000, 2000, 4000, 8000, 10_000, 10_000]);
  assert.equal(policy.attemptCount, 6);
});

test('jitter lengthens delays without breaking monotonicity', async () => {
  const { ReconnectPolicy } = await import('../src/ami/reconnectPolicy');
  const samples = [0.9, 0, 0.9, 0, 0.5, 0.9, 0];
  let index = 0;
  const policy = new ReconnectPolicy({
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    jitterRatio: 0.5,
    maxAttempts: 0,
    random: () => samples[index++ % samples.length] ?? 0,
  });

  const delays = Array.from({ length: 7 }, () => policy.nextDelay());

  assert.deepEqual(delays, [725, 1000, 2900, 4000, 10_000, 23_200, 30_000]);
  for (let i = 1; i < delays.length; i += 1) {
    assert.ok(delays[i] >= delays[i - 1], `delay ${i} shrank`);
  }
});

test('stops allowing retries after maxAttempts until reset', async () => {
  const { ReconnectPolicy } = await import('../src/ami/reconnectPolicy');
  const policy = new ReconnectPolicy({ baseDelayMs: 10, maxDelayMs: 100, jitterRatio: 0, maxAttempts: 2 });

  assert.equal(policy.canRetry(), true);
  policy.nextDelay();
  assert.equal(policy.canRetry(), true);
  policy.nextDelay();
  assert.equal(policy.canRetry(), false);

  policy.reset();
  assert.equal(policy.canRetry(), true);
  assert.equal(policy.nextDelay(), 10);
});
