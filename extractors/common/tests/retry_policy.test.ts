import assert from 'node:assert/strict';
import test from 'node:test';

import { captureLogs, messages } from '../../../shared/tests/log_capture.js';
import { LmsRequestError } from '../http_client.js';
import { DEFAULT_RETRY_POLICY, callWithRetry, computeDelayMs, type RetryPolicy } from '../retry_policy.js';

const serverError = () => new LmsRequestError('boom', 'HTTP', 'req', 'https://lms.test', 503);

test('transient failures are retried until the call succeeds', async () => {
  const sleeps: number[] = [];
  let calls = 0;
  const result = await callWithRetry(
    async () => {
      calls += 1;
      if (calls < 3) throw serverError();
      return 'ok';
    },
    DEFAULT_RETRY_POLICY,
    { sleep: async (ms) => void sleeps.push(ms), random: () => 0 },
  );
  assert.equal(result, 'ok');
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [1000, 4000]);
});

test('at most four calls are made with the default policy', async () => {
  const { logger, lines } = captureLogs();
  let calls = 0;
  await assert.rejects(
    callWithRetry(
      async () => {
        calls += 1;
        throw serverError();
      },
      DEFAULT_RETRY_POLICY,
      { logger, label: 'courses', sleep: async () => undefined, random: () => 0 },
    ),
    { statusCode: 503 },
  );
  assert.equal(calls, 4);
  assert.deepEqual(messages(lines, 'warn'), [
    'request failed, retrying',
    'request failed, retrying',
    'request failed, retrying',
  ]);
});

test('non-transient errors are not retried', async () => {
  let calls = 0;
  await assert.rejects(
    callWithRetry(
      async () => {
        calls += 1;
        throw new LmsRequestError('missing', 'HTTP', 'req', 'https://lms.test', 404);
      },
      DEFAULT_RETRY_POLICY,
      { sleep: async () => undefined },
    ),
    { statusCode: 404 },
  );
  assert.equal(calls, 1);
});

test('retries stop when the next delay would leave the window', async () => {
  const { logger, lines } = captureLogs();
  const policy: RetryPolicy = { maxCalls: 4, windowMs: 3000, backoffMs: [1000, 4000], jitter: 0 };
  let clock = 0;
  let calls = 0;
  await assert.rejects(
    callWithRetry(
      async () => {
        calls += 1;
        throw serverError();
      },
      policy,
      {
        logger,
        now: () => clock,
        sleep: async (ms) => {
          clock += ms;
        },
      },
    ),
  );
  // call 1 fails, waits 1000; call 2 fails and 1000 + 4000 exceeds 3000
  assert.equal(calls, 2);
  assert.deepEqual(messages(lines, 'warn'), ['request failed, retrying', 'retry window exhausted']);
});

test('computeDelayMs honours Retry-After and adds bounded jitter', () => {
  const limited = new LmsRequestError('limited', 'HTTP', 'req', 'https://lms.test', 429, undefined, undefined, 7);
  assert.equal(computeDelayMs(DEFAULT_RETRY_POLICY, 1, limited, () => 0), 7000);
  assert.equal(computeDelayMs(DEFAULT_RETRY_POLICY, 1, serverError(), () => 1), 1250);
  assert.equal(computeDelayMs(DEFAULT_RETRY_POLICY, 9, serverError(), () => 0), 10000);
});
