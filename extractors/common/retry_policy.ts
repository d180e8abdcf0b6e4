import type { Logger } from '../../shared/logger.js';
import { LmsRequestError, isTransient } from './http_client.js';

export interface RetryPolicy {
  /** Total calls allowed, the first attempt included. */
  maxCalls: number;
  /** Retries stop once this much time has passed since the first call. */
  windowMs: number;
  backoffMs: number[];
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxCalls: 4,
  windowMs: 60000,
  backoffMs: [1000, 4000, 10000],
  jitter: 0.25,
};

export interface RetryHooks {
  label?: string;
  logger?: Logger;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

export async function callWithRetry<T>(
  task: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const now = hooks.now ?? Date.now;
  const wait = hooks.sleep ?? sleep;
  const shouldRetry = hooks.shouldRetry ?? isTransient;
  const startedAt = now();
  let lastError: unknown;

  for (let call = 1; call <= policy.maxCalls; call += 1) {
    try {
      return await task();
    } catch (error) {
      lastError = error;
      if (call >= policy.maxCalls || !shouldRetry(error)) {
        break;
      }
      const delayMs = computeDelayMs(policy, call, error, hooks.random ?? Math.random);
      if (now() - startedAt + delayMs > policy.windowMs) {
        hooks.logger?.warn({ label: hooks.label, call, windowMs: policy.windowMs }, 'retry window exhausted');
        break;
      }
      hooks.logger?.warn(
        {
          label: hooks.label,
          call,
          maxCalls: policy.maxCalls,
          delayMs,
          reason: error instanceof Error ? error.message : 'unknown error',
        },
        'request failed, retrying',
      );
      await wait(delayMs);
    }
  }

  if (lastError instanceof Error) {
    throw lastError;
  }
  throw new Error(`${hooks.label ?? 'Request'} failed after ${policy.maxCalls} calls`);
}

export function computeDelayMs(policy: RetryPolicy, call: number, error: unknown, random: () => number): number {
  const index = Math.min(call - 1, policy.backoffMs.length - 1);
  const base = policy.backoffMs[index] ?? 0;
  const retryAfterMs =
    error instanceof LmsRequestError && error.retryAfterSeconds !== undefined
      ? Math.round(error.retryAfterSeconds * 1000)
      : 0;
  const delay = Math.max(base, retryAfterMs);
  const jitter = policy.jitter > 0 && delay > 0 ? Math.round(delay * policy.jitter * random()) : 0;
  return delay + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
