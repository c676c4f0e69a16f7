import { setTimeout as sleep } from 'node:timers/promises';

import { StepLoadError } from './errors.js';
import type { RetryStrategy } from './types.js';

/** Probes fail fast by default: one retry after a short pause. */
export const DEFAULT_PROBE_RETRY: RetryStrategy = {
  maxRetries: 1,
  backoff: 'constant',
  baseDelayMs: 500,
  maxDelayMs: 500,
};

/**
 * Compute delay for a given attempt using the retry strategy.
 */
function computeDelay(strategy: RetryStrategy, attempt: number): number {
  let delay: number;

  switch (strategy.backoff) {
    case 'constant':
      delay = strategy.baseDelayMs;
      break;
    case 'linear':
      delay = strategy.baseDelayMs * (attempt + 1);
      break;
    case 'exponential':
      delay = strategy.baseDelayMs * Math.pow(2, attempt);
      break;
  }

  return Math.min(delay, strategy.maxDelayMs);
}

/**
 * Call `fn` until it succeeds or the strategy runs out of retries.
 *
 * Only a `StepLoadError` marked retryable is retried; anything else is thrown
 * at once. Aborting `signal` cuts the pause between attempts short.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!(error instanceof StepLoadError) || !error.retryable) {
        throw error;
      }
      lastError = error;
      if (attempt < strategy.maxRetries) {
        await sleep(computeDelay(strategy, attempt), undefined, { signal });
      }
    }
  }

  throw lastError;
}
