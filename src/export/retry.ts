/**
 * Retry Policy
 *
 * Runs one export attempt after another with exponential backoff and
 * jitter until it succeeds, hits a non-retryable error, or the next sleep
 * would overrun the per-task retry budget. The outcome is returned, never
 * thrown: a discarded task is the worker's to count and log.
 *
 * @module export/retry
 */

import { isRetryableError, toError } from '../tracing/errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RetryPolicyConfig {
  /** Total time budget per task, measured from the first attempt (default: 500000). */
  retryTimeoutMs?: number;
  /** Delay before the first retry (default: 500). */
  initialDelayMs?: number;
  /** Growth factor between retries (default: 2). */
  multiplier?: number;
  /** Upper bound of random jitter as a fraction of the base delay (default: 0.5). */
  jitterRatio?: number;
  /** Source of randomness in [0, 1). Defaults to Math.random. */
  randomFn?: () => number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type DiscardReason = 'non_retryable' | 'budget_exhausted';

export type RetryOutcome =
  | { status: 'succeeded'; attempts: number }
  | { status: 'discarded'; attempts: number; reason: DiscardReason; error: Error };

export interface RetryInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface RetryPolicy {
  /** Delay before retry number `retry` (0-based). */
  backoffDelay(retry: number): number;
  execute(operation: () => Promise<void>, onRetry?: (info: RetryInfo) => void): Promise<RetryOutcome>;
}

// ─── Implementation ──────────────────────────────────────────────────────────

/** Sleep on a timer that does not hold the process open. */
export function unrefSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    timer.unref();
  });
}

export function createRetryPolicy(config: RetryPolicyConfig = {}): RetryPolicy {
  const retryTimeoutMs = config.retryTimeoutMs ?? 500_000;
  const initialDelayMs = config.initialDelayMs ?? 500;
  const multiplier = config.multiplier ?? 2;
  const jitterRatio = config.jitterRatio ?? 0.5;
  const randomFn = config.randomFn ?? Math.random;
  const now = config.now ?? Date.now;
  const sleep = config.sleep ?? unrefSleep;

  if (initialDelayMs <= 0) {
    throw new RangeError(`initialDelayMs must be positive, got ${initialDelayMs}`);
  }
  if (jitterRatio < 0) {
    throw new RangeError(`jitterRatio must not be negative, got ${jitterRatio}`);
  }
  // With a smaller multiplier the maximum jitter of one delay could reach the next base delay
  if (multiplier <= 1 + jitterRatio) {
    throw new RangeError(
      `multiplier (${multiplier}) must exceed 1 + jitterRatio (${1 + jitterRatio})`,
    );
  }

  function backoffDelay(retry: number): number {
    const base = initialDelayMs * Math.pow(multiplier, retry);
    return base + randomFn() * jitterRatio * base;
  }

  async function execute(
    operation: () => Promise<void>,
    onRetry?: (info: RetryInfo) => void,
  ): Promise<RetryOutcome> {
    const startedAt = now();
    let attempts = 0;

    for (;;) {
      attempts++;
      try {
        await operation();
        return { status: 'succeeded', attempts };
      } catch (caught) {
        const error = toError(caught);
        if (!isRetryableError(caught)) {
          return { status: 'discarded', attempts, reason: 'non_retryable', error };
        }
        const delayMs = backoffDelay(attempts - 1);
        if (now() - startedAt + delayMs > retryTimeoutMs) {
          return { status: 'discarded', attempts, reason: 'budget_exhausted', error };
        }
        onRetry?.({ attempt: attempts, delayMs, error });
        await sleep(delayMs);
      }
    }
  }

  return { backoffDelay, execute };
}
