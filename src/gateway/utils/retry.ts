// ============================================================================
// Retry Logic with Exponential Backoff
// ============================================================================

import { ProviderError } from "../types.js";
import type { RetryPolicy } from "../types.js";
import { sleep, isAbortError } from "../../concurrency/abort.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_retries: 2,
  base_delay: 1.0,
  max_delay: 60.0,
  backoff_multiplier: 2.0,
  jitter: true,
};

/** Backoff delay in seconds for the given 0-based retry attempt. */
export function computeDelay(attempt: number, policy: RetryPolicy): number {
  let delay = Math.min(
    policy.base_delay * Math.pow(policy.backoff_multiplier, attempt),
    policy.max_delay,
  );
  if (policy.jitter) {
    // +/- 50% jitter
    delay = delay * (0.5 + Math.random());
  }
  return delay;
}

export function isRetryable(error: unknown): boolean {
  if (isAbortError(error)) return false;
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  // Unknown errors default to retryable
  return true;
}

/**
 * Delay before the next retry, or undefined when the error should not be
 * retried because its Retry-After exceeds max_delay.
 */
export function retryDelay(error: unknown, attempt: number, policy: RetryPolicy): number | undefined {
  if (error instanceof ProviderError && error.retry_after !== undefined) {
    if (error.retry_after > policy.max_delay) return undefined;
    return error.retry_after;
  }
  return computeDelay(attempt, policy);
}

export async function retry<T>(
  fn: () => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  signal?: AbortSignal,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };

  let lastError: unknown;

  for (let attempt = 0; attempt <= p.max_retries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (attempt >= p.max_retries) break;
      if (!isRetryable(err)) break;

      const delay = retryDelay(err, attempt, p);
      if (delay === undefined) break;

      if (p.on_retry && err instanceof Error) {
        p.on_retry(err, attempt + 1, delay);
      }

      await sleep(delay * 1000, signal);
    }
  }

  throw lastError;
}
