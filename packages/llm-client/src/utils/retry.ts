/**
 * Retry utility with exponential backoff and jitter.
 *
 *   - Exponential backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * random(0.5, 1.5)`
 *   - Respect `retry_after` from errors
 *   - Only retry errors marked `retryable === true`
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Total retry attempts (not counting the initial call). Default: 2. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Maximum delay between retries in milliseconds. Default: 60000. */
  maxDelay: number;
  /** Exponential backoff factor. Default: 2. */
  backoffMultiplier: number;
  /** Whether to add random jitter (+/- 50%). Default: true. */
  jitter: boolean;
  /** Called before each retry with the error, attempt number, and delay. */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  /** When set, sleeping between attempts stops early once it fires. */
  signal?: AbortSignal;
}

interface RetryableError extends Error {
  retryable?: boolean;
  retry_after?: number;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 60000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Calculate the delay for a given attempt.
 *
 * `attempt` is 0-indexed (first retry = attempt 0).
 */
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

function isRetryableError(err: Error): err is RetryableError {
  return "retryable" in err;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute `fn` with automatic retries according to the given policy.
 *
 * Only errors where `error.retryable === true` are retried. If the error
 * carries a `retry_after` value (in seconds):
 *   - If `retry_after <= maxDelay / 1000`, use it as the delay.
 *   - If `retry_after > maxDelay / 1000`, re-throw immediately.
 *
 * Non-retryable errors are always re-thrown immediately. Once the signal has
 * fired, the last error is re-thrown without another call to `fn`, including
 * when it fires during a backoff sleep.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (attempt >= p.maxRetries || p.signal?.aborted) {
        throw error;
      }
      if (!isRetryableError(error) || !error.retryable) {
        throw error;
      }

      let delay: number;
      if (error.retry_after != null && error.retry_after > 0) {
        const retryAfterMs = error.retry_after * 1000;
        if (retryAfterMs > p.maxDelay) {
          throw error;
        }
        delay = retryAfterMs;
      } else {
        delay = calculateDelay(attempt, p);
      }

      p.onRetry?.(error, attempt, delay);
      await sleep(delay, p.signal);
      if (p.signal?.aborted) {
        throw error;
      }
    }
  }
}
