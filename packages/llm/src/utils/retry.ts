import { AbortError, isRetryableError, ProviderError } from '../types/error.js';

export type RetryPolicy = {
  /** Retries after the first attempt; 0 disables retrying. */
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
};

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  readonly signal?: AbortSignal;
};

export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
): number {
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  return Math.min(exponentialDelay, maxDelayMs);
}

/**
 * Retries a single operation with exponential backoff.
 *
 * Wrap one atomic operation per call. Errors that are not retryable
 * (see isRetryableError) propagate on the first failure; the last retryable
 * error propagates once the policy's budget is spent.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, onRetry, signal } = options;
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = policy;

  let attempt = 0;

  while (true) {
    if (signal?.aborted) {
      throw new AbortError('Operation was aborted');
    }

    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof Error) || !isRetryableError(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        throw error;
      }

      let delayMs = calculateBackoff(attempt, initialDelayMs, maxDelayMs, backoffMultiplier);

      // A server-supplied Retry-After replaces the computed backoff
      if (error instanceof ProviderError && error.retryAfter !== null) {
        if (error.retryAfter > maxDelayMs) {
          throw error;
        }
        delayMs = error.retryAfter;
      }

      // Jitter: 0-25% of delay
      const jitter = Math.random() * 0.25 * delayMs;
      const finalDelayMs = delayMs + jitter;

      attempt += 1;
      onRetry?.(error, attempt, finalDelayMs);

      await sleep(finalDelayMs, signal);
    }
  }
}

/** Resolves after `ms`; rejects with AbortError if the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError('Operation was aborted'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError('Operation was aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
