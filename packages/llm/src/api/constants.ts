import type { RetryPolicy } from '../utils/retry.js';

/**
 * Default retry policy for model calls: three retries, doubling from one
 * second, capped at one minute.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
};
