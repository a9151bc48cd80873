import type { Middleware } from '../types/index.js';
import { sleep } from '../utils/retry.js';

export type RateLimits = {
  readonly requestsPerMinute: number;
  readonly tokensPerMinute: number;
};

export const DEFAULT_RATE_LIMITS: RateLimits = {
  requestsPerMinute: 60,
  tokensPerMinute: 1_000_000,
};

const WINDOW_MS = 60_000;

export type ThrottleNotice = {
  readonly limitedBy: 'requests' | 'tokens';
  readonly reason: string;
  readonly delayMs: number;
};

export type WindowUsage = {
  readonly requests: number;
  readonly tokens: number;
};

export type RateLimiterOptions = {
  readonly limits?: RateLimits;
  readonly now?: () => number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Called before each wait. */
  readonly onThrottle?: (notice: ThrottleNotice) => void;
};

/**
 * Spacing to keep between requests at a given share of a per-minute limit.
 * Free below 66 %, then rising in three bands: up to 0.5 s at 80 %,
 * 2 s at 90 %, and quadratically to 10 s at the limit and beyond.
 */
export function adaptiveDelayMs(used: number, limit: number): number {
  if (limit <= 0) {
    return 0;
  }

  const share = used / limit;
  let seconds: number;
  if (share < 0.66) {
    seconds = 0;
  } else if (share < 0.8) {
    seconds = ((share - 0.66) / (0.8 - 0.66)) * 0.5;
  } else if (share < 0.9) {
    seconds = 0.5 + ((share - 0.8) / (0.9 - 0.8)) * 1.5;
  } else {
    seconds = 2 + ((share - 0.9) / 0.1) ** 2 * 8;
  }
  return seconds * 1000;
}

function percent(used: number, limit: number): string {
  return `${((used / limit) * 100).toFixed(1)}%`;
}

/**
 * Client-side throttle over a sliding one-minute window of requests and
 * tokens. Calls slow down as usage nears either per-minute limit.
 */
export class RateLimiter {
  private readonly limits: RateLimits;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly onThrottle: ((notice: ThrottleNotice) => void) | undefined;
  private entries: Array<{ readonly at: number; readonly tokens: number }> = [];
  private lastRequestAt = Number.NEGATIVE_INFINITY;

  constructor(options: RateLimiterOptions = {}) {
    this.limits = options.limits ?? DEFAULT_RATE_LIMITS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.onThrottle = options.onThrottle;
  }

  /** Requests and tokens recorded in the last minute. */
  usage(): WindowUsage {
    this.prune();
    return {
      requests: this.entries.length,
      tokens: this.entries.reduce((sum, entry) => sum + entry.tokens, 0),
    };
  }

  /** The wait the next request owes, or null when it may go now. */
  check(): ThrottleNotice | null {
    const { requests, tokens } = this.usage();
    const { requestsPerMinute, tokensPerMinute } = this.limits;
    const requestDelay = adaptiveDelayMs(requests, requestsPerMinute);
    const tokenDelay = adaptiveDelayMs(tokens, tokensPerMinute);
    const remaining = Math.max(requestDelay, tokenDelay) - (this.now() - this.lastRequestAt);

    if (remaining <= 0) {
      return null;
    }
    if (tokenDelay > requestDelay) {
      return {
        limitedBy: 'tokens',
        reason: `Token usage at ${percent(tokens, tokensPerMinute)} (${tokens.toLocaleString('en-US')}/${tokensPerMinute.toLocaleString('en-US')})`,
        delayMs: remaining,
      };
    }
    return {
      limitedBy: 'requests',
      reason: `Request rate at ${percent(requests, requestsPerMinute)} (${requests}/${requestsPerMinute})`,
      delayMs: remaining,
    };
  }

  async waitIfNeeded(signal?: AbortSignal): Promise<void> {
    const notice = this.check();
    if (notice) {
      this.onThrottle?.(notice);
      await this.sleep(notice.delayMs, signal);
    }
  }

  record(tokens: number): void {
    const at = this.now();
    this.entries.push({ at, tokens });
    this.lastRequestAt = at;
  }

  private prune(): void {
    const cutoff = this.now() - WINDOW_MS;
    this.entries = this.entries.filter((entry) => entry.at > cutoff);
  }
}

/** Waits out the limiter before each call and records the tokens each response used. */
export function rateLimitMiddleware(limiter: RateLimiter): Middleware {
  return async (request, next) => {
    await limiter.waitIfNeeded(request.signal);
    const response = await next(request);
    limiter.record(response.usage.totalTokens);
    return response;
  };
}
