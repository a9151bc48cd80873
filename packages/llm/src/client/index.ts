export { Client, type ClientConfig } from './client.js';
export { executeMiddlewareChain } from './middleware.js';
export {
  RateLimiter,
  rateLimitMiddleware,
  adaptiveDelayMs,
  DEFAULT_RATE_LIMITS,
  type RateLimits,
  type RateLimiterOptions,
  type ThrottleNotice,
  type WindowUsage,
} from './rate-limit.js';
