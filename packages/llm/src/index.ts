// @parley/llm — provider-neutral model client

export * from './types/index.js';
export * from './client/index.js';
export { retry, calculateBackoff, sleep, type RetryOptions, type RetryPolicy } from './utils/retry.js';
export { fetchWithTimeout, type FetchOptions, type FetchResult } from './utils/http.js';
export { mapHttpError, parseRetryAfter, parseErrorBody } from './utils/error-mapping.js';
export { DEFAULT_RETRY_POLICY } from './api/constants.js';
export { GeminiAdapter, GEMINI_BASE_URL, type GeminiAdapterOptions } from './providers/gemini/index.js';
