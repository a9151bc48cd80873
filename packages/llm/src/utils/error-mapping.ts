import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
  type ProviderErrorDetails,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
  readonly raw?: unknown;
};

type ErrorDetail = {
  readonly message: string;
  readonly code: string | null;
};

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): converted to ms
 * - HTTP date string: delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!Number.isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Pulls `{ error: { message, status } }` out of a JSON error body, the shape
 * Google APIs (and most JSON APIs) use. Falls back to the raw text.
 */
export function parseErrorBody(body: string): ErrorDetail {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const error = parsed.error;
      if (typeof error === 'object' && error !== null) {
        const message = 'message' in error && typeof error.message === 'string' ? error.message : body;
        const code = 'status' in error && typeof error.status === 'string' ? error.status : null;
        return { message, code };
      }
      if (typeof error === 'string') {
        return { message: error, code: null };
      }
    }
  } catch {
    // not JSON; use the raw text
  }
  return { message: body, code: null };
}

/**
 * Maps HTTP status codes and response bodies to ProviderError subclasses.
 * Status code decides first; ambiguous 400s are classified by message text.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers, raw } = options;
  const retryAfter = parseRetryAfter(headers);
  const { message, code } = parseErrorBody(body);
  const details: ProviderErrorDetails = { statusCode, provider, errorCode: code, raw, retryAfter };

  switch (statusCode) {
    case 400:
      return classifyHttp400(message, details);

    case 401:
      return new AuthenticationError(`Authentication failed: ${message}`, details);

    case 403:
      return new AccessDeniedError(`Access denied: ${message}`, details);

    case 404:
      return new NotFoundError(`Resource not found: ${message}`, details);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${message}`, details);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${message}`, details);

    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, details);

    default:
      if (statusCode >= 500) {
        return new ServerError(`Server error: ${message}`, details);
      }

      return new ProviderError(`HTTP ${statusCode}: ${message}`, details);
  }
}

function classifyHttp400(message: string, details: ProviderErrorDetails): ProviderError {
  const lower = message.toLowerCase();

  // Google reports a bad key as 400 INVALID_ARGUMENT with this text
  if (lower.includes('api key not valid') || lower.includes('api_key_invalid')) {
    return new AuthenticationError(`Authentication failed: ${message}`, details);
  }

  if (lower.includes('content_filter') || lower.includes('content_policy') || lower.includes('safety')) {
    return new ContentFilterError(`Content filtered: ${message}`, details);
  }

  if (
    lower.includes('context_length') ||
    lower.includes('too many tokens') ||
    lower.includes('maximum context') ||
    lower.includes('exceeds the maximum number of tokens')
  ) {
    return new ContextLengthError(`Context length exceeded: ${message}`, details);
  }

  return new InvalidRequestError(`Invalid request: ${message}`, details);
}
