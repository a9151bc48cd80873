/** Base class for everything the model client throws. */
export class SDKError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

/** Missing or unusable client setup: no provider, no API key, a bad config file. */
export class ConfigurationError extends SDKError {}

export class AbortError extends SDKError {}

/** The request outlived its configured timeout. Retryable. */
export class RequestTimeoutError extends SDKError {}

/** The request never produced an HTTP response (DNS, refused, reset). Retryable. */
export class NetworkError extends SDKError {}

export type ProviderErrorDetails = {
  readonly statusCode: number;
  readonly provider: string;
  /** Provider status string such as `UNAVAILABLE`, when the body carried one. */
  readonly errorCode?: string | null;
  readonly raw?: unknown;
  /** Milliseconds, from a Retry-After header. */
  readonly retryAfter?: number | null;
};

/** The provider answered, but not with something usable. */
export class ProviderError extends SDKError {
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly provider: string;
  readonly errorCode: string | null;
  readonly raw: unknown;

  constructor(message: string, details: ProviderErrorDetails, retryable = false) {
    super(message);
    this.statusCode = details.statusCode;
    this.provider = details.provider;
    this.errorCode = details.errorCode ?? null;
    this.raw = details.raw ?? null;
    this.retryAfter = details.retryAfter ?? null;
    this.retryable = retryable;
  }
}

export class AuthenticationError extends ProviderError {}

export class AccessDeniedError extends ProviderError {}

export class NotFoundError extends ProviderError {}

export class InvalidRequestError extends ProviderError {}

export class ContextLengthError extends ProviderError {}

export class ContentFilterError extends ProviderError {}

export class RateLimitError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails) {
    super(message, details, true);
  }
}

export class ServerError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails) {
    super(message, details, true);
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  return error instanceof NetworkError || error instanceof RequestTimeoutError;
}
