import { AbortError, NetworkError, ProviderError, RequestTimeoutError } from '../types/error.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly headers?: Record<string, string>;
  /** Serialized as JSON. */
  readonly body?: unknown;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  /** Name recorded on any ProviderError raised for this call. */
  readonly provider: string;
  readonly fetch?: typeof globalThis.fetch;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * One JSON request with an optional deadline and caller abort signal.
 * Non-2xx responses become ProviderError subclasses via mapHttpError.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  const { url, method = 'GET', body, timeoutMs, signal, provider, fetch: fetchImpl = globalThis.fetch } = options;

  if (signal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const deadline = timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
  const linked = linkSignals(signal, deadline);

  try {
    let response: globalThis.Response;
    let text: string;
    try {
      response = await fetchImpl(url, {
        method,
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: linked.signal,
      });
      // the body can fail mid-stream too, so it is read under the same classification
      text = await response.text();
    } catch (err) {
      throw transportError(err, signal, deadline, timeoutMs);
    }

    if (!response.ok) {
      throw mapHttpError({ statusCode: response.status, body: text, provider, headers: response.headers, raw: text });
    }

    try {
      return { response, body: text ? JSON.parse(text) : null };
    } catch {
      throw new ProviderError(`Response body is not JSON: ${text.slice(0, 200)}`, {
        statusCode: response.status,
        provider,
        raw: text,
      });
    }
  } finally {
    linked.dispose();
  }
}

function transportError(
  err: unknown,
  signal: AbortSignal | undefined,
  deadline: AbortSignal | undefined,
  timeoutMs: number | undefined,
): Error {
  if (signal?.aborted) {
    return new AbortError('Fetch was aborted');
  }
  if (deadline?.aborted) {
    return new RequestTimeoutError(`Request timed out after ${timeoutMs ?? 0}ms`);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkError(`Network request failed: ${message}`, err instanceof Error ? err : undefined);
}

type LinkedSignal = {
  readonly signal: AbortSignal | undefined;
  /** Detaches from the inputs; the caller's signal outlives this request. */
  readonly dispose: () => void;
};

/** Aborts when either input does. */
function linkSignals(a: AbortSignal | undefined, b: AbortSignal | undefined): LinkedSignal {
  if (!a || !b) {
    return { signal: a ?? b, dispose: () => undefined };
  }

  const controller = new AbortController();
  const abort = (): void => controller.abort();
  a.addEventListener('abort', abort, { once: true });
  b.addEventListener('abort', abort, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      a.removeEventListener('abort', abort);
      b.removeEventListener('abort', abort);
    },
  };
}
