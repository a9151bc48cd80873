import type { LLMRequest, LLMResponse, Middleware, ProviderAdapter } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { executeMiddlewareChain } from './middleware.js';

export type ClientConfig = {
  readonly providers: Readonly<Record<string, ProviderAdapter>>;
  /** Defaults to the sole provider when exactly one is registered. */
  readonly defaultProvider?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
};

/** Routes each request to a provider adapter through the middleware chain. */
export class Client {
  private readonly adapters: ReadonlyMap<string, ProviderAdapter>;
  private readonly fallback: string | undefined;
  private readonly middleware: ReadonlyArray<Middleware>;

  constructor(config: ClientConfig) {
    this.adapters = new Map(Object.entries(config.providers));
    this.middleware = config.middleware ?? [];
    this.fallback = config.defaultProvider ?? (this.adapters.size === 1 ? [...this.adapters.keys()][0] : undefined);
  }

  get providerNames(): ReadonlyArray<string> {
    return [...this.adapters.keys()];
  }

  complete(request: LLMRequest): Promise<LLMResponse> {
    const name = request.provider || this.fallback;
    if (!name) {
      return Promise.reject(new ConfigurationError('no provider configured and no default set'));
    }

    const adapter = this.adapters.get(name);
    if (!adapter) {
      return Promise.reject(new ConfigurationError(`provider '${name}' not configured`));
    }

    return executeMiddlewareChain(this.middleware, request, (next) => adapter.complete(next));
  }

  /** Releases adapter resources; one adapter failing to close does not stop the rest. */
  async close(): Promise<void> {
    await Promise.allSettled([...this.adapters.values()].map((adapter) => adapter.close?.()));
  }
}
