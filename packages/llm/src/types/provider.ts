import type { LLMRequest } from './request.js';
import type { LLMResponse } from './response.js';

/** Speaks one vendor's wire format; the Client holds one per provider name. */
export interface ProviderAdapter {
  readonly name: string;
  /** Rejects with an SDKError subclass; retrying is the caller's concern. */
  complete(request: LLMRequest): Promise<LLMResponse>;
  close?(): Promise<void>;
}

/** Wraps a model call; call `next` to continue down the chain. */
export type Middleware = (
  request: LLMRequest,
  next: (request: LLMRequest) => Promise<LLMResponse>,
) => Promise<LLMResponse>;
