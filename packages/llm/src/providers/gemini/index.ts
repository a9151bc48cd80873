import type { ProviderAdapter, LLMRequest, LLMResponse } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';

export type GeminiAdapterOptions = {
  readonly baseUrl?: string;
  readonly fetch?: typeof globalThis.fetch;
};

export class GeminiAdapter implements ProviderAdapter {
  readonly name = 'gemini';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof globalThis.fetch | undefined;

  constructor(apiKey: string, options?: GeminiAdapterOptions) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || GEMINI_BASE_URL;
    this.fetchImpl = options?.fetch;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeoutMs: request.timeoutMs,
      signal: request.signal,
      provider: this.name,
      fetch: this.fetchImpl,
    });

    return translateResponse(result.body, request.model);
  }
}

export { translateRequest, translateResponse };
