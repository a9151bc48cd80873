import { describe, it, expect, vi } from 'vitest';
import { Client } from './client.js';
import { ConfigurationError } from '../types/index.js';
import type { LLMRequest, LLMResponse, ProviderAdapter } from '../types/index.js';
import { emptyUsage } from '../types/index.js';

function createMockAdapter(name: string) {
  const complete = vi.fn(
    async (_request: LLMRequest): Promise<LLMResponse> => ({
      id: `response-${name}`,
      model: 'test-model',
      content: [],
      finishReason: 'stop',
      usage: emptyUsage(),
    }),
  );
  const close = vi.fn(async (): Promise<void> => undefined);
  const adapter: ProviderAdapter = { name, complete, close };
  return { adapter, complete, close };
}

const request = (overrides?: Partial<LLMRequest>): LLMRequest => ({
  model: 'test-model',
  messages: [{ role: 'user', content: 'hi' }],
  ...overrides,
});

describe('Client', () => {
  it('uses the only registered provider as the default', async () => {
    const gemini = createMockAdapter('gemini');
    const client = new Client({ providers: { gemini: gemini.adapter } });

    const response = await client.complete(request());

    expect(response.id).toBe('response-gemini');
    expect(gemini.complete).toHaveBeenCalledTimes(1);
  });

  it('uses the explicit default when several providers exist', async () => {
    const first = createMockAdapter('first');
    const second = createMockAdapter('second');
    const client = new Client({
      providers: { first: first.adapter, second: second.adapter },
      defaultProvider: 'second',
    });

    const response = await client.complete(request());

    expect(response.id).toBe('response-second');
    expect(first.complete).not.toHaveBeenCalled();
  });

  it('routes on request.provider before the default', async () => {
    const first = createMockAdapter('first');
    const second = createMockAdapter('second');
    const client = new Client({
      providers: { first: first.adapter, second: second.adapter },
      defaultProvider: 'second',
    });

    const response = await client.complete(request({ provider: 'first' }));

    expect(response.id).toBe('response-first');
  });

  it('rejects an unknown provider', async () => {
    const client = new Client({ providers: { gemini: createMockAdapter('gemini').adapter } });

    await expect(client.complete(request({ provider: 'missing' }))).rejects.toThrow(
      new ConfigurationError("provider 'missing' not configured"),
    );
  });

  it('rejects when there is no default to fall back to', async () => {
    const client = new Client({
      providers: { a: createMockAdapter('a').adapter, b: createMockAdapter('b').adapter },
    });

    await expect(client.complete(request())).rejects.toThrow(ConfigurationError);
    await expect(client.complete(request())).rejects.toThrow('no provider configured and no default set');
  });

  it('passes the request through middleware', async () => {
    const gemini = createMockAdapter('gemini');
    const client = new Client({
      providers: { gemini: gemini.adapter },
      middleware: [(req, next) => next({ ...req, temperature: 0.1 })],
    });

    await client.complete(request());

    expect(gemini.complete.mock.calls[0]?.[0].temperature).toBe(0.1);
  });

  it('closes every adapter and tolerates adapters without close', async () => {
    const gemini = createMockAdapter('gemini');
    const bare: ProviderAdapter = { name: 'bare', complete: createMockAdapter('bare').complete };
    const client = new Client({ providers: { gemini: gemini.adapter, bare } });

    await client.close();

    expect(gemini.close).toHaveBeenCalledTimes(1);
  });
});
