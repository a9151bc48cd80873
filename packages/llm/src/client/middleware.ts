import type { Middleware, LLMRequest, LLMResponse } from '../types/index.js';

type Handler = (request: LLMRequest) => Promise<LLMResponse>;

/**
 * Runs `handler` inside the middleware list, first entry outermost: it sees
 * the request first and the response last.
 */
export function executeMiddlewareChain(
  middleware: ReadonlyArray<Middleware>,
  request: LLMRequest,
  handler: Handler,
): Promise<LLMResponse> {
  const chain = middleware.reduceRight<Handler>((next, layer) => (req) => layer(req, next), handler);
  return chain(request);
}
