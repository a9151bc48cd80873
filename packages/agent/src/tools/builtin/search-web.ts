import { z } from 'zod';
import { fetchWithTimeout } from '@parley/llm';
import type { ToolDescriptor } from '../../types/index.js';
import { ok, warning } from '../../types/index.js';
import { defineTool } from '../define.js';

export const SERPER_SEARCH_URL = 'https://google.serper.dev/search';

const TIMEOUT_MS = 10_000;
const MIN_RESULTS = 1;
const MAX_RESULTS = 10;

export type SearchResult = {
  readonly position: number;
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
};

export type SearchWebOptions = {
  readonly serperApiKey: string | undefined;
  readonly fetch?: typeof globalThis.fetch;
};

const SerperResponseSchema = z
  .object({
    organic: z
      .array(
        z
          .object({
            title: z.string().optional(),
            link: z.string().optional(),
            snippet: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

function clampResults(requested: unknown): number {
  const count = typeof requested === 'number' ? requested : 5;
  return Math.min(MAX_RESULTS, Math.max(MIN_RESULTS, count));
}

export function createSearchWebTool(options: SearchWebOptions): ToolDescriptor {
  return defineTool({
    name: 'search_web',
    description:
      'Search the web for current and real-time information: news, dates, weather, prices, ' +
      'and the latest facts on any topic. Returns ranked results with title, snippet and url.',
    category: 'search',
    parameters: {
      query: { kind: 'string', description: 'The search query to run', required: true },
      num_results: {
        kind: 'integer',
        description: `How many results to return (${MIN_RESULTS}-${MAX_RESULTS})`,
        default: 5,
      },
    },
    handler: async (args, { signal, logger }) => {
      if (!options.serperApiKey) {
        return warning('search is not configured: no Serper API key found. Run `parley --config` to add one.');
      }

      const query = String(args['query']);
      const num = clampResults(args['num_results']);

      const { body } = await fetchWithTimeout({
        url: SERPER_SEARCH_URL,
        method: 'POST',
        headers: { 'X-API-KEY': options.serperApiKey },
        body: { q: query, num },
        timeoutMs: TIMEOUT_MS,
        signal,
        provider: 'serper',
        fetch: options.fetch,
      });

      const parsed = SerperResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      }

      const results: Array<SearchResult> = (parsed.data.organic ?? []).slice(0, num).map((item, index) => ({
        position: index + 1,
        title: item.title ?? 'No title',
        snippet: item.snippet ?? 'No description',
        url: item.link ?? '',
      }));

      logger.debug('search completed', { results: results.length });
      return ok({ query, results });
    },
  });
}
