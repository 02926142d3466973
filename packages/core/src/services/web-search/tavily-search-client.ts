import { z } from 'zod';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import type { ResourceGateway } from '../../gateway/resource-gateway.js';
import type { WebSearchClient, WebSearchHit } from './types.js';

const log = createChildLogger('web-search:tavily');

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().default(''),
    }),
  ),
});

export interface TavilySearchClientConfig {
  readonly apiKey: string;
  readonly gateway: ResourceGateway;
  readonly endpoint?: string;
  readonly cacheTtlMs?: number;
}

export function createTavilySearchClient(config: TavilySearchClientConfig): WebSearchClient {
  if (!config.apiKey) {
    throw new ConfigurationError('TAVILY_API_KEY is required for the tavily search provider');
  }

  const endpoint = config.endpoint ?? TAVILY_SEARCH_URL;

  return {
    provider: 'tavily',

    async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
      const result = await config.gateway.fetch({
        url: endpoint,
        method: 'POST',
        json: { query, max_results: maxResults, search_depth: 'basic' },
        headers: { Authorization: `Bearer ${config.apiKey}` },
        schema: TavilyResponseSchema,
        cacheTtlMs: config.cacheTtlMs,
        label: 'tavily:search',
      });

      if (!result.ok) {
        throw result.error;
      }

      log.debug({ query, hitCount: result.data.results.length, fromCache: result.fromCache }, 'Tavily search completed');

      return result.data.results.slice(0, maxResults).map((hit) => ({
        title: hit.title,
        link: hit.url,
        snippet: hit.content,
        source: 'Tavily',
      }));
    },
  };
}
