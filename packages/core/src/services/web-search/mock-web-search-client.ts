import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { WebSearchClient, WebSearchHit } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_HITS: readonly WebSearchHit[] = [
  {
    title: 'Mock result one',
    link: 'https://example.com/source1',
    snippet: 'Mock web search result with general information about the topic.',
    source: 'Mock',
  },
  {
    title: 'Mock result two',
    link: 'https://example.com/source2',
    snippet: 'A second mock result.',
    source: 'Mock',
  },
];

export function createMockWebSearchClient(
  responses?: Map<string, readonly WebSearchHit[]>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    provider: 'mock',

    search(query: string, maxResults: number): Promise<WebSearchHit[]> {
      log.debug({ query }, 'Mock web search');

      const hits = responses?.get(query) ?? DEFAULT_HITS;
      return Promise.resolve(hits.slice(0, maxResults));
    },
  };
}
