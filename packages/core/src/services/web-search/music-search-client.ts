import { createChildLogger } from '@quarry/shared/src/logger.js';
import { InvalidInputError } from '@quarry/shared/src/utils/errors.js';
import type { IndexedPage } from '@quarry/shared/src/types/indexing.types.js';
import type { EntityResolver } from '../entity-resolution/entity-resolver.js';
import type { ContentIndexer } from '../content-indexing/content-indexer.js';
import type { WebSearchClient, WebSearchHit } from './types.js';

const log = createChildLogger('web-search:music');

const SNIPPET_LIMIT = 300;
export const ENTITY_BASE_URL = 'https://www.wikidata.org/wiki/';

export interface MusicSearchClientConfig {
  readonly resolver: EntityResolver;
  readonly indexer: ContentIndexer;
}

function pageHit(page: IndexedPage): WebSearchHit {
  return {
    title: page.title,
    link: page.url,
    snippet: page.content.slice(0, SNIPPET_LIMIT),
    source: `Wikipedia (${page.contentType})`,
  };
}

/**
 * Resolves the query to its best matching entity and returns that entity's
 * indexed encyclopedia pages as search hits.
 */
export function createMusicSearchClient(config: MusicSearchClientConfig): WebSearchClient {
  return {
    provider: 'music',

    async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
      const resolved = await config.resolver.search(query, 'name', 1);
      if (resolved.error) {
        throw new InvalidInputError(resolved.error);
      }

      const best = resolved.results[0];
      if (!best) {
        log.info({ query }, 'No entity matched the query');
        return [];
      }

      const indexed = await config.indexer.index(best.name, best.entityId);
      if (indexed.status === 'error') {
        log.warn({ query, error: indexed.error }, 'Indexing failed, returning the entity only');
      }

      const entityHit: WebSearchHit = {
        title: best.name,
        link: `${ENTITY_BASE_URL}${best.entityId}`,
        snippet: [best.description, best.country, best.birthYear].filter(Boolean).join(' | '),
        source: 'Wikidata',
      };

      const pages = [...indexed.primaryPages, ...indexed.releasePages, ...indexed.trackPages];
      return [entityHit, ...pages.map(pageHit)].slice(0, maxResults);
    },
  };
}
