import type {
  IndexedPage,
  IndexingResult,
  PageContentType,
} from '@quarry/shared/src/types/indexing.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import { countWords } from './html-text.js';
import type { MediaWikiClient, ParsedPage } from './mediawiki-client.js';
import {
  RELEASE_TERMS,
  TRACK_TERMS,
  isRelevantPrimaryPage,
  isRelevantSubEntityPage,
  type SearchHit,
} from './relevance.js';
import { createPatternExtractor, type SubEntityExtractor } from './sub-entity-patterns.js';

const log = createChildLogger('indexing:content-indexer');

export const MAX_PRIMARY_PAGES = 3;
export const MAX_RELEASE_PAGES = 10;
export const MAX_TRACK_PAGES = 10;
const PRIMARY_SEARCH_LIMIT = 5;
const SUB_ENTITY_SEARCH_LIMIT = 3;

export interface ContentIndexerConfig {
  readonly client: MediaWikiClient;
  readonly extractor?: SubEntityExtractor;
}

export interface ContentIndexer {
  index(entityName: string, entityId?: string): Promise<IndexingResult>;
}

interface SubEntityKind {
  readonly contentType: Exclude<PageContentType, 'profile'>;
  readonly noun: string;
  readonly terms: readonly string[];
  readonly cap: number;
}

const RELEASE_KIND: SubEntityKind = {
  contentType: 'release',
  noun: 'album',
  terms: RELEASE_TERMS,
  cap: MAX_RELEASE_PAGES,
};

const TRACK_KIND: SubEntityKind = {
  contentType: 'track',
  noun: 'song',
  terms: TRACK_TERMS,
  cap: MAX_TRACK_PAGES,
};

export function scoreCoverage(primary: number, releases: number, tracks: number): number {
  let confidence = 0;
  if (primary > 0) confidence += 0.4;
  confidence += Math.min(releases * 0.1, 0.3);
  confidence += Math.min(tracks * 0.05, 0.2);
  if (primary + releases + tracks >= 5) confidence += 0.1;
  return Math.min(Math.round(confidence * 100) / 100, 1);
}

function toIndexedPage(page: ParsedPage, contentType: PageContentType): IndexedPage {
  return {
    pageId: page.pageId,
    title: page.title,
    url: page.url,
    content: page.content,
    wordCount: countWords(page.content),
    categories: page.categories,
    sections: page.sections,
    contentType,
  };
}

export function createContentIndexer(config: ContentIndexerConfig): ContentIndexer {
  const { client } = config;
  const extractor = config.extractor ?? createPatternExtractor();

  async function discoverPrimary(entityName: string): Promise<SearchHit[]> {
    const queries = [
      entityName,
      `${entityName} (musician)`,
      `${entityName} (singer)`,
      `${entityName} (band)`,
    ];
    const found = new Map<number, SearchHit>();
    let failures = 0;
    let lastError: Error | undefined;

    for (const query of queries) {
      if (found.size >= MAX_PRIMARY_PAGES) {
        break;
      }
      try {
        const hits = await client.search(query, PRIMARY_SEARCH_LIMIT);
        for (const hit of hits) {
          if (!found.has(hit.pageId) && isRelevantPrimaryPage(hit, entityName)) {
            found.set(hit.pageId, hit);
          }
        }
      } catch (error) {
        failures++;
        lastError = toError(error);
        log.warn({ query, error: lastError.message }, 'Primary page search failed');
      }
    }

    if (lastError && failures === queries.length) {
      throw lastError;
    }

    return [...found.values()].slice(0, MAX_PRIMARY_PAGES);
  }

  async function extract(pageId: number, contentType: PageContentType): Promise<IndexedPage | undefined> {
    try {
      const parsed = await client.parse(pageId);
      return parsed ? toIndexedPage(parsed, contentType) : undefined;
    } catch (error) {
      log.warn({ pageId, error: toError(error).message }, 'Page extraction failed');
      return undefined;
    }
  }

  async function extractSubEntities(
    names: readonly string[],
    entityName: string,
    kind: SubEntityKind,
    seen: Set<number>,
    into: IndexedPage[],
  ): Promise<void> {
    for (const name of names) {
      if (into.length >= kind.cap) {
        return;
      }
      const queries = [
        `${name} (${entityName} ${kind.noun})`,
        `${name} ${kind.noun}`,
        `${entityName} ${name}`,
      ];

      for (const query of queries) {
        let hits: SearchHit[];
        try {
          hits = await client.search(query, SUB_ENTITY_SEARCH_LIMIT);
        } catch (error) {
          log.warn({ query, error: toError(error).message }, 'Sub-entity search failed');
          continue;
        }

        const hit = hits.find(
          (candidate) => !seen.has(candidate.pageId) && isRelevantSubEntityPage(candidate, name, kind.terms),
        );
        if (!hit) {
          continue;
        }

        const page = await extract(hit.pageId, kind.contentType);
        if (page) {
          seen.add(page.pageId);
          into.push(page);
          break;
        }
      }
    }
  }

  return {
    async index(entityName: string, entityId?: string): Promise<IndexingResult> {
      const name = entityName.trim();
      if (!name) {
        return {
          entityName: '',
          entityId,
          primaryPages: [],
          releasePages: [],
          trackPages: [],
          totalPages: 0,
          confidence: 0,
          status: 'error',
          error: 'Entity name is required',
        };
      }

      const primaryPages: IndexedPage[] = [];
      const releasePages: IndexedPage[] = [];
      const trackPages: IndexedPage[] = [];
      const seen = new Set<number>();

      log.info({ entityName: name, entityId }, 'Indexing entity content');

      try {
        for (const hit of await discoverPrimary(name)) {
          const page = await extract(hit.pageId, 'profile');
          if (page && !seen.has(page.pageId)) {
            seen.add(page.pageId);
            primaryPages.push(page);
          }
        }

        if (primaryPages.length > 0) {
          const releaseNames = extractor.extractReleaseNames(primaryPages);
          log.debug({ releaseNames }, 'Release names discovered');
          await extractSubEntities(releaseNames, name, RELEASE_KIND, seen, releasePages);
        }

        if (releasePages.length > 0) {
          const trackNames = extractor.extractTrackNames(releasePages);
          log.debug({ trackNames }, 'Track names discovered');
          await extractSubEntities(trackNames, name, TRACK_KIND, seen, trackPages);
        }
      } catch (error) {
        const err = toError(error);
        if (primaryPages.length === 0) {
          log.error({ entityName: name, error: err.message }, 'Indexing failed');
          return {
            entityName: name,
            entityId,
            primaryPages: [],
            releasePages: [],
            trackPages: [],
            totalPages: 0,
            confidence: 0,
            status: 'error',
            error: err.message,
          };
        }
        log.warn(
          { entityName: name, error: err.message, collected: primaryPages.length + releasePages.length + trackPages.length },
          'Indexing stopped early, returning collected pages',
        );
      }

      const totalPages = primaryPages.length + releasePages.length + trackPages.length;
      const confidence = scoreCoverage(primaryPages.length, releasePages.length, trackPages.length);

      log.info({ entityName: name, totalPages, confidence }, 'Indexing complete');

      return {
        entityName: name,
        entityId,
        primaryPages,
        releasePages,
        trackPages,
        totalPages,
        confidence,
        status: 'completed',
      };
    },
  };
}
