import { z } from 'zod';
import type { ResourceGateway } from '../../gateway/resource-gateway.js';
import type { SearchHit } from './relevance.js';
import { htmlToText, stripTags } from './html-text.js';

export const DEFAULT_MEDIAWIKI_API = 'https://en.wikipedia.org/w/api.php';
export const DEFAULT_ARTICLE_BASE = 'https://en.wikipedia.org/wiki/';

const SearchResponseSchema = z.object({
  query: z
    .object({
      search: z.array(
        z.object({
          ns: z.number().default(0),
          title: z.string(),
          pageid: z.number(),
          snippet: z.string().default(''),
        }),
      ),
    })
    .optional(),
});

const ParseResponseSchema = z.object({
  parse: z
    .object({
      title: z.string(),
      pageid: z.number(),
      text: z.string().default(''),
      sections: z.array(z.object({ line: z.string() })).default([]),
      categories: z.array(z.object({ category: z.string() })).default([]),
    })
    .optional(),
  error: z.object({ code: z.string(), info: z.string() }).optional(),
});

export interface ParsedPage {
  readonly pageId: number;
  readonly title: string;
  readonly url: string;
  readonly content: string;
  readonly categories: string[];
  readonly sections: string[];
}

export interface MediaWikiClient {
  /** Throws the gateway error when the search cannot be completed. */
  search(query: string, limit: number): Promise<SearchHit[]>;
  /** Undefined when the wiki reports no such page. */
  parse(pageId: number): Promise<ParsedPage | undefined>;
}

export interface MediaWikiClientConfig {
  readonly gateway: ResourceGateway;
  readonly apiUrl?: string;
  readonly articleBaseUrl?: string;
  readonly cacheTtlMs?: number;
}

export function articleUrl(base: string, title: string): string {
  return `${base}${encodeURIComponent(title.replace(/ /g, '_')).replace(/%2F/g, '/')}`;
}

export function createMediaWikiClient(config: MediaWikiClientConfig): MediaWikiClient {
  const apiUrl = config.apiUrl ?? DEFAULT_MEDIAWIKI_API;
  const articleBase = config.articleBaseUrl ?? DEFAULT_ARTICLE_BASE;

  return {
    async search(query: string, limit: number): Promise<SearchHit[]> {
      const result = await config.gateway.fetch({
        url: apiUrl,
        query: {
          action: 'query',
          list: 'search',
          srsearch: query,
          srlimit: limit,
          format: 'json',
          formatversion: 2,
        },
        schema: SearchResponseSchema,
        cacheTtlMs: config.cacheTtlMs,
        label: 'mediawiki:search',
      });
      if (!result.ok) {
        throw result.error;
      }
      return (result.data.query?.search ?? []).map((hit) => ({
        pageId: hit.pageid,
        title: hit.title,
        snippet: hit.snippet,
        namespace: hit.ns,
      }));
    },

    async parse(pageId: number): Promise<ParsedPage | undefined> {
      const result = await config.gateway.fetch({
        url: apiUrl,
        query: {
          action: 'parse',
          pageid: pageId,
          prop: 'text|sections|categories',
          format: 'json',
          formatversion: 2,
        },
        schema: ParseResponseSchema,
        cacheTtlMs: config.cacheTtlMs,
        label: 'mediawiki:parse',
      });
      if (!result.ok) {
        throw result.error;
      }
      const parsed = result.data.parse;
      if (!parsed) {
        return undefined;
      }
      return {
        pageId: parsed.pageid,
        title: parsed.title,
        url: articleUrl(articleBase, parsed.title),
        content: htmlToText(parsed.text),
        categories: parsed.categories.map((c) => c.category.replace(/_/g, ' ')),
        sections: parsed.sections.map((s) => stripTags(s.line)),
      };
    },
  };
}
