import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { IndexedPage } from '@quarry/shared/src/types/indexing.types.js';
import type { EntityResolver } from '@quarry/core/src/services/entity-resolution/entity-resolver.js';
import type { ContentIndexer } from '@quarry/core/src/services/content-indexing/content-indexer.js';
import { createRouter, type AppEnv } from '../types.js';
import { EntityIndexRequestSchema, EntitySearchRequestSchema } from '../schemas/requests.js';
import {
  EntitySearchResponseSchema,
  ErrorResponseSchema,
  IndexingResponseSchema,
  type IndexingResponseBody,
} from '../schemas/responses.js';

const searchEntitiesRoute = createRoute({
  method: 'post',
  path: '/search',
  tags: ['Entities'],
  summary: 'Resolve a name to ranked knowledge-graph candidates',
  request: {
    body: {
      content: {
        'application/json': {
          schema: EntitySearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Ranked match candidates',
      content: {
        'application/json': {
          schema: EntitySearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid search input',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const indexEntityRoute = createRoute({
  method: 'post',
  path: '/index',
  tags: ['Entities'],
  summary: 'Discover and extract encyclopedia pages for an entity',
  request: {
    body: {
      content: {
        'application/json': {
          schema: EntityIndexRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Indexing result',
      content: {
        'application/json': {
          schema: IndexingResponseSchema,
        },
      },
    },
  },
});

function copyPage(page: IndexedPage): IndexingResponseBody['primaryPages'][number] {
  return { ...page, categories: [...page.categories], sections: [...page.sections] };
}

export interface EntityRouteDeps {
  readonly entityResolver: EntityResolver;
  readonly contentIndexer: ContentIndexer;
}

export function createEntityRoutes(deps: EntityRouteDeps): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(searchEntitiesRoute, async (c) => {
    const body = c.req.valid('json');
    const response = await deps.entityResolver.search(body.name, body.searchType, body.limit);

    if (response.error) {
      return c.json(
        {
          error: response.error,
          code: 'INVALID_INPUT',
          requestId: c.get('requestId'),
          details: [...response.searchSuggestions],
        },
        400,
      );
    }

    return c.json(
      {
        results: response.results.map((candidate) => ({ ...candidate })),
        totalResults: response.totalResults,
        searchSuggestions: [...response.searchSuggestions],
        searchTerm: response.searchTerm,
        searchType: response.searchType,
      },
      200,
    );
  });

  routes.openapi(indexEntityRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await deps.contentIndexer.index(body.name, body.entityId);

    return c.json(
      {
        entityName: result.entityName,
        entityId: result.entityId,
        primaryPages: result.primaryPages.map(copyPage),
        releasePages: result.releasePages.map(copyPage),
        trackPages: result.trackPages.map(copyPage),
        totalPages: result.totalPages,
        confidence: result.confidence,
        status: result.status,
        error: result.error,
      },
      200,
    );
  });

  return routes;
}
