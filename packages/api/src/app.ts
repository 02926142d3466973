import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ResearchRuntime } from '@quarry/core/src/infrastructure/research-runtime.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, createHealthRoutes } from './routes/health.js';
import { createResearchRoutes } from './routes/research.js';
import { createEntityRoutes } from './routes/entities.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';

const log = createChildLogger('api:server');

export type AppDeps = Pick<ResearchRuntime, 'agent' | 'entityResolver' | 'contentIndexer' | 'gateway'>;

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(deps.gateway));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Quarry API',
        version: API_VERSION,
        description: 'Schema-driven research agent with entity resolution and content indexing',
      },
    });
    return c.json(spec);
  });

  app.route('/research', createResearchRoutes(deps.agent));
  app.route('/entities', createEntityRoutes(deps));

  return app;
}
