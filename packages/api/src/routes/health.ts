import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ResourceGateway } from '@quarry/core/src/gateway/resource-gateway.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

export const API_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check with current gateway request counts',
  responses: {
    200: {
      description: 'Service is healthy',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(gateway: Pick<ResourceGateway, 'usage'>): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(healthRoute, (c) => {
    const usage = gateway.usage();
    return c.json(
      {
        status: 'ok',
        version: API_VERSION,
        gateway: { lastMinute: usage.lastMinute, lastHour: usage.lastHour },
      },
      200,
    );
  });

  return routes;
}
