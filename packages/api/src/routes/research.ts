import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ResearchMessage, ResearchResult } from '@quarry/shared/src/types/research.types.js';
import type { ResearchAgent } from '@quarry/core/src/orchestration/research-agent.js';
import { createRouter, type AppEnv } from '../types.js';
import { ResearchRequestBodySchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ResearchResponseSchema,
  type ResearchMessageBody,
  type ResearchResponse,
} from '../schemas/responses.js';

const runResearchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Research'],
  summary: 'Run a research session that fills the extraction schema for a topic',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ResearchRequestBodySchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Finished research session',
      content: {
        'application/json': {
          schema: ResearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

function toMessageBody(message: ResearchMessage): ResearchMessageBody {
  switch (message.role) {
    case 'human':
      return { role: 'human', content: message.content };
    case 'model':
      return {
        role: 'model',
        content: message.content,
        toolCalls: message.toolCalls.map((call) => ({ id: call.id, name: call.name, args: call.args })),
      };
    case 'tool':
      return { role: 'tool', ...message.record };
  }
}

export function toResearchResponse(result: ResearchResult): ResearchResponse {
  return {
    topic: result.topic,
    info: result.info,
    iterations: result.iterations,
    status: result.status,
    verdict: result.verdict
      ? {
          isSatisfactory: result.verdict.isSatisfactory,
          reasons: [...result.verdict.reasons],
          improvementInstructions: result.verdict.improvementInstructions,
        }
      : undefined,
    messages: result.messages.map(toMessageBody),
  };
}

export function createResearchRoutes(agent: ResearchAgent): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(runResearchRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await agent.run({ topic: body.topic, extractionSchema: body.extractionSchema });
    return c.json(toResearchResponse(result), 200);
  });

  return routes;
}
