import { z } from '@hono/zod-openapi';
import { ExtractionSchemaSchema } from '@quarry/schemas/src/research.schema.js';

export const ResearchRequestBodySchema = z
  .object({
    topic: z.string().trim().min(1).openapi({ example: 'Nina Simone' }),
    extractionSchema: ExtractionSchemaSchema.openapi({
      example: {
        type: 'object',
        properties: { genre: { type: 'string' }, birthYear: { type: 'integer' } },
        required: ['genre'],
      },
    }),
  })
  .openapi('ResearchRequest');

export type ResearchRequestBody = z.infer<typeof ResearchRequestBodySchema>;

export const EntitySearchRequestSchema = z
  .object({
    name: z.string().trim().min(1).openapi({ example: 'Nina Simone' }),
    searchType: z.enum(['name', 'genre', 'era', 'country']).default('name'),
    limit: z.number().int().min(1).max(10).default(10),
  })
  .openapi('EntitySearchRequest');

export const EntityIndexRequestSchema = z
  .object({
    name: z.string().trim().min(1).openapi({ example: 'Nina Simone' }),
    entityId: z.string().regex(/^Q\d+$/).optional().openapi({ example: 'Q1453' }),
  })
  .openapi('EntityIndexRequest');
