import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    gateway: z.object({
      lastMinute: z.number().int(),
      lastHour: z.number().int(),
    }),
  })
  .openapi('HealthResponse');

// Research
const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
});

export const ResearchMessageSchema = z
  .discriminatedUnion('role', [
    z.object({ role: z.literal('human'), content: z.string() }),
    z.object({ role: z.literal('model'), content: z.string(), toolCalls: z.array(ToolCallSchema) }),
    z.object({
      role: z.literal('tool'),
      callId: z.string(),
      toolName: z.string(),
      args: z.record(z.unknown()),
      result: z.string(),
      isError: z.boolean(),
    }),
  ])
  .openapi('ResearchMessage');

export type ResearchMessageBody = z.infer<typeof ResearchMessageSchema>;

export const ResearchResponseSchema = z
  .object({
    topic: z.string(),
    info: z.record(z.unknown()).nullable(),
    iterations: z.number().int(),
    status: z.enum(['submitted', 'exhausted']),
    verdict: z
      .object({
        isSatisfactory: z.boolean(),
        reasons: z.array(z.string()),
        improvementInstructions: z.string().optional(),
      })
      .optional(),
    messages: z.array(ResearchMessageSchema),
  })
  .openapi('ResearchResponse');

export type ResearchResponse = z.infer<typeof ResearchResponseSchema>;

// Entities
export const MatchCandidateSchema = z
  .object({
    entityId: z.string(),
    name: z.string(),
    description: z.string(),
    country: z.string(),
    imageUrl: z.string(),
    birthYear: z.string(),
    deathYear: z.string(),
    confidence: z.number(),
    matchTier: z.enum(['exact', 'fuzzy', 'partial']),
  })
  .openapi('MatchCandidate');

export const EntitySearchResponseSchema = z
  .object({
    results: z.array(MatchCandidateSchema),
    totalResults: z.number().int(),
    searchSuggestions: z.array(z.string()),
    searchTerm: z.string(),
    searchType: z.enum(['name', 'genre', 'era', 'country']),
  })
  .openapi('EntitySearchResponse');

export type EntitySearchResponseBody = z.infer<typeof EntitySearchResponseSchema>;

export const IndexedPageSchema = z
  .object({
    pageId: z.number().int(),
    title: z.string(),
    url: z.string(),
    content: z.string(),
    wordCount: z.number().int(),
    categories: z.array(z.string()),
    sections: z.array(z.string()),
    contentType: z.enum(['profile', 'release', 'track']),
  })
  .openapi('IndexedPage');

export const IndexingResponseSchema = z
  .object({
    entityName: z.string(),
    entityId: z.string().optional(),
    primaryPages: z.array(IndexedPageSchema),
    releasePages: z.array(IndexedPageSchema),
    trackPages: z.array(IndexedPageSchema),
    totalPages: z.number().int(),
    confidence: z.number(),
    status: z.enum(['completed', 'error']),
    error: z.string().optional(),
  })
  .openapi('IndexingResponse');

export type IndexingResponseBody = z.infer<typeof IndexingResponseSchema>;
