import { z } from 'zod';

export const SearchProviderSchema = z.enum(['tavily', 'grounded', 'music', 'mock']);

export const ReflectionPolicySchema = z.enum(['submission-ends', 'verdict-gated']);

export const ResearchConfigSchema = z.object({
  $schema: z.string().optional(),
  maxLoops: z.number().int().min(1).max(50).default(6),
  maxSearchResults: z.number().int().min(1).max(50).default(10),
  scrapeContentLimit: z.number().int().min(1000).default(40_000),
  reflectionPolicy: ReflectionPolicySchema.default('submission-ends'),
  minInfoLength: z.number().int().min(0).default(10),
  modelTimeoutSeconds: z.number().positive().max(600).default(120),
  searchProvider: SearchProviderSchema.default('tavily'),
  prompt: z.string().min(1).optional(),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;
export type SearchProvider = z.infer<typeof SearchProviderSchema>;

export const ExtractionSchemaSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.unknown()),
    required: z.array(z.string()).optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const ResearchRequestSchema = z.object({
  topic: z.string().trim().min(1),
  extractionSchema: ExtractionSchemaSchema,
});

export type ResearchRequestInput = z.infer<typeof ResearchRequestSchema>;
