import type { ZodError } from 'zod';
import { SchemaValidationError } from '@quarry/shared/src/utils/errors.js';
import type { ResearchRequest } from '@quarry/shared/src/types/research.types.js';
import { GatewayConfigSchema } from './gateway.schema.js';
import type { GatewayConfig } from './gateway.schema.js';
import { ResearchConfigSchema, ResearchRequestSchema } from './research.schema.js';
import type { ResearchConfig } from './research.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateGatewayConfig(data: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid gateway configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateResearchConfig(data: unknown): ResearchConfig {
  const result = ResearchConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateResearchRequest(data: unknown): ResearchRequest {
  const result = ResearchRequestSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research request', formatZodErrors(result.error));
  }

  return result.data;
}
