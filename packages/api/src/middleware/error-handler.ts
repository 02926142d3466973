import type { Context } from 'hono';
import { ZodError } from 'zod';
import {
  AgentError,
  ConfigurationError,
  InvalidInputError,
  LlmError,
  SchemaValidationError,
  TransportError,
  UpstreamQueryError,
} from '@quarry/shared/src/utils/errors.js';
import { formatZodErrors } from '@quarry/schemas/src/validators.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: formatZodErrors(err),
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof InvalidInputError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof TransportError || err instanceof UpstreamQueryError) {
    log.error({ requestId, error: err.message }, 'Upstream service error');
    const body: ErrorResponse = {
      error: 'Upstream service request failed',
      code: err.code,
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof AgentError || err instanceof ConfigurationError) {
    log.error({ requestId, error: err.message, code: err.code }, 'Research service error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: err.code,
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
