import type { z } from 'zod';
import { formatZodErrors } from '@quarry/schemas/src/validators.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { AgentError, toError } from '@quarry/shared/src/utils/errors.js';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_RETRIES = 1;

export interface InvokeAndValidateOptions<T extends z.ZodTypeAny> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: T;
  readonly agentName: string;
  readonly maxRetries?: number;
}

type Validation<T> = { readonly ok: true; readonly data: T } | { readonly ok: false; readonly errors: readonly string[] };

function validateOutput<T extends z.ZodTypeAny>(schema: T, content: string): Validation<z.infer<T>> {
  let parsed: unknown;
  try {
    parsed = extractJson(content);
  } catch (error) {
    return { ok: false, errors: [`Failed to parse JSON: ${toError(error).message}`] };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, errors: formatZodErrors(result.error) };
  }
  // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment
  return { ok: true, data: result.data };
}

export function buildCorrectionMessage(userMessage: string, errors: readonly string[]): string {
  return `${userMessage}\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${errors.map((e) => `- ${e}`).join('\n')}`;
}

/**
 * Invokes the model and validates its JSON against the schema, re-prompting
 * with the validation errors. Model failures propagate unchanged.
 */
export async function invokeAndValidate<T extends z.ZodTypeAny>(
  options: InvokeAndValidateOptions<T>,
): Promise<z.infer<T>> {
  const { llmClient, request, schema, agentName, maxRetries = DEFAULT_MAX_RETRIES } = options;

  let errors: readonly string[] = [];

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    const response = await llmClient.invoke(
      attempt === 1 ? request : { ...request, userMessage: buildCorrectionMessage(request.userMessage, errors) },
    );

    const validation = validateOutput(schema, response.content);
    if (validation.ok) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-return
      return validation.data;
    }

    errors = validation.errors;
    log.warn({ agentName, attempt, errors }, 'Model output rejected, retrying with correction');
  }

  throw new AgentError(
    `${agentName} returned invalid output after ${String(maxRetries + 1)} attempts: ${errors.join(', ')}`,
  );
}
