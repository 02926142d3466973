import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';
import {
  isMockLlmEnabled,
  resolveVertexSettings,
  withTransientRetry,
  type VertexOptions,
} from './transient.js';

const log = createChildLogger('llm:client');

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

/** Model client whose responses are JSON documents. */
export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

function createMockResponse(systemPrompt: string): string {
  const prompt = systemPrompt.toLowerCase();

  if (prompt.includes('satisfaction judge')) {
    return JSON.stringify({
      reasons: [
        'Every required field has a value',
        'The values are specific to the topic',
        'The values are consistent with the gathered sources',
      ],
      isSatisfactory: true,
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request.systemPrompt),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

async function createVertexClient(options: VertexOptions): Promise<LlmClient> {
  const settings = resolveVertexSettings(options);
  if (!settings) {
    throw new ConfigurationError(
      'QUARRY_GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: settings.model,
    location: settings.location,
    temperature: 0,
    authOptions: { projectId: settings.projectId },
    responseMimeType: 'application/json',
  });

  log.info({ projectId: settings.projectId, location: settings.location }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      const systemPrompt = request.jsonSchema
        ? `${request.systemPrompt}\n\nRespond with JSON matching this schema:\n${JSON.stringify(request.jsonSchema)}`
        : request.systemPrompt;

      const response = await withTransientRetry('Vertex AI invocation', () =>
        model.invoke(
          [
            ['system', systemPrompt],
            ['human', request.userMessage],
          ],
          { signal: options.timeoutMs === undefined ? undefined : AbortSignal.timeout(options.timeoutMs) },
        ),
      );

      const rawContent =
        typeof response.content === 'string' ? response.content : JSON.stringify(response.content);

      // Normalise fenced or chatty output; invokeAndValidate re-parses the result.
      const content = JSON.stringify(extractJson(rawContent));

      return {
        content,
        tokenUsage: response.usage_metadata
          ? {
              input: response.usage_metadata.input_tokens,
              output: response.usage_metadata.output_tokens,
            }
          : undefined,
      };
    },
  };
}

export async function createLlmClient(options: VertexOptions = {}): Promise<LlmClient> {
  if (isMockLlmEnabled()) {
    return createMockClient();
  }

  return createVertexClient(options);
}
