import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import {
  isMockLlmEnabled,
  resolveVertexSettings,
  withTransientRetry,
  type VertexOptions,
} from './transient.js';

const log = createChildLogger('llm:text-client');

export interface TextLlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export interface TextLlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface TextLlmClient {
  invoke(request: TextLlmRequest): Promise<TextLlmResponse>;
}

function createMockTextClient(): TextLlmClient {
  log.info('Using mock text LLM client');

  return {
    invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock text LLM invocation');

      return Promise.resolve({
        content: '- Mock notes: the page mentions the research topic.\n',
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

async function createVertexTextClient(options: VertexOptions): Promise<TextLlmClient> {
  const settings = resolveVertexSettings(options);
  if (!settings) {
    throw new ConfigurationError(
      'QUARRY_GCP_PROJECT_ID environment variable is required for Vertex AI text LLM client',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: settings.model,
    location: settings.location,
    temperature: 0.1,
    authOptions: { projectId: settings.projectId },
    responseMimeType: 'text/plain',
  });

  log.info(
    { projectId: settings.projectId, location: settings.location },
    'Using Vertex AI text LLM client',
  );

  return {
    async invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug(
        { systemPromptLength: request.systemPrompt.length },
        'Vertex AI text LLM invocation',
      );

      const response = await withTransientRetry('Vertex AI text invocation', () =>
        model.invoke(
          [
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ],
          { signal: options.timeoutMs === undefined ? undefined : AbortSignal.timeout(options.timeoutMs) },
        ),
      );

      const content =
        typeof response.content === 'string' ? response.content : JSON.stringify(response.content);

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

export async function createTextLlmClient(options: VertexOptions = {}): Promise<TextLlmClient> {
  if (isMockLlmEnabled()) {
    return createMockTextClient();
  }

  return createVertexTextClient(options);
}
