import type { BaseMessage } from '@langchain/core/messages';
import { AIMessage, HumanMessage, SystemMessage, ToolMessage } from '@langchain/core/messages';
import type { ResearchMessage, ToolCallRequest } from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import {
  isMockLlmEnabled,
  resolveVertexSettings,
  withTransientRetry,
  type VertexOptions,
} from './transient.js';

const log = createChildLogger('llm:research-model');

/** A function the model may call; parameters are a JSON Schema object. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

export interface ResearchModelRequest {
  readonly systemPrompt: string;
  readonly messages: readonly ResearchMessage[];
  readonly tools: readonly ToolDescriptor[];
}

export type ResearchModelReply =
  | { readonly kind: 'tool_calls'; readonly calls: readonly ToolCallRequest[]; readonly text: string }
  | { readonly kind: 'text'; readonly content: string };

/** Tool-calling chat model; implementations force a tool choice. */
export interface ResearchModel {
  invoke(request: ResearchModelRequest): Promise<ResearchModelReply>;
}

export function toLangChainMessages(systemPrompt: string, messages: readonly ResearchMessage[]): BaseMessage[] {
  const converted: BaseMessage[] = [new SystemMessage(systemPrompt)];
  for (const message of messages) {
    switch (message.role) {
      case 'human':
        converted.push(new HumanMessage(message.content));
        break;
      case 'model':
        converted.push(
          new AIMessage({
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              name: call.name,
              args: call.args,
              type: 'tool_call' as const,
            })),
          }),
        );
        break;
      case 'tool':
        converted.push(
          new ToolMessage({
            content: message.record.result,
            tool_call_id: message.record.callId,
            name: message.record.toolName,
          }),
        );
        break;
    }
  }
  return converted;
}

export function textOf(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  return content
    .map((part: unknown) =>
      typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string'
        ? part.text
        : '',
    )
    .join('');
}

function placeholderFor(schema: unknown): unknown {
  if (typeof schema !== 'object' || schema === null || !('type' in schema)) {
    return null;
  }
  switch (schema.type) {
    case 'string':
      return 'mock value';
    case 'number':
    case 'integer':
      return 0;
    case 'boolean':
      return false;
    case 'array':
      return [];
    default:
      return null;
  }
}

/**
 * Searches once for the topic, then submits placeholder values for every
 * property of the submit tool's schema.
 */
export function createMockResearchModel(submitToolName: string = 'Info'): ResearchModel {
  log.info('Using mock research model');

  return {
    invoke(request: ResearchModelRequest): Promise<ResearchModelReply> {
      const pass = request.messages.filter((m) => m.role === 'model').length;
      const firstHuman = request.messages.find((m) => m.role === 'human');
      const topic = firstHuman?.role === 'human' ? firstHuman.content : 'research topic';

      if (pass === 0) {
        return Promise.resolve({
          kind: 'tool_calls',
          text: '',
          calls: [{ id: 'mock-call-0', name: 'search', args: { query: topic } }],
        });
      }

      const submit = request.tools.find((tool) => tool.name === submitToolName);
      const properties = submit?.parameters['properties'];
      const args: Record<string, unknown> = {};
      if (typeof properties === 'object' && properties !== null) {
        for (const [key, schema] of Object.entries(properties)) {
          args[key] = placeholderFor(schema);
        }
      }

      return Promise.resolve({
        kind: 'tool_calls',
        text: '',
        calls: [{ id: `mock-call-${String(pass)}`, name: submitToolName, args }],
      });
    },
  };
}

async function createVertexResearchModel(options: VertexOptions): Promise<ResearchModel> {
  const settings = resolveVertexSettings(options);
  if (!settings) {
    throw new ConfigurationError(
      'QUARRY_GCP_PROJECT_ID environment variable is required for the Vertex AI research model',
    );
  }

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: settings.model,
    location: settings.location,
    temperature: 0,
    authOptions: { projectId: settings.projectId },
  });

  log.info({ projectId: settings.projectId, location: settings.location }, 'Using Vertex AI research model');

  let callCounter = 0;

  return {
    async invoke(request: ResearchModelRequest): Promise<ResearchModelReply> {
      const bound = model.bindTools(
        request.tools.map((tool) => ({
          type: 'function' as const,
          function: { name: tool.name, description: tool.description, parameters: tool.parameters },
        })),
        { tool_choice: 'any' },
      );

      const response = await withTransientRetry('Vertex AI research invocation', () =>
        bound.invoke(toLangChainMessages(request.systemPrompt, request.messages), {
          signal: options.timeoutMs === undefined ? undefined : AbortSignal.timeout(options.timeoutMs),
        }),
      );

      const text = textOf(response.content);
      const toolCalls = response.tool_calls ?? [];

      log.debug({ toolCalls: toolCalls.map((c) => c.name) }, 'Research model replied');

      if (toolCalls.length === 0) {
        return { kind: 'text', content: text };
      }

      return {
        kind: 'tool_calls',
        text,
        calls: toolCalls.map((call) => ({
          id: call.id ?? `call-${String(callCounter++)}`,
          name: call.name,
          args: call.args,
        })),
      };
    },
  };
}

export async function createResearchModel(options: VertexOptions = {}): Promise<ResearchModel> {
  if (isMockLlmEnabled()) {
    return createMockResearchModel();
  }

  return createVertexResearchModel(options);
}
