import type { z } from 'zod';
import type {
  ExtractionSchema,
  ToolCallRecord,
  ToolCallRequest,
  ToolKind,
} from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { formatZodErrors } from '@quarry/schemas/src/validators.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { ToolDescriptor } from '../llm/research-model.js';
import {
  ScrapeArgsSchema,
  SearchArgsSchema,
  buildToolDescriptors,
  createToolKindLookup,
} from './descriptors.js';
import type { ScrapeTool } from './scrape-tool.js';
import type { SearchTool, ToolOutcome } from './search-tool.js';

const log = createChildLogger('tools:invoker');

export interface ToolInvokerConfig {
  readonly search: SearchTool;
  readonly scrape: ScrapeTool;
  readonly extractionSchema: ExtractionSchema;
}

/** Per-session tool surface. Never throws: failures become error records. */
export interface ToolInvoker {
  readonly descriptors: readonly ToolDescriptor[];
  kindOf(name: string): ToolKind | undefined;
  invoke(call: ToolCallRequest): Promise<ToolCallRecord>;
}

function parseArgs<T>(schema: z.ZodType<T>, toolName: string, args: unknown): { ok: true; data: T } | { ok: false; outcome: ToolOutcome } {
  const result = schema.safeParse(args);
  if (result.success) {
    return { ok: true, data: result.data };
  }
  return {
    ok: false,
    outcome: {
      result: `Invalid arguments for ${toolName}: ${formatZodErrors(result.error).join('; ')}`,
      isError: true,
    },
  };
}

export function createToolInvoker(config: ToolInvokerConfig): ToolInvoker {
  const descriptors = buildToolDescriptors(config.extractionSchema);
  const kindOf = createToolKindLookup(descriptors);

  async function dispatch(call: ToolCallRequest): Promise<ToolOutcome> {
    switch (kindOf(call.name)) {
      case 'search': {
        const parsed = parseArgs(SearchArgsSchema, call.name, call.args);
        return parsed.ok ? config.search.run(parsed.data) : parsed.outcome;
      }
      case 'scrape': {
        const parsed = parseArgs(ScrapeArgsSchema, call.name, call.args);
        return parsed.ok ? config.scrape.run(parsed.data, config.extractionSchema) : parsed.outcome;
      }
      case 'submit':
        return { result: `${call.name} is handled by the research loop, not invoked`, isError: true };
      case undefined:
        return { result: `Unknown tool: ${call.name}`, isError: true };
    }
  }

  async function dispatchSafely(call: ToolCallRequest): Promise<ToolOutcome> {
    try {
      return await dispatch(call);
    } catch (error) {
      const message = toError(error).message;
      log.warn({ toolName: call.name, callId: call.id, error: message }, 'Tool threw, recording as error result');
      switch (kindOf(call.name)) {
        case 'search':
          return { result: JSON.stringify([{ error: message }]), isError: true };
        case 'scrape':
          return { result: `Error scraping website: ${message}`, isError: true };
        default:
          return { result: `${call.name} failed: ${message}`, isError: true };
      }
    }
  }

  return {
    descriptors,
    kindOf,

    async invoke(call: ToolCallRequest): Promise<ToolCallRecord> {
      const outcome = await dispatchSafely(call);
      log.debug({ toolName: call.name, callId: call.id, isError: outcome.isError }, 'Tool invoked');
      return {
        callId: call.id,
        toolName: call.name,
        args: call.args,
        result: outcome.result,
        isError: outcome.isError,
      };
    },
  };
}
