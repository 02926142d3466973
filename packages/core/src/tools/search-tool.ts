import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import type { SearchArgs } from './descriptors.js';

const log = createChildLogger('tools:search');

export interface ToolOutcome {
  readonly result: string;
  readonly isError: boolean;
}

export interface SearchTool {
  run(args: SearchArgs): Promise<ToolOutcome>;
}

export function createSearchTool(client: WebSearchClient, maxResults: number): SearchTool {
  return {
    async run(args: SearchArgs): Promise<ToolOutcome> {
      try {
        const hits = await client.search(args.query, maxResults);
        log.debug({ provider: client.provider, query: args.query, hitCount: hits.length }, 'Search complete');
        return { result: JSON.stringify(hits), isError: false };
      } catch (error) {
        const message = toError(error).message;
        log.warn({ provider: client.provider, query: args.query, error: message }, 'Search failed');
        return { result: JSON.stringify([{ error: message }]), isError: true };
      }
    },
  };
}
