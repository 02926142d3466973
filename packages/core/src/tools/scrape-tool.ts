import { z } from 'zod';
import type { ExtractionSchema } from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { ResourceGateway } from '../gateway/resource-gateway.js';
import type { TextLlmClient } from '../llm/text-llm-client.js';
import { withTimeout } from '../llm/transient.js';
import { htmlToText } from '../services/content-indexing/html-text.js';
import type { ScrapeArgs } from './descriptors.js';
import type { ToolOutcome } from './search-tool.js';

const log = createChildLogger('tools:scrape');

export interface ScrapeToolConfig {
  readonly gateway: ResourceGateway;
  readonly textLlm: TextLlmClient;
  readonly contentLimit: number;
  readonly modelTimeoutMs: number;
  readonly cacheTtlMs?: number;
}

export interface ScrapeTool {
  run(args: ScrapeArgs, extractionSchema: ExtractionSchema): Promise<ToolOutcome>;
}

export function buildScrapePrompt(extractionSchema: ExtractionSchema, url: string, content: string): string {
  return `You are doing web research on behalf of a user. You are trying to find out this information:

<info>
${JSON.stringify(extractionSchema, null, 2)}
</info>

You just scraped the following website: ${url}

Based on the website content below, jot down some notes about the website.

<Website content>
${content}
</Website content>`;
}

function scrapeError(reason: string): ToolOutcome {
  return { result: `Error scraping website: ${reason}`, isError: true };
}

export function createScrapeTool(config: ScrapeToolConfig): ScrapeTool {
  return {
    async run(args: ScrapeArgs, extractionSchema: ExtractionSchema): Promise<ToolOutcome> {
      const page = await config.gateway.fetch({
        url: args.url,
        responseType: 'text',
        schema: z.string(),
        cacheTtlMs: config.cacheTtlMs,
        label: 'scrape',
      });

      if (!page.ok) {
        log.warn({ url: args.url, error: page.error.message }, 'Scrape fetch failed');
        return scrapeError(page.error.message);
      }

      try {
        const content = htmlToText(page.data).slice(0, config.contentLimit);
        const response = await withTimeout(
          'Scrape note-taking',
          config.textLlm.invoke({
            systemPrompt: buildScrapePrompt(extractionSchema, args.url, content),
            userMessage: 'Write the notes now.',
          }),
          config.modelTimeoutMs,
        );
        log.debug({ url: args.url, contentLength: content.length }, 'Scrape notes written');
        return { result: response.content, isError: false };
      } catch (error) {
        const message = toError(error).message;
        log.warn({ url: args.url, error: message }, 'Scrape failed after fetch');
        return scrapeError(message);
      }
    },
  };
}
