import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ExtractionSchema, ToolKind } from '@quarry/shared/src/types/research.types.js';
import type { ToolDescriptor } from '../llm/research-model.js';

export const SEARCH_TOOL_NAME = 'search';
export const SCRAPE_TOOL_NAME = 'scrape';
export const SUBMIT_TOOL_NAME = 'Info';

export const SearchArgsSchema = z.object({
  query: z.string().trim().min(1).describe('The search query. Include enough context for high recall.'),
});

export type SearchArgs = z.infer<typeof SearchArgsSchema>;

export const ScrapeArgsSchema = z.object({
  url: z.string().url().describe('Absolute URL of the page to read.'),
});

export type ScrapeArgs = z.infer<typeof ScrapeArgsSchema>;

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  return { ...zodToJsonSchema(schema, { target: 'openApi3', $refStrategy: 'none' }) };
}

export function buildToolDescriptors(extractionSchema: ExtractionSchema): ToolDescriptor[] {
  return [
    {
      name: SEARCH_TOOL_NAME,
      description:
        'Query a web search engine. Useful for finding pages about the topic and for answering questions about current events.',
      parameters: toParameters(SearchArgsSchema),
    },
    {
      name: SCRAPE_TOOL_NAME,
      description: 'Fetch a web page and return notes about it tailored to the information being collected.',
      parameters: toParameters(ScrapeArgsSchema),
    },
    {
      name: SUBMIT_TOOL_NAME,
      description: 'Call this when you have gathered all the relevant info. The arguments are the final answer.',
      parameters: { ...extractionSchema },
    },
  ];
}

const KIND_BY_NAME: ReadonlyMap<string, ToolKind> = new Map<string, ToolKind>([
  [SEARCH_TOOL_NAME, 'search'],
  [SCRAPE_TOOL_NAME, 'scrape'],
  [SUBMIT_TOOL_NAME, 'submit'],
]);

/** Closed lookup from model-supplied tool names to the tools this session offers. */
export function createToolKindLookup(descriptors: readonly ToolDescriptor[]): (name: string) => ToolKind | undefined {
  const offered = new Map<string, ToolKind>();
  for (const descriptor of descriptors) {
    const kind = KIND_BY_NAME.get(descriptor.name);
    if (kind) {
      offered.set(descriptor.name, kind);
    }
  }
  return (name) => offered.get(name);
}
