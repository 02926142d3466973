import type { GoogleGenAI } from '@google/genai';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@quarry/shared/src/utils/errors.js';
import type { ResourceGateway } from '../../gateway/resource-gateway.js';
import type { WebSearchClient, WebSearchHit } from './types.js';

const log = createChildLogger('web-search:grounded');

const DEFAULT_MODEL = 'gemini-2.0-flash';
const SNIPPET_LIMIT = 500;

export interface GroundedSearchClientConfig {
  readonly projectId: string;
  readonly location: string;
  readonly gateway: ResourceGateway;
  readonly model?: string;
}

interface GroundingChunk {
  readonly web?: {
    readonly uri?: string;
    readonly title?: string;
  };
}

interface GroundingSupport {
  readonly segment?: { readonly text?: string };
  readonly groundingChunkIndices?: readonly number[];
}

interface GroundingMetadata {
  readonly groundingChunks?: readonly GroundingChunk[];
  readonly groundingSupports?: readonly GroundingSupport[];
}

interface GenAiCandidate {
  readonly groundingMetadata?: GroundingMetadata;
}

export interface GenAiResponse {
  readonly text?: string;
  readonly candidates?: readonly GenAiCandidate[];
}

/**
 * One hit per distinct grounding source, with the answer segments that cite
 * it as the snippet.
 */
export function extractGroundedHits(response: GenAiResponse): WebSearchHit[] {
  const hits = new Map<string, { title: string; segments: string[] }>();

  for (const candidate of response.candidates ?? []) {
    const byIndex: string[] = [];
    const chunks = candidate.groundingMetadata?.groundingChunks ?? [];
    chunks.forEach((chunk, index) => {
      const uri = chunk.web?.uri;
      if (!uri) {
        return;
      }
      byIndex[index] = uri;
      if (!hits.has(uri)) {
        hits.set(uri, { title: chunk.web?.title ?? uri, segments: [] });
      }
    });

    for (const support of candidate.groundingMetadata?.groundingSupports ?? []) {
      const text = support.segment?.text;
      if (!text) {
        continue;
      }
      for (const index of support.groundingChunkIndices ?? []) {
        const uri = byIndex[index];
        const hit = uri === undefined ? undefined : hits.get(uri);
        if (hit && !hit.segments.includes(text)) {
          hit.segments.push(text);
        }
      }
    }
  }

  if (hits.size === 0 && response.text) {
    return [
      {
        title: 'Search summary',
        link: '',
        snippet: response.text.slice(0, SNIPPET_LIMIT),
        source: 'Google Search',
      },
    ];
  }

  return [...hits.entries()].map(([link, hit]) => ({
    title: hit.title,
    link,
    snippet: hit.segments.join(' ').slice(0, SNIPPET_LIMIT),
    source: 'Google Search',
  }));
}

export function createGroundedSearchClient(config: GroundedSearchClientConfig): WebSearchClient {
  const { projectId, location, gateway } = config;
  const model = config.model ?? DEFAULT_MODEL;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for the grounded search client');
  }

  log.info({ projectId, location, model }, 'Creating grounded search client');

  let client: GoogleGenAI | undefined;

  async function getClient(): Promise<GoogleGenAI> {
    if (!client) {
      const { GoogleGenAI } = await import('@google/genai');
      client = new GoogleGenAI({ vertexai: true, project: projectId, location });
    }
    return client;
  }

  return {
    provider: 'grounded',

    async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
      log.debug({ query }, 'Executing grounded search');
      const genai = await getClient();

      const result = await gateway.execute('grounded search', async (signal) => {
        const response = await genai.models.generateContent({
          model,
          contents: `Search the web and summarize what the sources say about:\n${query}`,
          config: {
            tools: [{ googleSearch: {} }],
            abortSignal: signal,
          },
        });
        return extractGroundedHits(response);
      });

      if (!result.ok) {
        throw new LlmError(`Web search failed: ${result.error.message}`, true, result.error);
      }

      log.debug({ query, hitCount: result.data.length }, 'Grounded search completed');
      return result.data.slice(0, maxResults);
    },
  };
}
