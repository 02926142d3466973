import { describe, it, expect, vi, beforeEach } from 'vitest';
import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { ConfigurationError, LlmError } from '@quarry/shared/src/utils/errors.js';
import { createResourceGateway } from '../../gateway/resource-gateway.js';
import { createFakeClock } from '../../test-helpers.js';
import { createMockWebSearchClient } from './mock-web-search-client.js';
import { createGroundedSearchClient, extractGroundedHits } from './web-search-client.js';
import type { WebSearchHit } from './types.js';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

const groundedResponse = {
  text: 'Answer',
  candidates: [
    {
      groundingMetadata: {
        groundingChunks: [
          { web: { uri: 'https://a.example.org', title: 'A' } },
          { web: { uri: 'https://b.example.org' } },
          { web: { uri: 'https://a.example.org', title: 'A again' } },
        ],
        groundingSupports: [
          { segment: { text: 'Fact one.' }, groundingChunkIndices: [0, 2] },
          { segment: { text: 'Fact two.' }, groundingChunkIndices: [1] },
        ],
      },
    },
  ],
};

describe('MockWebSearchClient', () => {
  it('should return default hits for unknown queries', async () => {
    const client = createMockWebSearchClient();
    const hits = await client.search('test query', 10);

    expect(client.provider).toBe('mock');
    expect(hits).toHaveLength(2);
    expect(hits[0].snippet).toContain('Mock web search result');
  });

  it('should return configured hits for known queries', async () => {
    const responses = new Map<string, readonly WebSearchHit[]>();
    responses.set('specific query', [
      { title: 'Specific', link: 'https://specific.example.com', snippet: 'Specific result', source: 'Mock' },
    ]);

    const client = createMockWebSearchClient(responses);
    const hits = await client.search('specific query', 10);

    expect(hits.map((h) => h.link)).toEqual(['https://specific.example.com']);
  });

  it('should honour the result limit', async () => {
    const client = createMockWebSearchClient();

    expect(await client.search('anything', 1)).toHaveLength(1);
  });
});

describe('extractGroundedHits', () => {
  it('should produce one hit per source with its cited segments', () => {
    expect(extractGroundedHits(groundedResponse)).toEqual([
      { title: 'A', link: 'https://a.example.org', snippet: 'Fact one.', source: 'Google Search' },
      {
        title: 'https://b.example.org',
        link: 'https://b.example.org',
        snippet: 'Fact two.',
        source: 'Google Search',
      },
    ]);
  });

  it('should fall back to the answer text when nothing is grounded', () => {
    expect(extractGroundedHits({ text: 'Only text' })).toEqual([
      { title: 'Search summary', link: '', snippet: 'Only text', source: 'Google Search' },
    ]);
    expect(extractGroundedHits({})).toEqual([]);
  });
});

describe('createGroundedSearchClient', () => {
  const gatewayConfig = validateGatewayConfig({ maxRetries: 2, retryDelaySeconds: 1 });

  beforeEach(() => {
    generateContent.mockReset();
  });

  it('should require a project id', () => {
    const gateway = createResourceGateway(gatewayConfig, { clock: createFakeClock() });

    expect(() => createGroundedSearchClient({ projectId: '', location: 'us-central1', gateway })).toThrow(
      ConfigurationError,
    );
  });

  it('should search with google search grounding through the gateway', async () => {
    generateContent.mockResolvedValue(groundedResponse);
    const gateway = createResourceGateway(gatewayConfig, { clock: createFakeClock() });
    const client = createGroundedSearchClient({ projectId: 'test-project', location: 'us-central1', gateway });

    const hits = await client.search('nina simone', 1);

    expect(hits.map((h) => h.link)).toEqual(['https://a.example.org']);
    expect(generateContent).toHaveBeenCalledWith(
      expect.objectContaining({
        config: { tools: [{ googleSearch: {} }], abortSignal: expect.any(AbortSignal) },
      }),
    );
    expect(gateway.usage().lastMinute).toBe(1);
  });

  it('should retry transient failures and then raise an LlmError', async () => {
    generateContent.mockRejectedValue(new Error('503 Service Unavailable'));
    const clock = createFakeClock();
    const gateway = createResourceGateway(gatewayConfig, { clock });
    const client = createGroundedSearchClient({ projectId: 'test-project', location: 'us-central1', gateway });

    await expect(client.search('nina simone', 5)).rejects.toBeInstanceOf(LlmError);
    expect(generateContent).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
  });
});
