import { describe, it, expect, vi } from 'vitest';
import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { ConfigurationError, TransportError } from '@quarry/shared/src/utils/errors.js';
import { createResourceGateway } from '../../gateway/resource-gateway.js';
import { createFakeClock, jsonResponse } from '../../test-helpers.js';
import { createTavilySearchClient } from './tavily-search-client.js';

function setup(response: () => Response) {
  const fetchFn = vi.fn().mockImplementation(() => Promise.resolve(response()));
  const gateway = createResourceGateway(validateGatewayConfig({ maxRetries: 1 }), {
    fetchFn,
    clock: createFakeClock(),
  });
  return { fetchFn, client: createTavilySearchClient({ apiKey: 'test-secret', gateway }) };
}

describe('createTavilySearchClient', () => {
  it('should require an api key', () => {
    const gateway = createResourceGateway(validateGatewayConfig({}), { clock: createFakeClock() });

    expect(() => createTavilySearchClient({ apiKey: '', gateway })).toThrow(ConfigurationError);
  });

  it('should post the query and map results', async () => {
    const { fetchFn, client } = setup(() =>
      jsonResponse({
        query: 'nina simone',
        results: [{ title: 'Nina Simone', url: 'https://t.example.org/nina', content: 'Singer', score: 0.9 }],
      }),
    );

    const hits = await client.search('nina simone', 3);

    expect(hits).toEqual([
      { title: 'Nina Simone', link: 'https://t.example.org/nina', snippet: 'Singer', source: 'Tavily' },
    ]);
    const init: RequestInit = fetchFn.mock.calls[0][1];
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      query: 'nina simone',
      max_results: 3,
      search_depth: 'basic',
    });
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
  });

  it('should throw the gateway error on failure', async () => {
    const { client } = setup(() => new Response('unauthorized', { status: 401 }));

    await expect(client.search('nina simone', 3)).rejects.toBeInstanceOf(TransportError);
  });
});
