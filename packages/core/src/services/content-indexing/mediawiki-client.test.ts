import { describe, it, expect, vi } from 'vitest';
import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { TransportError } from '@quarry/shared/src/utils/errors.js';
import { createResourceGateway } from '../../gateway/resource-gateway.js';
import { createFakeClock, jsonResponse } from '../../test-helpers.js';
import { articleUrl, createMediaWikiClient } from './mediawiki-client.js';

function setup(response: () => Response) {
  const fetchFn = vi.fn().mockImplementation(() => Promise.resolve(response()));
  const gateway = createResourceGateway(
    validateGatewayConfig({ requestsPerMinute: 100, requestsPerHour: 1000, maxRetries: 1 }),
    { fetchFn, clock: createFakeClock() },
  );
  return { fetchFn, client: createMediaWikiClient({ gateway }) };
}

describe('articleUrl', () => {
  it('should underscore spaces and keep slashes', () => {
    expect(articleUrl('https://en.wikipedia.org/wiki/', 'AC/DC (band)')).toBe(
      'https://en.wikipedia.org/wiki/AC/DC_(band)',
    );
  });
});

describe('createMediaWikiClient', () => {
  it('should map search hits', async () => {
    const { fetchFn, client } = setup(() =>
      jsonResponse({
        query: { search: [{ ns: 0, title: 'Nina Simone', pageid: 1, snippet: 'American singer' }] },
      }),
    );

    const hits = await client.search('Nina Simone', 5);

    expect(hits).toEqual([{ pageId: 1, title: 'Nina Simone', snippet: 'American singer', namespace: 0 }]);
    const url = new URL(String(fetchFn.mock.calls[0][0]));
    expect(url.searchParams.get('srsearch')).toBe('Nina Simone');
    expect(url.searchParams.get('srlimit')).toBe('5');
    expect(url.searchParams.get('formatversion')).toBe('2');
  });

  it('should return no hits when the query block is missing', async () => {
    const { client } = setup(() => jsonResponse({ batchcomplete: true }));

    expect(await client.search('nothing', 5)).toEqual([]);
  });

  it('should clean parsed pages', async () => {
    const { client } = setup(() =>
      jsonResponse({
        parse: {
          title: 'Nina Simone',
          pageid: 1,
          text: '<p>Jazz &amp; soul</p>',
          sections: [{ line: '<i>Early</i> life' }],
          categories: [{ category: 'American_jazz_singers' }],
        },
      }),
    );

    const page = await client.parse(1);

    expect(page).toEqual({
      pageId: 1,
      title: 'Nina Simone',
      url: 'https://en.wikipedia.org/wiki/Nina_Simone',
      content: 'Jazz & soul',
      categories: ['American jazz singers'],
      sections: ['Early life'],
    });
  });

  it('should return undefined for a missing page', async () => {
    const { client } = setup(() =>
      jsonResponse({ error: { code: 'nosuchpageid', info: 'There is no page with ID 9.' } }),
    );

    expect(await client.parse(9)).toBeUndefined();
  });

  it('should throw the gateway error when the wiki is unreachable', async () => {
    const { client } = setup(() => new Response('down', { status: 503 }));

    await expect(client.search('Nina Simone', 5)).rejects.toBeInstanceOf(TransportError);
  });
});
