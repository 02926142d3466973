import { describe, it, expect, vi } from 'vitest';
import type { ExtractionSchema } from '@quarry/shared/src/types/research.types.js';
import { validateGatewayConfig } from '@quarry/schemas/src/validators.js';
import { createResourceGateway } from '../gateway/resource-gateway.js';
import type { TextLlmClient, TextLlmRequest } from '../llm/text-llm-client.js';
import { createFakeClock } from '../test-helpers.js';
import { createScrapeTool } from './scrape-tool.js';

const extractionSchema: ExtractionSchema = { type: 'object', properties: { genre: { type: 'string' } } };
const page = '<html><body><p>Nina Simone was a singer.</p></body></html>';

function setup(response: () => Response, contentLimit: number = 40_000) {
  const fetchFn = vi.fn().mockImplementation(() => Promise.resolve(response()));
  const gateway = createResourceGateway(validateGatewayConfig({ maxRetries: 1 }), {
    fetchFn,
    clock: createFakeClock(),
  });
  const invoke = vi.fn((_request: TextLlmRequest) => Promise.resolve({ content: '- Singer, jazz and soul' }));
  const textLlm: TextLlmClient = { invoke };
  return { invoke, tool: createScrapeTool({ gateway, textLlm, contentLimit, modelTimeoutMs: 60_000 }) };
}

describe('createScrapeTool', () => {
  it('should return model notes about the cleaned page', async () => {
    const { invoke, tool } = setup(() => new Response(page, { status: 200 }));

    const outcome = await tool.run({ url: 'https://site.example.org/nina' }, extractionSchema);

    expect(outcome).toEqual({ result: '- Singer, jazz and soul', isError: false });
    const prompt = invoke.mock.calls[0][0].systemPrompt;
    expect(prompt).toContain('You just scraped the following website: https://site.example.org/nina');
    expect(prompt).toContain('<Website content>\nNina Simone was a singer.\n</Website content>');
    expect(prompt).toContain('"genre"');
  });

  it('should truncate the page content to the limit', async () => {
    const { invoke, tool } = setup(() => new Response(page, { status: 200 }), 10);

    await tool.run({ url: 'https://site.example.org/nina' }, extractionSchema);

    expect(invoke.mock.calls[0][0].systemPrompt).toContain('<Website content>\nNina Simon\n</Website content>');
  });

  it('should report fetch failures as an error string', async () => {
    const { invoke, tool } = setup(() => new Response('missing', { status: 404 }));

    const outcome = await tool.run({ url: 'https://site.example.org/gone' }, extractionSchema);

    expect(outcome).toEqual({
      result: 'Error scraping website: scrape failed after 1 attempts: HTTP 404: missing',
      isError: true,
    });
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should report model failures as an error string', async () => {
    const fetchFn = vi.fn().mockImplementation(() => Promise.resolve(new Response(page, { status: 200 })));
    const gateway = createResourceGateway(validateGatewayConfig({}), { fetchFn, clock: createFakeClock() });
    const textLlm: TextLlmClient = { invoke: vi.fn().mockRejectedValue(new Error('model down')) };
    const tool = createScrapeTool({ gateway, textLlm, contentLimit: 100, modelTimeoutMs: 60_000 });

    const outcome = await tool.run({ url: 'https://site.example.org/nina' }, extractionSchema);

    expect(outcome).toEqual({ result: 'Error scraping website: model down', isError: true });
  });

  it('should report a note-taking call that never settles as an error string', async () => {
    const fetchFn = vi.fn().mockImplementation(() => Promise.resolve(new Response(page, { status: 200 })));
    const gateway = createResourceGateway(validateGatewayConfig({}), { fetchFn, clock: createFakeClock() });
    const textLlm: TextLlmClient = { invoke: vi.fn(() => new Promise<never>(() => undefined)) };
    const tool = createScrapeTool({ gateway, textLlm, contentLimit: 100, modelTimeoutMs: 20 });

    const outcome = await tool.run({ url: 'https://site.example.org/nina' }, extractionSchema);

    expect(outcome).toEqual({ result: 'Error scraping website: Scrape note-taking timed out after 20 ms', isError: true });
  });
});
