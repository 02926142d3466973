import { describe, it, expect, vi } from 'vitest';
import type { ResearchResult } from '@quarry/shared/src/types/research.types.js';
import { createApp } from '../app.js';
import { createStubDeps, jsonPost } from '../test-helpers.js';
import { toResearchResponse } from './research.js';

const extractionSchema = { type: 'object', properties: { genre: { type: 'string' } } } as const;

const finished: ResearchResult = {
  topic: 'Nina Simone',
  info: { genre: 'jazz' },
  iterations: 3,
  status: 'submitted',
  verdict: { isSatisfactory: true, reasons: ['a', 'b', 'c'] },
  messages: [
    { role: 'human', content: 'Nina Simone' },
    { role: 'model', content: '', toolCalls: [{ id: 'c1', name: 'search', args: { query: 'Nina Simone' } }] },
    {
      role: 'tool',
      record: { callId: 'c1', toolName: 'search', args: { query: 'Nina Simone' }, result: '[]', isError: false },
    },
  ],
};

describe('toResearchResponse', () => {
  it('should flatten tool records into the message list', () => {
    expect(toResearchResponse(finished).messages[2]).toEqual({
      role: 'tool',
      callId: 'c1',
      toolName: 'search',
      args: { query: 'Nina Simone' },
      result: '[]',
      isError: false,
    });
  });
});

describe('POST /research', () => {
  it('should run the agent and return its result', async () => {
    const deps = createStubDeps();
    vi.mocked(deps.agent.run).mockResolvedValue(finished);
    const app = createApp(deps);

    const res = await app.request('/research', jsonPost({ topic: ' Nina Simone ', extractionSchema }));

    expect(res.status).toBe(200);
    expect(deps.agent.run).toHaveBeenCalledWith({ topic: 'Nina Simone', extractionSchema });
    const body = (await res.json()) as Record<string, unknown>;
    expect(body['info']).toEqual({ genre: 'jazz' });
    expect(body['iterations']).toBe(3);
    expect(body['status']).toBe('submitted');
  });

  it('should reject a request without an extraction schema', async () => {
    const deps = createStubDeps();
    const app = createApp(deps);

    const res = await app.request(
      '/research',
      { ...jsonPost({ topic: 'Nina Simone' }), headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-9' } },
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId: 'req-9',
      details: ['extractionSchema: Required'],
    });
    expect(deps.agent.run).not.toHaveBeenCalled();
  });

  it('should reject a schema that is not an object schema', async () => {
    const deps = createStubDeps();
    const app = createApp(deps);

    const res = await app.request(
      '/research',
      jsonPost({ topic: 'Nina Simone', extractionSchema: { type: 'array', properties: {} } }),
    );

    expect(res.status).toBe(400);
    expect(deps.agent.run).not.toHaveBeenCalled();
  });
});
