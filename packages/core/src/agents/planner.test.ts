import { describe, it, expect, vi } from 'vitest';
import type { ExtractionSchema } from '@quarry/shared/src/types/research.types.js';
import type { ResearchModel } from '../llm/research-model.js';
import type { ResearchGraphState } from '../orchestration/research-state.js';
import { buildToolDescriptors, createToolKindLookup } from '../tools/descriptors.js';
import { createPlannerNode } from './planner.js';
import { CORRECTIVE_MESSAGE } from './prompts.js';

const extractionSchema: ExtractionSchema = {
  type: 'object',
  properties: { genre: { type: 'string' } },
};

const tools = buildToolDescriptors(extractionSchema);

function createState(overrides: Partial<ResearchGraphState> = {}): ResearchGraphState {
  return {
    topic: 'Nina Simone',
    extractionSchema,
    messages: [{ role: 'human', content: 'Nina Simone' }],
    iteration: 0,
    info: null,
    verdict: undefined,
    pendingCalls: [],
    phase: 'planning',
    status: undefined,
    ...overrides,
  };
}

function createNode(model: ResearchModel, maxLoops = 6, modelTimeoutMs = 60_000) {
  return createPlannerNode({ model, tools, kindOf: createToolKindLookup(tools), maxLoops, modelTimeoutMs });
}

describe('createPlannerNode', () => {
  it('should send the filled prompt, the history and all three tools', async () => {
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'text', content: '' }),
    };
    const state = createState();

    await createNode(model)(state);

    const request = vi.mocked(model.invoke).mock.calls[0]?.[0];
    expect(request?.systemPrompt).toContain('Topic: Nina Simone');
    expect(request?.systemPrompt).toContain('"genre"');
    expect(request?.messages).toEqual(state.messages);
    expect(request?.tools.map((t) => t.name)).toEqual(['search', 'scrape', 'Info']);
  });

  it('should hand research calls to the tool executor', async () => {
    const call = { id: 'c1', name: 'search', args: { query: 'Nina Simone genre' } };
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'tool_calls', text: '', calls: [call] }),
    };

    const update = await createNode(model)(createState());

    expect(update).toEqual({
      iteration: 1,
      messages: [{ role: 'model', content: '', toolCalls: [call] }],
      pendingCalls: [call],
      phase: 'executingTool',
      status: undefined,
    });
  });

  it('should keep only the submission when it arrives with other calls', async () => {
    const search = { id: 'c1', name: 'search', args: { query: 'more' } };
    const submit = { id: 'c2', name: 'Info', args: { genre: 'jazz' } };
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'tool_calls', text: 'done', calls: [search, submit] }),
    };

    const update = await createNode(model)(createState());

    expect(update).toEqual({
      iteration: 1,
      messages: [{ role: 'model', content: 'done', toolCalls: [submit] }],
      info: { genre: 'jazz' },
      pendingCalls: [],
      phase: 'reflecting',
    });
  });

  it('should re-prompt when the model answers without a tool call', async () => {
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'text', content: 'Let me think.' }),
    };

    const update = await createNode(model)(createState());

    expect(update.messages).toEqual([
      { role: 'model', content: 'Let me think.', toolCalls: [] },
      { role: 'human', content: CORRECTIVE_MESSAGE },
    ]);
    expect(update.phase).toBe('planning');
    expect(update.iteration).toBe(1);
  });

  it('should record a failed model call as a note and count the pass', async () => {
    const model: ResearchModel = {
      invoke: vi.fn().mockRejectedValue(new Error('quota exceeded')),
    };

    const update = await createNode(model)(createState());

    expect(update).toEqual({
      iteration: 1,
      messages: [
        {
          role: 'human',
          content: `The previous model call failed: quota exceeded. ${CORRECTIVE_MESSAGE}`,
        },
      ],
      pendingCalls: [],
      phase: 'planning',
      status: undefined,
    });
  });

  it('should end the session when the last pass brings no submission', async () => {
    const call = { id: 'c9', name: 'scrape', args: { url: 'https://site.example.org' } };
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'tool_calls', text: '', calls: [call] }),
    };

    const update = await createNode(model, 3)(createState({ iteration: 2 }));

    expect(update.phase).toBe('terminal');
    expect(update.status).toBe('exhausted');
    expect(update.pendingCalls).toEqual([]);
  });

  it('should still reflect on a submission made in the last pass', async () => {
    const submit = { id: 'c9', name: 'Info', args: { genre: 'soul' } };
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'tool_calls', text: '', calls: [submit] }),
    };

    const update = await createNode(model, 3)(createState({ iteration: 2 }));

    expect(update.phase).toBe('reflecting');
    expect(update.info).toEqual({ genre: 'soul' });
  });

  it('should use a custom prompt template', async () => {
    const model: ResearchModel = {
      invoke: vi.fn().mockResolvedValue({ kind: 'text', content: '' }),
    };
    const node = createPlannerNode({
      model,
      tools,
      kindOf: createToolKindLookup(tools),
      maxLoops: 6,
      modelTimeoutMs: 60_000,
      prompt: 'Research {topic} briefly.',
    });

    await node(createState());

    expect(vi.mocked(model.invoke).mock.calls[0]?.[0].systemPrompt).toBe('Research Nina Simone briefly.');
  });

  it('should treat a model call that never settles as a failed pass', async () => {
    const model: ResearchModel = { invoke: vi.fn(() => new Promise<never>(() => undefined)) };

    const update = await createNode(model, 6, 20)(createState());

    expect(update.iteration).toBe(1);
    expect(update.phase).toBe('planning');
    expect(update.messages).toEqual([
      {
        role: 'human',
        content:
          'The previous model call failed: Research model call timed out after 20 ms. Please respond by calling one of the provided tools.',
      },
    ]);
  });
});
