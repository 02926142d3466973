import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { buildCorrectionMessage, invokeAndValidate } from './invoke-and-validate.js';
import { LlmError } from '@quarry/shared/src/utils/errors.js';

const VerdictSchema = z.object({
  reasons: z.array(z.string()).min(1),
  isSatisfactory: z.boolean(),
});

function createScriptedClient(responses: string[]) {
  let callIndex = 0;
  const invoke = vi.fn((_request: LlmRequest) => {
    const content = responses[callIndex] ?? responses[responses.length - 1];
    callIndex++;
    return Promise.resolve({ content });
  });
  const client: LlmClient = { invoke };
  return { client, invoke };
}

const baseRequest: LlmRequest = {
  systemPrompt: 'You are a satisfaction judge.',
  userMessage: 'Judge this submission.',
};

describe('invokeAndValidate', () => {
  it('should return parsed data on the first valid response', async () => {
    const { client, invoke } = createScriptedClient([
      JSON.stringify({ reasons: ['complete'], isSatisfactory: true }),
    ]);

    const result = await invokeAndValidate({
      llmClient: client,
      request: baseRequest,
      schema: VerdictSchema,
      agentName: 'judge',
    });

    expect(result).toEqual({ reasons: ['complete'], isSatisfactory: true });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should re-prompt with a correction after unparseable output', async () => {
    const { client, invoke } = createScriptedClient([
      'I think it is fine',
      JSON.stringify({ reasons: ['fine'], isSatisfactory: true }),
    ]);

    const result = await invokeAndValidate({
      llmClient: client,
      request: baseRequest,
      schema: VerdictSchema,
      agentName: 'judge',
    });

    expect(result.isSatisfactory).toBe(true);
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(invoke.mock.calls[1][0].userMessage).toContain('[CORRECTION]');
    expect(invoke.mock.calls[1][0].userMessage).toContain('Failed to parse JSON');
  });

  it('should re-prompt with the schema violations', async () => {
    const { client, invoke } = createScriptedClient([
      JSON.stringify({ reasons: [], isSatisfactory: 'yes' }),
      JSON.stringify({ reasons: ['ok'], isSatisfactory: false }),
    ]);

    const result = await invokeAndValidate({
      llmClient: client,
      request: baseRequest,
      schema: VerdictSchema,
      agentName: 'judge',
    });

    expect(result).toEqual({ reasons: ['ok'], isSatisfactory: false });
    expect(invoke.mock.calls[1][0].userMessage).toContain('- isSatisfactory: Expected boolean, received string');
  });

  it('should throw AgentError after exhausting retries', async () => {
    const { client } = createScriptedClient([JSON.stringify({ bad: true })]);

    await expect(
      invokeAndValidate({
        llmClient: client,
        request: baseRequest,
        schema: VerdictSchema,
        agentName: 'judge',
        maxRetries: 1,
      }),
    ).rejects.toThrow('judge returned invalid output after 2 attempts');
  });

  it('should honour a custom retry count', async () => {
    const { client, invoke } = createScriptedClient([
      JSON.stringify({ bad: true }),
      JSON.stringify({ bad: true }),
      JSON.stringify({ reasons: ['finally'], isSatisfactory: true }),
    ]);

    const result = await invokeAndValidate({
      llmClient: client,
      request: baseRequest,
      schema: VerdictSchema,
      agentName: 'judge',
      maxRetries: 2,
    });

    expect(result.reasons).toEqual(['finally']);
    expect(invoke).toHaveBeenCalledTimes(3);
  });

  it('should propagate model failures without retrying', async () => {
    const llmError = new LlmError('Rate limit exceeded', true);
    const invoke = vi.fn().mockRejectedValue(llmError);

    await expect(
      invokeAndValidate({
        llmClient: { invoke },
        request: baseRequest,
        schema: VerdictSchema,
        agentName: 'judge',
      }),
    ).rejects.toThrow(llmError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });
});

describe('buildCorrectionMessage', () => {
  it('should list each error under the original message', () => {
    expect(buildCorrectionMessage('Judge this.', ['reasons: Required', 'isSatisfactory: Required'])).toBe(
      'Judge this.\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n- reasons: Required\n- isSatisfactory: Required',
    );
  });
});
