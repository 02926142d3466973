import type {
  ExtractedInfo,
  ReflectionPolicy,
  ResearchMessage,
  SatisfactionVerdict,
  ToolCallRequest,
} from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { ResearchGraphState } from '../orchestration/research-state.js';
import { assertTransition } from '../orchestration/transitions.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import { withTimeout } from '../llm/transient.js';
import { SATISFACTION_JUDGE_PROMPT, buildJudgeMessage } from './prompts.js';
import { SatisfactionJudgmentJsonSchema, SatisfactionJudgmentSchema } from './research-output.schemas.js';

const log = createChildLogger('research:reflection');

const DEFAULT_IMPROVEMENT = 'Gather more information and submit a more complete result.';

export interface ReflectionDeps {
  readonly llmClient: LlmClient;
  readonly policy: ReflectionPolicy;
  readonly minInfoLength: number;
  readonly maxLoops: number;
  readonly modelTimeoutMs: number;
}

/** Submitted info passes only when it is present and its JSON is longer than `minLength`. */
export function meetsLengthHeuristic(info: ExtractedInfo | null, minLength: number): boolean {
  return info !== null && JSON.stringify(info).length > minLength;
}

function heuristicVerdict(passes: boolean, judgeFailure: string): SatisfactionVerdict {
  return {
    isSatisfactory: passes,
    reasons: [
      `Satisfaction judge unavailable: ${judgeFailure}`,
      'Verdict decided by the length heuristic alone',
      passes ? 'Submitted info meets the minimum length' : 'Submitted info is missing or too short',
    ],
    improvementInstructions: passes ? undefined : DEFAULT_IMPROVEMENT,
  };
}

function lastSubmission(messages: readonly ResearchMessage[]): ToolCallRequest | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'model') {
      return message.toolCalls[0];
    }
  }
  return undefined;
}

export function createReflectionNode(
  deps: ReflectionDeps,
): (state: ResearchGraphState) => Promise<Partial<ResearchGraphState>> {
  return async (state: ResearchGraphState): Promise<Partial<ResearchGraphState>> => {
    const passes = meetsLengthHeuristic(state.info, deps.minInfoLength);

    let verdict: SatisfactionVerdict;
    try {
      const judgment = await withTimeout(
        'Satisfaction judge',
        invokeAndValidate({
          llmClient: deps.llmClient,
          request: {
            systemPrompt: SATISFACTION_JUDGE_PROMPT,
            userMessage: buildJudgeMessage(state.topic, state.extractionSchema, state.info),
            jsonSchema: { ...SatisfactionJudgmentJsonSchema },
          },
          schema: SatisfactionJudgmentSchema,
          agentName: 'Satisfaction judge',
        }),
        deps.modelTimeoutMs,
      );
      const isSatisfactory = judgment.isSatisfactory && passes;
      verdict = {
        isSatisfactory,
        reasons: judgment.reasons,
        improvementInstructions: isSatisfactory
          ? undefined
          : (judgment.improvementInstructions ?? DEFAULT_IMPROVEMENT),
      };
    } catch (error) {
      const reason = toError(error).message;
      log.warn({ error: reason }, 'Satisfaction judge failed, falling back to the length heuristic');
      verdict = heuristicVerdict(passes, reason);
    }

    log.info(
      { topic: state.topic, pass: state.iteration, isSatisfactory: verdict.isSatisfactory, policy: deps.policy },
      'Reflected on submitted info',
    );

    if (deps.policy === 'submission-ends' || verdict.isSatisfactory) {
      return { verdict, phase: assertTransition('reflecting', 'terminal'), status: 'submitted' };
    }

    if (state.iteration >= deps.maxLoops) {
      return { verdict, phase: assertTransition('reflecting', 'terminal'), status: 'exhausted' };
    }

    const instructions = verdict.improvementInstructions ?? DEFAULT_IMPROVEMENT;
    const messages: ResearchMessage[] = [];
    const submission = lastSubmission(state.messages);
    if (submission) {
      messages.push({
        role: 'tool',
        record: {
          callId: submission.id,
          toolName: submission.name,
          args: submission.args,
          result: 'Submission rejected as unsatisfactory.',
          isError: true,
        },
      });
    }
    messages.push({
      role: 'human',
      content: `The submitted info is not satisfactory yet. ${instructions}`,
    });

    return { verdict, messages, phase: assertTransition('reflecting', 'planning') };
  };
}
