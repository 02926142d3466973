import type { ResearchMessage, ToolKind } from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { ResearchGraphState } from '../orchestration/research-state.js';
import { assertTransition, type ResearchPhase } from '../orchestration/transitions.js';
import type { ResearchModel, ResearchModelReply, ToolDescriptor } from '../llm/research-model.js';
import { withTimeout } from '../llm/transient.js';
import { CORRECTIVE_MESSAGE, DEFAULT_RESEARCH_PROMPT, buildResearchPrompt } from './prompts.js';

const log = createChildLogger('research:planner');

export interface PlannerDeps {
  readonly model: ResearchModel;
  readonly tools: readonly ToolDescriptor[];
  readonly kindOf: (name: string) => ToolKind | undefined;
  readonly maxLoops: number;
  readonly modelTimeoutMs: number;
  readonly prompt?: string;
}

export function createPlannerNode(
  deps: PlannerDeps,
): (state: ResearchGraphState) => Promise<Partial<ResearchGraphState>> {
  const template = deps.prompt ?? DEFAULT_RESEARCH_PROMPT;

  return async (state: ResearchGraphState): Promise<Partial<ResearchGraphState>> => {
    const pass = state.iteration + 1;
    const budgetLeft = pass < deps.maxLoops;
    const continueOrStop = (next: ResearchPhase): ResearchPhase =>
      assertTransition('planning', budgetLeft ? next : 'terminal');

    log.info({ topic: state.topic, pass, maxLoops: deps.maxLoops }, 'Planning next research action');

    let reply: ResearchModelReply;
    try {
      reply = await withTimeout(
        'Research model call',
        deps.model.invoke({
          systemPrompt: buildResearchPrompt(template, state.topic, state.extractionSchema),
          messages: state.messages,
          tools: deps.tools,
        }),
        deps.modelTimeoutMs,
      );
    } catch (error) {
      const reason = toError(error).message;
      log.warn({ pass, error: reason }, 'Research model call failed');
      const phase = continueOrStop('planning');
      return {
        iteration: 1,
        messages: [{ role: 'human', content: `The previous model call failed: ${reason}. ${CORRECTIVE_MESSAGE}` }],
        pendingCalls: [],
        phase,
        status: phase === 'terminal' ? 'exhausted' : undefined,
      };
    }

    if (reply.kind === 'text' || reply.calls.length === 0) {
      log.info({ pass }, 'Model answered without a tool call, re-prompting');
      const phase = continueOrStop('planning');
      const content = reply.kind === 'text' ? reply.content : reply.text;
      return {
        iteration: 1,
        messages: [
          { role: 'model', content, toolCalls: [] },
          { role: 'human', content: CORRECTIVE_MESSAGE },
        ],
        pendingCalls: [],
        phase,
        status: phase === 'terminal' ? 'exhausted' : undefined,
      };
    }

    const submit = reply.calls.find((call) => deps.kindOf(call.name) === 'submit');
    if (submit) {
      if (reply.calls.length > 1) {
        log.info({ pass, dropped: reply.calls.length - 1 }, 'Dropping research calls issued alongside the submission');
      }
      const message: ResearchMessage = { role: 'model', content: reply.text, toolCalls: [submit] };
      return {
        iteration: 1,
        messages: [message],
        info: submit.args,
        pendingCalls: [],
        phase: assertTransition('planning', 'reflecting'),
      };
    }

    const phase = continueOrStop('executingTool');
    log.info(
      { pass, tools: reply.calls.map((call) => call.name), next: phase },
      'Model requested tool calls',
    );
    return {
      iteration: 1,
      messages: [{ role: 'model', content: reply.text, toolCalls: reply.calls }],
      pendingCalls: phase === 'executingTool' ? reply.calls : [],
      phase,
      status: phase === 'terminal' ? 'exhausted' : undefined,
    };
  };
}
