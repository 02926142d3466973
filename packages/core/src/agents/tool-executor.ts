import type { ResearchMessage } from '@quarry/shared/src/types/research.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { ResearchGraphState } from '../orchestration/research-state.js';
import { assertTransition } from '../orchestration/transitions.js';
import type { ToolInvoker } from '../tools/tool-invoker.js';

const log = createChildLogger('research:tool-executor');

/** Runs the pending calls one after another, in the order the model issued them. */
export function createToolExecutorNode(
  invoker: ToolInvoker,
): (state: ResearchGraphState) => Promise<Partial<ResearchGraphState>> {
  return async (state: ResearchGraphState): Promise<Partial<ResearchGraphState>> => {
    const messages: ResearchMessage[] = [];

    for (const call of state.pendingCalls) {
      const record = await invoker.invoke(call);
      messages.push({ role: 'tool', record });
    }

    log.info(
      { pass: state.iteration, calls: messages.length, errors: messages.filter((m) => m.role === 'tool' && m.record.isError).length },
      'Tool calls executed',
    );

    return {
      messages,
      pendingCalls: [],
      phase: assertTransition('executingTool', 'planning'),
    };
  };
}
