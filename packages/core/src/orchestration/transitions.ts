import { AgentError } from '@quarry/shared/src/utils/errors.js';

export type ResearchPhase = 'planning' | 'executingTool' | 'reflecting' | 'terminal';

export const RESEARCH_TRANSITIONS: Readonly<Record<ResearchPhase, readonly ResearchPhase[]>> = {
  planning: ['executingTool', 'reflecting', 'planning', 'terminal'],
  executingTool: ['planning'],
  reflecting: ['planning', 'terminal'],
  terminal: [],
};

export function canTransition(from: ResearchPhase, to: ResearchPhase): boolean {
  return RESEARCH_TRANSITIONS[from].includes(to);
}

/** Returns `to` when the table allows it. */
export function assertTransition(from: ResearchPhase, to: ResearchPhase): ResearchPhase {
  if (!canTransition(from, to)) {
    throw new AgentError(`Illegal research transition: ${from} -> ${to}`);
  }
  return to;
}
