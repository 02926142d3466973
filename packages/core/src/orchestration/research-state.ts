import { Annotation } from '@langchain/langgraph';
import type {
  ExtractedInfo,
  ExtractionSchema,
  ResearchMessage,
  ResearchStatus,
  SatisfactionVerdict,
  ToolCallRequest,
} from '@quarry/shared/src/types/research.types.js';
import type { ResearchPhase } from './transitions.js';

export const ResearchGraphAnnotation = Annotation.Root({
  topic: Annotation<string>,
  extractionSchema: Annotation<ExtractionSchema>,
  messages: Annotation<readonly ResearchMessage[]>({
    reducer: (current, update) => [...current, ...update],
    default: () => [],
  }),
  // Nodes return the increment, not the new total.
  iteration: Annotation<number>({
    reducer: (current, delta) => current + delta,
    default: () => 0,
  }),
  info: Annotation<ExtractedInfo | null>,
  verdict: Annotation<SatisfactionVerdict | undefined>,
  pendingCalls: Annotation<readonly ToolCallRequest[]>,
  phase: Annotation<ResearchPhase>,
  status: Annotation<ResearchStatus | undefined>,
});

export type ResearchGraphState = typeof ResearchGraphAnnotation.State;
