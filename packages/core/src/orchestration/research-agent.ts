import { StateGraph, START, END } from '@langchain/langgraph';
import type { ResearchRequest, ResearchResult } from '@quarry/shared/src/types/research.types.js';
import type { ResearchConfig } from '@quarry/schemas/src/research.schema.js';
import { validateResearchRequest } from '@quarry/schemas/src/validators.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { toError } from '@quarry/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { ResearchModel } from '../llm/research-model.js';
import type { SearchTool } from '../tools/search-tool.js';
import type { ScrapeTool } from '../tools/scrape-tool.js';
import { createToolInvoker } from '../tools/tool-invoker.js';
import { createPlannerNode } from '../agents/planner.js';
import { createToolExecutorNode } from '../agents/tool-executor.js';
import { createReflectionNode } from '../agents/reflection.js';
import { ResearchGraphAnnotation, type ResearchGraphState } from './research-state.js';

const log = createChildLogger('research:agent');

export interface ResearchAgentConfig {
  readonly model: ResearchModel;
  readonly llmClient: LlmClient;
  readonly search: SearchTool;
  readonly scrape: ScrapeTool;
  readonly researchConfig: ResearchConfig;
}

export interface ResearchAgent {
  run(request: ResearchRequest): Promise<ResearchResult>;
}

type ResearchNode = (state: ResearchGraphState) => Promise<Partial<ResearchGraphState>>;

function routeByPhase(state: ResearchGraphState): string {
  return state.phase;
}

function toResult(state: ResearchGraphState): ResearchResult {
  return {
    topic: state.topic,
    info: state.info,
    iterations: state.iteration,
    status: state.status ?? (state.info === null ? 'exhausted' : 'submitted'),
    verdict: state.verdict,
    messages: state.messages,
  };
}

export function createResearchAgent(config: ResearchAgentConfig): ResearchAgent {
  const { researchConfig } = config;

  log.info(
    {
      maxLoops: researchConfig.maxLoops,
      reflectionPolicy: researchConfig.reflectionPolicy,
      searchProvider: researchConfig.searchProvider,
    },
    'Initializing research agent',
  );

  return {
    async run(request: ResearchRequest): Promise<ResearchResult> {
      const { topic, extractionSchema } = validateResearchRequest(request);

      const invoker = createToolInvoker({ search: config.search, scrape: config.scrape, extractionSchema });

      const initialState: ResearchGraphState = {
        topic,
        extractionSchema,
        messages: [{ role: 'human', content: topic }],
        iteration: 0,
        info: null,
        verdict: undefined,
        pendingCalls: [],
        phase: 'planning',
        status: undefined,
      };

      // Last state a node was entered with, kept for the abort path.
      let latest = initialState;
      const observed = (node: ResearchNode): ResearchNode => (state) => {
        latest = state;
        return node(state);
      };

      const graph = new StateGraph(ResearchGraphAnnotation)
        .addNode(
          'planner',
          observed(
            createPlannerNode({
              model: config.model,
              tools: invoker.descriptors,
              kindOf: invoker.kindOf,
              maxLoops: researchConfig.maxLoops,
              modelTimeoutMs: researchConfig.modelTimeoutSeconds * 1000,
              prompt: researchConfig.prompt,
            }),
          ),
        )
        .addNode('toolExecutor', observed(createToolExecutorNode(invoker)))
        .addNode(
          'reflection',
          observed(
            createReflectionNode({
              llmClient: config.llmClient,
              policy: researchConfig.reflectionPolicy,
              minInfoLength: researchConfig.minInfoLength,
              maxLoops: researchConfig.maxLoops,
              modelTimeoutMs: researchConfig.modelTimeoutSeconds * 1000,
            }),
          ),
        )
        .addEdge(START, 'planner')
        .addConditionalEdges('planner', routeByPhase, {
          planning: 'planner',
          executingTool: 'toolExecutor',
          reflecting: 'reflection',
          terminal: END,
        })
        .addEdge('toolExecutor', 'planner')
        .addConditionalEdges('reflection', routeByPhase, {
          planning: 'planner',
          terminal: END,
        })
        .compile();

      log.info({ topic }, 'Running research session');

      try {
        const finalState = await graph.invoke(initialState, {
          recursionLimit: researchConfig.maxLoops * 3 + 5,
        });
        const result = toResult(finalState);
        log.info(
          { topic, iterations: result.iterations, status: result.status, hasInfo: result.info !== null },
          'Research session complete',
        );
        return result;
      } catch (error) {
        const reason = toError(error).message;
        log.error({ topic, iteration: latest.iteration, error: reason }, 'Research session aborted');
        return {
          ...toResult(latest),
          status: 'exhausted',
          messages: [...latest.messages, { role: 'human', content: `Research session aborted: ${reason}` }],
        };
      }
    },
  };
}
