import type { AppConfig } from '@quarry/schemas/src/config-loader.js';
import type { GatewayConfig } from '@quarry/schemas/src/gateway.schema.js';
import { SearchProviderSchema, type SearchProvider } from '@quarry/schemas/src/research.schema.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { ConfigurationError } from '@quarry/shared/src/utils/errors.js';
import { createResourceGateway, type ResourceGateway } from '../gateway/resource-gateway.js';
import { createEntityResolver, type EntityResolver } from '../services/entity-resolution/entity-resolver.js';
import { createMediaWikiClient } from '../services/content-indexing/mediawiki-client.js';
import { createContentIndexer, type ContentIndexer } from '../services/content-indexing/content-indexer.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createGroundedSearchClient } from '../services/web-search/web-search-client.js';
import { createTavilySearchClient } from '../services/web-search/tavily-search-client.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import { createMusicSearchClient } from '../services/web-search/music-search-client.js';
import { createLlmClient, type LlmClient } from '../llm/llm-client.js';
import { createTextLlmClient, type TextLlmClient } from '../llm/text-llm-client.js';
import { createResearchModel, type ResearchModel } from '../llm/research-model.js';
import { isMockLlmEnabled, resolveVertexSettings } from '../llm/transient.js';
import { createSearchTool } from '../tools/search-tool.js';
import { createScrapeTool } from '../tools/scrape-tool.js';
import { createResearchAgent, type ResearchAgent } from '../orchestration/research-agent.js';

const log = createChildLogger('infrastructure:runtime');

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ResearchRuntimeOptions {
  readonly config: AppConfig;
  readonly env?: Environment;
  readonly fetchFn?: typeof fetch;
  /** Overrides for the model clients, mainly for tests. */
  readonly llmClient?: LlmClient;
  readonly textLlmClient?: TextLlmClient;
  readonly researchModel?: ResearchModel;
}

/** The gateway and the two knowledge services built on it. */
export interface KnowledgeServices {
  readonly gateway: ResourceGateway;
  readonly entityResolver: EntityResolver;
  readonly contentIndexer: ContentIndexer;
}

/** Everything one process shares between research sessions. */
export interface ResearchRuntime extends KnowledgeServices {
  readonly searchClient: WebSearchClient;
  readonly agent: ResearchAgent;
}

/**
 * `QUARRY_SEARCH_PROVIDER` wins over the configured provider; mock model
 * mode falls back to the mock provider when nothing is set explicitly.
 */
export function resolveSearchProvider(configured: SearchProvider, env: Environment): SearchProvider {
  const override = env['QUARRY_SEARCH_PROVIDER'];
  if (override) {
    const parsed = SearchProviderSchema.safeParse(override);
    if (!parsed.success) {
      throw new ConfigurationError(
        `QUARRY_SEARCH_PROVIDER must be one of ${SearchProviderSchema.options.join(', ')}, got "${override}"`,
      );
    }
    return parsed.data;
  }
  if (env['QUARRY_MOCK_LLM'] === 'true') {
    return 'mock';
  }
  return configured;
}

interface SearchClientDeps {
  readonly gateway: ResourceGateway;
  readonly entityResolver: EntityResolver;
  readonly contentIndexer: ContentIndexer;
  readonly env: Environment;
  readonly cacheTtlMs: number;
}

export function createSearchClient(provider: SearchProvider, deps: SearchClientDeps): WebSearchClient {
  switch (provider) {
    case 'tavily':
      return createTavilySearchClient({
        apiKey: deps.env['TAVILY_API_KEY'] ?? '',
        gateway: deps.gateway,
        cacheTtlMs: deps.cacheTtlMs,
      });
    case 'grounded': {
      const settings = resolveVertexSettings({
        projectId: deps.env['QUARRY_GCP_PROJECT_ID'] ?? deps.env['GCP_PROJECT_ID'],
        location: deps.env['VERTEX_AI_LOCATION'],
      });
      if (!settings) {
        throw new ConfigurationError('QUARRY_GCP_PROJECT_ID is required for the grounded search provider');
      }
      return createGroundedSearchClient({
        projectId: settings.projectId,
        location: settings.location,
        gateway: deps.gateway,
      });
    }
    case 'music':
      return createMusicSearchClient({ resolver: deps.entityResolver, indexer: deps.contentIndexer });
    case 'mock':
      return createMockWebSearchClient();
  }
}

export function createKnowledgeServices(config: GatewayConfig, fetchFn?: typeof fetch): KnowledgeServices {
  const cacheTtlMs = config.cacheTtlSeconds * 1000;
  const gateway = createResourceGateway(config, { fetchFn });
  return {
    gateway,
    entityResolver: createEntityResolver({ gateway, cacheTtlMs }),
    contentIndexer: createContentIndexer({
      client: createMediaWikiClient({ gateway, cacheTtlMs }),
    }),
  };
}

export async function createResearchRuntime(options: ResearchRuntimeOptions): Promise<ResearchRuntime> {
  const { config } = options;
  const env = options.env ?? process.env;
  const cacheTtlMs = config.gateway.cacheTtlSeconds * 1000;

  const { gateway, entityResolver, contentIndexer } = createKnowledgeServices(config.gateway, options.fetchFn);

  const provider = resolveSearchProvider(config.research.searchProvider, env);
  const searchClient = createSearchClient(provider, {
    gateway,
    entityResolver,
    contentIndexer,
    env,
    cacheTtlMs,
  });

  const modelTimeoutMs = config.research.modelTimeoutSeconds * 1000;
  const [llmClient, textLlmClient, model] = await Promise.all([
    options.llmClient ?? createLlmClient({ timeoutMs: modelTimeoutMs }),
    options.textLlmClient ?? createTextLlmClient({ timeoutMs: modelTimeoutMs }),
    options.researchModel ?? createResearchModel({ timeoutMs: modelTimeoutMs }),
  ]);

  const agent = createResearchAgent({
    model,
    llmClient,
    search: createSearchTool(searchClient, config.research.maxSearchResults),
    scrape: createScrapeTool({
      gateway,
      textLlm: textLlmClient,
      contentLimit: config.research.scrapeContentLimit,
      modelTimeoutMs,
      cacheTtlMs,
    }),
    researchConfig: config.research,
  });

  log.info({ provider, mockLlm: isMockLlmEnabled() }, 'Research runtime ready');

  return { gateway, entityResolver, contentIndexer, searchClient, agent };
}
