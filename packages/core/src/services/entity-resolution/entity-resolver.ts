import { z } from 'zod';
import type {
  EntitySearchResponse,
  EntitySearchType,
  MatchCandidate,
  MatchTier,
} from '@quarry/shared/src/types/entity.types.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import type { ResourceGateway } from '../../gateway/resource-gateway.js';
import {
  TIER_RESULT_LIMIT,
  buildEraQuery,
  buildTierQuery,
  parseEra,
} from './sparql-queries.js';

const log = createChildLogger('entity:resolver');

export const DEFAULT_SPARQL_ENDPOINT = 'https://query.wikidata.org/sparql';
const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;
const MAX_RESULTS = 10;

const SparqlValueSchema = z.object({ value: z.string() }).passthrough();

const SparqlResponseSchema = z.object({
  results: z.object({
    bindings: z.array(z.record(SparqlValueSchema)),
  }),
});

type SparqlBinding = z.infer<typeof SparqlResponseSchema>['results']['bindings'][number];

interface TierSpec {
  readonly tier: MatchTier;
  /** Tier runs only while fewer candidates than this have accumulated. */
  readonly runBelow: number;
  readonly query: string;
}

const BASE_CONFIDENCE: Record<MatchTier, number> = {
  exact: 0.95,
  fuzzy: 0.85,
  partial: 0.7,
};

export interface EntityResolverConfig {
  readonly gateway: ResourceGateway;
  readonly endpoint?: string;
  readonly cacheTtlMs?: number;
}

export interface EntityResolver {
  search(name: string, searchType?: EntitySearchType, limit?: number): Promise<EntitySearchResponse>;
}

export function computeConfidence(base: number, candidate: Omit<MatchCandidate, 'confidence' | 'matchTier'>): number {
  let confidence = base;
  if (candidate.description) confidence += 0.05;
  if (candidate.country) confidence += 0.03;
  if (candidate.imageUrl) confidence += 0.02;
  if (candidate.birthYear) confidence += 0.02;
  return Math.min(Math.round(confidence * 100) / 100, 1);
}

function entityIdFromUri(uri: string): string {
  const segments = uri.split('/');
  return segments[segments.length - 1];
}

function toCandidate(binding: SparqlBinding, tier: MatchTier): MatchCandidate {
  const read = (key: string): string => binding[key]?.value ?? '';
  const fields = {
    entityId: entityIdFromUri(read('entity')),
    name: read('entityLabel'),
    description: read('description'),
    country: read('countryLabel') || read('country'),
    imageUrl: read('image'),
    birthYear: read('birthYear'),
    deathYear: read('deathYear'),
  };
  return {
    ...fields,
    confidence: computeConfidence(BASE_CONFIDENCE[tier], fields),
    matchTier: tier,
  };
}

export function dedupeAndRank(candidates: readonly MatchCandidate[]): MatchCandidate[] {
  const seen = new Set<string>();
  const unique: MatchCandidate[] = [];
  for (const candidate of candidates) {
    if (candidate.entityId && !seen.has(candidate.entityId)) {
      seen.add(candidate.entityId);
      unique.push(candidate);
    }
  }
  return unique.sort((a, b) => b.confidence - a.confidence);
}

export function buildSuggestions(name: string, totalResults: number): string[] {
  if (totalResults === 0) {
    return [
      `Try searching for '${name}' with a different spelling`,
      'Check that the entity name is correct',
      'Try searching for just the first or last name',
    ];
  }
  if (totalResults > 5) {
    return ['Try adding more specific terms', "Consider adding the entity's country or genre"];
  }
  return [];
}

function invalidInput(
  searchTerm: string,
  searchType: EntitySearchType,
  error: string,
  suggestion: string,
): EntitySearchResponse {
  return {
    results: [],
    totalResults: 0,
    searchSuggestions: [suggestion],
    searchTerm,
    searchType,
    error,
  };
}

export function createEntityResolver(config: EntityResolverConfig): EntityResolver {
  const endpoint = config.endpoint ?? DEFAULT_SPARQL_ENDPOINT;
  const cacheTtlMs = config.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;

  async function runTier(spec: TierSpec): Promise<MatchCandidate[]> {
    const result = await config.gateway.fetch({
      url: endpoint,
      method: 'POST',
      form: { query: spec.query, format: 'json' },
      headers: { Accept: 'application/sparql-results+json' },
      schema: SparqlResponseSchema,
      cacheTtlMs,
      label: `sparql:${spec.tier}`,
    });

    if (!result.ok) {
      log.warn({ tier: spec.tier, error: result.error.message }, 'Tier query failed, continuing');
      return [];
    }

    return result.data.results.bindings
      .slice(0, TIER_RESULT_LIMIT)
      .map((binding) => toCandidate(binding, spec.tier));
  }

  function planTiers(term: string, searchType: EntitySearchType): TierSpec[] {
    const tiers: MatchTier[] = ['exact', 'fuzzy', 'partial'];
    const runBelow: Record<MatchTier, number> = { exact: Infinity, fuzzy: 3, partial: 5 };
    return tiers.map((tier) => ({
      tier,
      runBelow: runBelow[tier],
      query: buildTierQuery(tier, searchType, term),
    }));
  }

  return {
    async search(
      name: string,
      searchType: EntitySearchType = 'name',
      limit: number = MAX_RESULTS,
    ): Promise<EntitySearchResponse> {
      const term = name.trim();
      if (!term) {
        return invalidInput('', searchType, 'Entity name is required', 'Please provide an entity name');
      }

      let tiers: TierSpec[];
      if (searchType === 'era') {
        const era = parseEra(term);
        if (!era) {
          return invalidInput(
            term,
            searchType,
            'Era must be a year or decade such as 1994 or 1990s',
            'Provide a year or decade, for example 1990s',
          );
        }
        tiers = [{ tier: 'exact', runBelow: Infinity, query: buildEraQuery(era) }];
      } else {
        tiers = planTiers(term, searchType);
      }

      const accumulated: MatchCandidate[] = [];
      for (const spec of tiers) {
        if (accumulated.length >= spec.runBelow) {
          log.debug({ tier: spec.tier, accumulated: accumulated.length }, 'Skipping tier');
          continue;
        }
        accumulated.push(...(await runTier(spec)));
      }

      const ranked = dedupeAndRank(accumulated);
      const cap = Number.isFinite(limit) ? Math.max(1, Math.min(Math.floor(limit), MAX_RESULTS)) : MAX_RESULTS;

      log.info(
        { searchTerm: term, searchType, candidates: accumulated.length, unique: ranked.length },
        'Entity search complete',
      );

      return {
        results: ranked.slice(0, cap),
        totalResults: ranked.length,
        searchSuggestions: buildSuggestions(term, ranked.length),
        searchTerm: term,
        searchType,
      };
    },
  };
}
