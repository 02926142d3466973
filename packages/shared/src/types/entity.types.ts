export type MatchTier = 'exact' | 'fuzzy' | 'partial';

export type EntitySearchType = 'name' | 'genre' | 'era' | 'country';

export interface MatchCandidate {
  readonly entityId: string;
  readonly name: string;
  readonly description: string;
  readonly country: string;
  readonly imageUrl: string;
  readonly birthYear: string;
  readonly deathYear: string;
  readonly confidence: number;
  readonly matchTier: MatchTier;
}

export interface EntitySearchResponse {
  readonly results: readonly MatchCandidate[];
  readonly totalResults: number;
  readonly searchSuggestions: readonly string[];
  readonly searchTerm: string;
  readonly searchType: EntitySearchType;
  readonly error?: string;
}
