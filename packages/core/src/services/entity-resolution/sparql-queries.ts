import type { EntitySearchType, MatchTier } from '@quarry/shared/src/types/entity.types.js';

const MUSICIAN_OCCUPATION = 'wd:Q639669';
const HUMAN = 'wd:Q5';

export const TIER_RESULT_LIMIT = 10;

export interface EraRange {
  readonly from: number;
  readonly to: number;
}

export function escapeSparqlString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * "first.*last" for multi-word names so middle names and initials still match.
 */
export function buildFuzzyPattern(name: string): string {
  const words = name.split(/\s+/).filter((w) => w.length > 0);
  if (words.length >= 2) {
    return `${escapeRegex(words[0])}.*${escapeRegex(words[words.length - 1])}`;
  }
  return escapeRegex(name);
}

/**
 * Accepts "1994" or "1990s"; a bare year widens to its decade.
 */
export function parseEra(input: string): EraRange | undefined {
  const match = /^(\d{4})s?$/.exec(input.trim());
  if (!match) {
    return undefined;
  }
  const decade = Math.floor(parseInt(match[1], 10) / 10) * 10;
  return { from: decade, to: decade + 9 };
}

function subjectPattern(searchType: EntitySearchType): string {
  switch (searchType) {
    case 'genre':
      return '?entity wdt:P136 ?subject .\n  ?subject rdfs:label ?matchLabel .';
    case 'country':
      return '?entity wdt:P27|wdt:P495 ?subject .\n  ?subject rdfs:label ?matchLabel .';
    case 'name':
    case 'era':
      return '?entity rdfs:label ?matchLabel .';
  }
}

function tierFilter(tier: MatchTier, term: string): string {
  switch (tier) {
    case 'exact':
      return `FILTER(?matchLabel = "${escapeSparqlString(term)}"@en)`;
    case 'fuzzy':
      return `FILTER(REGEX(?matchLabel, "${escapeSparqlString(buildFuzzyPattern(term))}", "i"))`;
    case 'partial':
      return `FILTER(CONTAINS(LCASE(?matchLabel), LCASE("${escapeSparqlString(term)}")))`;
  }
}

function wrapQuery(constraints: string): string {
  return `SELECT DISTINCT ?entity ?entityLabel ?description ?country ?countryLabel ?image ?birthYear ?deathYear
WHERE {
  ${constraints}
  OPTIONAL { ?entity schema:description ?description . FILTER(LANG(?description) = "en") }
  OPTIONAL { ?entity wdt:P27 ?country . }
  OPTIONAL { ?entity wdt:P18 ?image . }
  OPTIONAL { ?entity wdt:P569 ?birthDate . BIND(YEAR(?birthDate) AS ?birthYear) }
  OPTIONAL { ?entity wdt:P570 ?deathDate . BIND(YEAR(?deathDate) AS ?deathYear) }
  SERVICE wikibase:label { bd:serviceParam wikibase:language "en" . }
}
LIMIT ${String(TIER_RESULT_LIMIT)}`;
}

export function buildTierQuery(tier: MatchTier, searchType: EntitySearchType, term: string): string {
  // Looser tiers only consider musicians; an exact label is trusted for any person.
  const scope =
    tier === 'exact'
      ? `?entity wdt:P31 ${HUMAN} .`
      : `?entity wdt:P31 ${HUMAN} .\n  ?entity wdt:P106 ${MUSICIAN_OCCUPATION} .`;

  return wrapQuery(`${scope}\n  ${subjectPattern(searchType)}\n  ${tierFilter(tier, term)}`);
}

export function buildEraQuery(era: EraRange): string {
  return wrapQuery(
    `?entity wdt:P106 ${MUSICIAN_OCCUPATION} .
  ?entity wdt:P2031 ?workStart .
  FILTER(YEAR(?workStart) >= ${String(era.from)} && YEAR(?workStart) <= ${String(era.to)})`,
  );
}
