import { stripTags } from './html-text.js';

export interface SearchHit {
  readonly pageId: number;
  readonly title: string;
  readonly snippet: string;
  readonly namespace: number;
}

const ARTICLE_NAMESPACE = 0;
const NON_ARTICLE_PREFIXES = /^(category|user|user talk|talk|file|template|help|portal|wikipedia|draft|module|special):/i;

export const PRIMARY_TERMS = ['musician', 'singer', 'band', 'artist', 'album', 'song', 'rapper', 'composer'];
export const RELEASE_TERMS = ['album', 'ep', 'record', 'recording', 'released', 'music'];
export const TRACK_TERMS = ['song', 'single', 'track', 'lyrics', 'music'];

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1);
}

export function isExcludedPage(hit: SearchHit): boolean {
  if (hit.namespace !== ARTICLE_NAMESPACE) {
    return true;
  }
  return /disambiguation/i.test(hit.title) || NON_ARTICLE_PREFIXES.test(hit.title);
}

/**
 * True when the name appears in the title or snippet, or when most of its
 * words do.
 */
export function hasLexicalOverlap(name: string, hit: SearchHit): boolean {
  const title = hit.title.toLowerCase();
  const snippet = stripTags(hit.snippet).toLowerCase();
  const needle = name.toLowerCase().trim();
  if (title.includes(needle) || snippet.includes(needle)) {
    return true;
  }

  const nameTokens = tokenize(name);
  if (nameTokens.length === 0) {
    return false;
  }
  const haystack = new Set([...tokenize(title), ...tokenize(snippet)]);
  const shared = nameTokens.filter((token) => haystack.has(token)).length;
  return shared / nameTokens.length > 0.5;
}

export function isRelevantPrimaryPage(hit: SearchHit, entityName: string): boolean {
  return !isExcludedPage(hit) && hasLexicalOverlap(entityName, hit);
}

/**
 * A sub-entity page must carry its own name in the title, or overlap with it
 * and read as the right kind of page.
 */
export function isRelevantSubEntityPage(hit: SearchHit, name: string, terms: readonly string[]): boolean {
  if (isExcludedPage(hit)) {
    return false;
  }
  if (hit.title.toLowerCase().includes(name.toLowerCase().trim())) {
    return true;
  }
  const snippetTokens = new Set(tokenize(stripTags(hit.snippet)));
  return hasLexicalOverlap(name, hit) && terms.some((term) => snippetTokens.has(term));
}
