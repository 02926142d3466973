import { describe, it, expect } from 'vitest';
import {
  RELEASE_TERMS,
  hasLexicalOverlap,
  isExcludedPage,
  isRelevantPrimaryPage,
  isRelevantSubEntityPage,
  type SearchHit,
} from './relevance.js';

function hit(title: string, snippet: string = '', namespace: number = 0): SearchHit {
  return { pageId: 1, title, snippet, namespace };
}

describe('isExcludedPage', () => {
  it('should exclude non-article namespaces and disambiguation pages', () => {
    expect(isExcludedPage(hit('Jazz singers', '', 14))).toBe(true);
    expect(isExcludedPage(hit('Nina (disambiguation)'))).toBe(true);
    expect(isExcludedPage(hit('User talk:Someone'))).toBe(true);
    expect(isExcludedPage(hit('Category:Jazz'))).toBe(true);
    expect(isExcludedPage(hit('Nina Simone'))).toBe(false);
  });
});

describe('hasLexicalOverlap', () => {
  it('should match the full name in a highlighted snippet', () => {
    const result = hit(
      'High Priestess of Soul',
      '<span class="searchmatch">Nina</span> <span class="searchmatch">Simone</span> album',
    );
    expect(hasLexicalOverlap('Nina Simone', result)).toBe(true);
  });

  it('should match reordered names', () => {
    expect(hasLexicalOverlap('Nina Simone', hit('Simone, Nina'))).toBe(true);
  });

  it('should require most of the name to overlap', () => {
    expect(hasLexicalOverlap('Nina Simone', hit('Nina Hagen', 'German singer'))).toBe(false);
  });
});

describe('isRelevantPrimaryPage', () => {
  it('should combine exclusion and overlap', () => {
    expect(isRelevantPrimaryPage(hit('Nina Simone discography'), 'Nina Simone')).toBe(true);
    expect(isRelevantPrimaryPage(hit('Nina Simone (disambiguation)'), 'Nina Simone')).toBe(false);
    expect(isRelevantPrimaryPage(hit('Unrelated Person', 'a footballer'), 'Nina Simone')).toBe(false);
  });
});

describe('isRelevantSubEntityPage', () => {
  it('should accept a page titled after the sub-entity', () => {
    expect(isRelevantSubEntityPage(hit('Pastel Blues'), 'Pastel Blues', RELEASE_TERMS)).toBe(true);
  });

  it('should accept an overlapping page that reads as a release', () => {
    const result = hit('Nina Simone', 'her 1965 album pastel blues');
    expect(isRelevantSubEntityPage(result, 'Pastel Blues', RELEASE_TERMS)).toBe(true);
  });

  it('should reject an overlapping page of the wrong kind', () => {
    const result = hit('Pastel colours', 'pastel blues painting');
    expect(isRelevantSubEntityPage(result, 'Pastel Blues', RELEASE_TERMS)).toBe(false);
  });
});
