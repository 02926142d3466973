import { describe, it, expect } from 'vitest';
import type { IndexedPage } from '@quarry/shared/src/types/indexing.types.js';
import { cleanName, createPatternExtractor } from './sub-entity-patterns.js';

function page(content: string): IndexedPage {
  return {
    pageId: 1,
    title: 'Page',
    url: 'https://wiki.example.org/wiki/Page',
    content,
    wordCount: 0,
    categories: [],
    sections: [],
    contentType: 'profile',
  };
}

describe('cleanName', () => {
  it('should strip quotes and trailing durations', () => {
    expect(cleanName(' "Feeling Good" – 2:53')).toBe('Feeling Good');
  });
});

describe('createPatternExtractor', () => {
  const extractor = createPatternExtractor();

  it('should find quoted releases and album header lists', () => {
    const names = extractor.extractReleaseNames([
      page('Her debut "Little Girl Blue" (album) sold well.\nAlbums: Pastel Blues, Wild Is the Wind'),
      page('The album "little girl blue" was reissued.'),
    ]);

    expect(names).toEqual(['Little Girl Blue', 'Pastel Blues', 'Wild Is the Wind']);
  });

  it('should cap release names at ten', () => {
    const list = Array.from({ length: 12 }, (_, i) => `Record ${String(i + 1)}`).join(', ');

    const names = extractor.extractReleaseNames([page(`Albums: ${list}`)]);

    expect(names).toHaveLength(10);
    expect(names[9]).toBe('Record 10');
  });

  it('should find quoted songs, track lines and numbered listings', () => {
    const names = extractor.extractTrackNames([
      page('1. Mood Indigo\n2. "Feeling Good" – 2:53\nTrack 3: Sinnerman\nThe song "Ne me quitte pas" was covered.'),
    ]);

    expect(names).toEqual(['Ne me quitte pas', 'Sinnerman', 'Mood Indigo', 'Feeling Good']);
  });
});
