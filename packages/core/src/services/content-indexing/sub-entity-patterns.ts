import type { IndexedPage } from '@quarry/shared/src/types/indexing.types.js';

export const MAX_RELEASE_NAMES = 10;
export const MAX_TRACK_NAMES = 20;
const MAX_NAME_LENGTH = 120;

/** Pulls candidate sub-entity names out of already indexed pages. */
export interface SubEntityExtractor {
  extractReleaseNames(pages: readonly IndexedPage[]): string[];
  extractTrackNames(pages: readonly IndexedPage[]): string[];
}

export interface NamePattern {
  readonly regex: RegExp;
  /** The capture is a comma-separated list of names. */
  readonly list?: boolean;
}

const RELEASE_PATTERNS: readonly NamePattern[] = [
  { regex: /"([^"\n]+)"\s*\(album\)/gi },
  { regex: /\balbum\s+"([^"\n]+)"/gi },
  { regex: /^albums?:\s*(.+)$/gim, list: true },
];

const TRACK_PATTERNS: readonly NamePattern[] = [
  { regex: /"([^"\n]+)"\s*\((?:song|single)\)/gi },
  { regex: /\bsong\s+"([^"\n]+)"/gi },
  { regex: /^track\s+\d+\s*[:.-]?\s*(.+)$/gim },
  { regex: /^\d{1,2}\.\s*(.+)$/gm },
];

export function cleanName(raw: string): string {
  return raw
    .trim()
    .replace(/\s*[-–]\s*\d{1,2}:\d{2}$/, '')
    .replace(/^["'\s]+|["'\s,;.]+$/g, '');
}

export function collectNames(
  pages: readonly IndexedPage[],
  patterns: readonly NamePattern[],
  cap: number,
): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  for (const page of pages) {
    for (const pattern of patterns) {
      for (const match of page.content.matchAll(pattern.regex)) {
        const parts = pattern.list ? match[1].split(',') : [match[1]];
        for (const part of parts) {
          const name = cleanName(part);
          const key = name.toLowerCase();
          if (name && name.length <= MAX_NAME_LENGTH && !seen.has(key)) {
            seen.add(key);
            names.push(name);
          }
        }
      }
    }
  }

  return names.slice(0, cap);
}

export function createPatternExtractor(): SubEntityExtractor {
  return {
    extractReleaseNames: (pages) => collectNames(pages, RELEASE_PATTERNS, MAX_RELEASE_NAMES),
    extractTrackNames: (pages) => collectNames(pages, TRACK_PATTERNS, MAX_TRACK_NAMES),
  };
}
