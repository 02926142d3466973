const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
};

// Elements whose content never reads as article prose.
const DROPPED_ELEMENTS = ['script', 'style', 'noscript', 'nav', 'header', 'footer', 'aside', 'svg', 'form'];

// Wikipedia chrome: navboxes, reference markers, edit links, hatnotes.
const DROPPED_CLASSES = ['navbox', 'reference', 'mw-editsection', 'hatnote', 'reflist', 'metadata', 'noprint'];

const BLOCK_TAGS = /<\/?(?:p|div|li|ul|ol|tr|table|h[1-6]|br|dd|dt|section|article|blockquote)\b[^>]*>/gi;

const MAX_CODE_POINT = 0x10ffff;
const REPLACEMENT_CHARACTER = '\uFFFD';

function fromCodePoint(codePoint: number): string {
  if (!Number.isInteger(codePoint) || codePoint > MAX_CODE_POINT) {
    return REPLACEMENT_CHARACTER;
  }
  return String.fromCodePoint(codePoint);
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]*>/g, '')).trim();
}

/**
 * Plain text from rendered article HTML. Block boundaries become line breaks
 * so list-shaped content (track listings, "Albums:" lines) survives.
 */
export function htmlToText(html: string): string {
  let cleaned = html.replace(/<!--[\s\S]*?-->/g, '');

  for (const tag of DROPPED_ELEMENTS) {
    cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?</${tag}>`, 'gi'), '');
  }
  for (const cls of DROPPED_CLASSES) {
    cleaned = cleaned.replace(
      new RegExp(`<(sup|span|div|table)\\b[^>]*class="[^"]*\\b${cls}\\b[^"]*"[^>]*>[\\s\\S]*?</\\1>`, 'gi'),
      '',
    );
  }

  const text = decodeEntities(cleaned.replace(BLOCK_TAGS, '\n').replace(/<[^>]*>/g, ''));

  return text
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
