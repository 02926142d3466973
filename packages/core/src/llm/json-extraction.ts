const FENCE = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

function parseOrUndefined(text: string): { value: unknown } | undefined {
  try {
    return { value: JSON.parse(text) as unknown };
  } catch {
    return undefined;
  }
}

/** The first brace-balanced `{...}` span, skipping braces inside string literals. */
function firstObjectSpan(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}' && --depth === 0) {
      return text.slice(start, i + 1);
    }
  }
  return undefined;
}

/**
 * Reads a model's JSON reply: the whole text, else a fenced block, else the
 * first object embedded in prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  const candidates = [trimmed, FENCE.exec(trimmed)?.[1]?.trim(), firstObjectSpan(trimmed)];

  for (const candidate of candidates) {
    const parsed = candidate ? parseOrUndefined(candidate) : undefined;
    if (parsed) {
      return parsed.value;
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
