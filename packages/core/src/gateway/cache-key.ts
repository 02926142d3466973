import { createHash } from 'node:crypto';

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const fields: [string, unknown][] = Object.entries(value);
    return `{${fields
      .filter(([, field]) => field !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, field]) => `${JSON.stringify(key)}:${stableStringify(field)}`)
      .join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Deterministic key for a set of request parameters; property order does not matter.
 */
export function buildCacheKey(namespace: string, params: unknown): string {
  const digest = createHash('sha256').update(stableStringify(params)).digest('hex');
  return `${namespace}:${digest}`;
}
