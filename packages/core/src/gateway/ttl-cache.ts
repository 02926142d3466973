import { systemClock, type Clock } from './clock.js';

export interface CacheEntry<T> {
  readonly key: string;
  readonly value: T;
  readonly createdAt: number;
  readonly ttlMs: number;
}

export interface TtlCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T, ttlMs?: number): void;
  delete(key: string): boolean;
  purgeExpired(): number;
  clear(): void;
  size(): number;
}

function isExpired(entry: CacheEntry<unknown>, now: number): boolean {
  return now - entry.createdAt > entry.ttlMs;
}

/**
 * In-memory TTL store. Lookups evict the entry they hit; writes sweep every
 * expired entry at most once per default TTL.
 */
export function createTtlCache<T>(defaultTtlMs: number, clock: Clock = systemClock): TtlCache<T> {
  const entries = new Map<string, CacheEntry<T>>();
  let lastSweep = clock.now();

  function purge(now: number): number {
    let removed = 0;
    for (const [key, entry] of entries) {
      if (isExpired(entry, now)) {
        entries.delete(key);
        removed++;
      }
    }
    lastSweep = now;
    return removed;
  }

  return {
    get(key: string): T | undefined {
      const entry = entries.get(key);
      if (!entry) {
        return undefined;
      }
      if (isExpired(entry, clock.now())) {
        entries.delete(key);
        return undefined;
      }
      return entry.value;
    },

    set(key: string, value: T, ttlMs: number = defaultTtlMs): void {
      const now = clock.now();
      if (now - lastSweep >= defaultTtlMs) {
        purge(now);
      }
      entries.set(key, { key, value, createdAt: now, ttlMs });
    },

    delete(key: string): boolean {
      return entries.delete(key);
    },

    purgeExpired(): number {
      return purge(clock.now());
    },

    clear(): void {
      entries.clear();
    },

    size(): number {
      return entries.size;
    },
  };
}
