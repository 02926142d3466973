import type { Clock } from './gateway/clock.js';

export interface FakeClock extends Clock {
  advance(ms: number): void;
  readonly sleeps: number[];
}

/**
 * Clock whose sleep advances simulated time immediately. For use in unit tests only.
 */
export function createFakeClock(start: number = 0): FakeClock {
  let current = start;
  const sleeps: number[] = [];

  return {
    now: () => current,
    sleep(ms: number): Promise<void> {
      sleeps.push(ms);
      current += ms;
      return Promise.resolve();
    },
    advance(ms: number): void {
      current += ms;
    },
    sleeps,
  };
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
