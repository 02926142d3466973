import { createChildLogger } from '@quarry/shared/src/logger.js';
import { systemClock, type Clock } from './clock.js';

const log = createChildLogger('gateway:rate-limiter');

const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

export interface RateLimiterConfig {
  readonly requestsPerMinute: number;
  readonly requestsPerHour: number;
}

export interface RateUsage {
  readonly lastMinute: number;
  readonly lastHour: number;
}

export interface RateLimiter {
  /** Resolves with the admission timestamp once both windows have room. */
  acquire(): Promise<number>;
  usage(): RateUsage;
}

function prune(window: number[], now: number, periodMs: number): void {
  while (window.length > 0 && now - window[0] >= periodMs) {
    window.shift();
  }
}

function waitFor(window: readonly number[], ceiling: number, now: number, periodMs: number): number {
  if (window.length < ceiling) {
    return 0;
  }
  return window[window.length - ceiling] + periodMs - now;
}

export function createRateLimiter(config: RateLimiterConfig, clock: Clock = systemClock): RateLimiter {
  const minuteWindow: number[] = [];
  const hourWindow: number[] = [];
  // Admissions run one after another so a prune-check-append never interleaves.
  let tail: Promise<unknown> = Promise.resolve();

  async function admit(): Promise<number> {
    for (;;) {
      const now = clock.now();
      prune(minuteWindow, now, MINUTE_MS);
      prune(hourWindow, now, HOUR_MS);

      const waitMs = Math.max(
        waitFor(minuteWindow, config.requestsPerMinute, now, MINUTE_MS),
        waitFor(hourWindow, config.requestsPerHour, now, HOUR_MS),
      );

      if (waitMs <= 0) {
        minuteWindow.push(now);
        hourWindow.push(now);
        return now;
      }

      log.debug(
        { waitMs, lastMinute: minuteWindow.length, lastHour: hourWindow.length },
        'Rate limit reached, delaying admission',
      );
      await clock.sleep(waitMs);
    }
  }

  return {
    acquire(): Promise<number> {
      const admission = tail.then(admit);
      tail = admission;
      return admission;
    },

    usage(): RateUsage {
      const now = clock.now();
      prune(minuteWindow, now, MINUTE_MS);
      prune(hourWindow, now, HOUR_MS);
      return { lastMinute: minuteWindow.length, lastHour: hourWindow.length };
    },
  };
}
