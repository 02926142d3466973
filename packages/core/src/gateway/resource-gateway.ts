import type { z } from 'zod';
import type { GatewayConfig } from '@quarry/schemas/src/gateway.schema.js';
import { createChildLogger } from '@quarry/shared/src/logger.js';
import { TransportError, UpstreamQueryError, toError } from '@quarry/shared/src/utils/errors.js';
import { systemClock, type Clock } from './clock.js';
import { buildCacheKey } from './cache-key.js';
import { createRateLimiter, type RateUsage } from './rate-limiter.js';
import { createTtlCache } from './ttl-cache.js';

const log = createChildLogger('gateway:resource');

export type QueryValue = string | number | boolean | undefined;

export interface GatewayRequest<T> {
  readonly url: string;
  readonly method?: 'GET' | 'POST';
  readonly query?: Readonly<Record<string, QueryValue>>;
  readonly form?: Readonly<Record<string, string>>;
  readonly json?: unknown;
  readonly headers?: Readonly<Record<string, string>>;
  readonly responseType?: 'json' | 'text';
  /** Contract for the response body; a mismatch is an UpstreamQueryError. */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Cache the raw body under a key derived from the request when set. */
  readonly cacheTtlMs?: number;
  readonly label?: string;
}

export type GatewayError = TransportError | UpstreamQueryError;

export type GatewayResult<T> =
  | {
      readonly ok: true;
      readonly data: T;
      readonly status?: number;
      readonly attempts: number;
      readonly fromCache: boolean;
    }
  | { readonly ok: false; readonly error: GatewayError };

export interface GatewayDeps {
  readonly fetchFn?: typeof fetch;
  readonly clock?: Clock;
}

export interface ResourceGateway {
  acquire(): Promise<number>;
  fetch<T>(request: GatewayRequest<T>): Promise<GatewayResult<T>>;
  /** Runs an SDK call under the same admission, timeout and retry policy as fetch. */
  execute<T>(
    label: string,
    operation: (signal: AbortSignal) => Promise<T>,
  ): Promise<GatewayResult<T>>;
  cacheGet(key: string): unknown;
  cacheSet(key: string, value: unknown, ttlMs?: number): void;
  purgeExpired(): number;
  usage(): RateUsage;
}

interface RawResponse {
  readonly status: number;
  readonly body: unknown;
}

class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    detail: string,
  ) {
    super(`HTTP ${String(status)}: ${detail}`);
    this.name = 'HttpStatusError';
  }
}

function buildUrl(url: string, query?: Readonly<Record<string, QueryValue>>): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function buildInit<T>(request: GatewayRequest<T>, userAgent: string, signal: AbortSignal): RequestInit {
  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    Accept: request.responseType === 'text' ? 'text/html, text/plain, */*' : 'application/json',
    ...request.headers,
  };

  let body: string | URLSearchParams | undefined;
  if (request.form) {
    body = new URLSearchParams({ ...request.form });
  } else if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  }

  return {
    method: request.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
    signal,
  };
}

export function createResourceGateway(
  config: GatewayConfig,
  deps: GatewayDeps = {},
): ResourceGateway {
  const clock = deps.clock ?? systemClock;
  const fetchFn = deps.fetchFn ?? globalThis.fetch;
  const rateLimiter = createRateLimiter(config, clock);
  const cache = createTtlCache<unknown>(config.cacheTtlSeconds * 1000, clock);
  const timeoutMs = config.requestTimeoutSeconds * 1000;
  const retryDelayMs = config.retryDelaySeconds * 1000;

  log.info(
    {
      requestsPerMinute: config.requestsPerMinute,
      requestsPerHour: config.requestsPerHour,
      maxRetries: config.maxRetries,
      backoff: config.backoff,
    },
    'Creating resource gateway',
  );

  function computeDelayMs(attempt: number): number {
    return config.backoff === 'exponential' ? retryDelayMs * Math.pow(2, attempt - 1) : retryDelayMs;
  }

  async function withTimeout<T>(
    label: string,
    attempt: number,
    operation: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          reject(
            new TransportError(`${label} timed out after ${String(timeoutMs)}ms`, attempt),
          );
        },
        { once: true },
      );
    });
    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      return await Promise.race([operation(controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  async function execute<T>(
    label: string,
    operation: (signal: AbortSignal) => Promise<T>,
  ): Promise<GatewayResult<T>> {
    let lastError: Error | undefined;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
      await rateLimiter.acquire();

      try {
        const data = await withTimeout(label, attempt, operation);
        return { ok: true, data, attempts: attempt, fromCache: false };
      } catch (error) {
        if (error instanceof UpstreamQueryError) {
          log.warn({ label, error: error.message }, 'Upstream returned an unexpected body');
          return { ok: false, error };
        }

        lastError = toError(error);
        lastStatus = error instanceof HttpStatusError ? error.status : undefined;

        log.warn(
          { label, attempt, maxRetries: config.maxRetries, error: lastError.message },
          'Outbound request failed',
        );

        if (attempt < config.maxRetries) {
          await clock.sleep(computeDelayMs(attempt));
        }
      }
    }

    log.error({ label, attempts: config.maxRetries }, 'All retry attempts failed');

    return {
      ok: false,
      error: new TransportError(
        `${label} failed after ${String(config.maxRetries)} attempts: ${lastError?.message ?? 'unknown error'}`,
        config.maxRetries,
        lastStatus,
        lastError,
      ),
    };
  }

  function parseBody<T>(request: GatewayRequest<T>, body: unknown, label: string): T {
    const result = request.schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.errors[0];
      throw new UpstreamQueryError(
        `${label} returned an unexpected body: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
        result.error,
      );
    }
    return result.data;
  }

  async function performRequest<T>(
    request: GatewayRequest<T>,
    url: string,
    label: string,
    signal: AbortSignal,
  ): Promise<RawResponse> {
    const response = await fetchFn(url, buildInit(request, config.userAgent, signal));

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new HttpStatusError(response.status, detail.slice(0, 200));
    }

    if (request.responseType === 'text') {
      return { status: response.status, body: await response.text() };
    }

    const text = await response.text();
    try {
      return { status: response.status, body: JSON.parse(text) as unknown };
    } catch (error) {
      throw new UpstreamQueryError(`${label} returned malformed JSON`, toError(error));
    }
  }

  return {
    acquire: () => rateLimiter.acquire(),

    async fetch<T>(request: GatewayRequest<T>): Promise<GatewayResult<T>> {
      const url = buildUrl(request.url, request.query);
      const label = request.label ?? `${request.method ?? 'GET'} ${new URL(request.url).host}`;
      const cacheKey =
        request.cacheTtlMs !== undefined
          ? buildCacheKey('http', {
              url,
              method: request.method,
              form: request.form,
              json: request.json,
              responseType: request.responseType,
            })
          : undefined;

      if (cacheKey !== undefined) {
        const hit = cache.get(cacheKey);
        if (hit !== undefined) {
          try {
            const data = parseBody(request, hit, label);
            log.debug({ label }, 'Cache hit');
            return { ok: true, data, attempts: 0, fromCache: true };
          } catch (error) {
            log.warn({ label, error: toError(error).message }, 'Discarding cached body');
            cache.delete(cacheKey);
          }
        }
      }

      const result = await execute(label, async (signal) => {
        const raw = await performRequest(request, url, label, signal);
        return { raw, data: parseBody(request, raw.body, label) };
      });

      if (!result.ok) {
        return result;
      }

      if (cacheKey !== undefined) {
        cache.set(cacheKey, result.data.raw.body, request.cacheTtlMs);
      }

      return {
        ok: true,
        data: result.data.data,
        status: result.data.raw.status,
        attempts: result.attempts,
        fromCache: false,
      };
    },

    execute,

    cacheGet: (key: string): unknown => cache.get(key),

    cacheSet(key: string, value: unknown, ttlMs?: number): void {
      cache.set(key, value, ttlMs);
    },

    purgeExpired: () => cache.purgeExpired(),

    usage: () => rateLimiter.usage(),
  };
}
