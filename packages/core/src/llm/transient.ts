import { createChildLogger } from '@quarry/shared/src/logger.js';
import { LlmError, toError } from '@quarry/shared/src/utils/errors.js';

const log = createChildLogger('llm:transient');

export const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
];

function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = statusOf(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

async function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retries transient model failures with jittered exponential backoff. Anything
 * else surfaces at once as a non-retryable LlmError.
 */
export async function withTransientRetry<T>(
  label: string,
  operation: () => Promise<T>,
  sleep: (ms: number) => Promise<void> = defaultSleep,
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      if (!isTransientError(error)) {
        throw new LlmError(`${label} failed: ${lastError.message}`, false, lastError);
      }

      log.warn(
        { label, attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
        'Transient LLM error, retrying',
      );

      if (attempt < MAX_TRANSIENT_RETRIES - 1) {
        await sleep(computeBackoffMs(attempt));
      }
    }
  }

  throw new LlmError(
    `${label} failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
    true,
    lastError,
  );
}

/**
 * Settles with the operation, or rejects with a non-retryable LlmError once
 * `timeoutMs` elapses. The timer never outlives the race.
 */
export async function withTimeout<T>(label: string, operation: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new LlmError(`${label} timed out after ${String(timeoutMs)} ms`, false));
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface VertexSettings {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
}

export interface VertexOptions {
  readonly projectId?: string;
  readonly location?: string;
  readonly model?: string;
  /** Per-attempt bound on a model call; aborts the underlying request. */
  readonly timeoutMs?: number;
}

export function resolveVertexSettings(options: VertexOptions = {}): VertexSettings | undefined {
  const projectId =
    options.projectId ?? process.env['QUARRY_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  if (!projectId) {
    return undefined;
  }
  return {
    projectId,
    location: options.location ?? process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1',
    model: options.model ?? 'gemini-2.0-flash',
  };
}

export function isMockLlmEnabled(): boolean {
  return process.env['QUARRY_MOCK_LLM'] === 'true';
}
