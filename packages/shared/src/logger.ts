import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** `LOG_LEVEL` wins; test runs default to silent, everything else to info. */
export function resolveLogLevel(env: Readonly<Record<string, string | undefined>> = process.env): LogLevel {
  const envLevel = env['LOG_LEVEL'];
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return env['VITEST'] ? 'silent' : 'info';
}

export const logger = pino({
  name: 'quarry',
  level: resolveLogLevel(),
  redact: ['apiKey', 'headers.authorization', 'headers.Authorization'],
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
