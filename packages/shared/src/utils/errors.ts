export class QuarryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'QuarryError';
  }
}

/**
 * Network failure, timeout or non-2xx status that survived every retry.
 */
export class TransportError extends QuarryError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

/**
 * The upstream answered, but with a body that does not match the expected contract.
 * Never retried.
 */
export class UpstreamQueryError extends QuarryError {
  constructor(message: string, cause?: Error) {
    super(message, 'UPSTREAM_QUERY_ERROR', cause);
    this.name = 'UpstreamQueryError';
  }
}

export class InvalidInputError extends QuarryError {
  constructor(message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class LlmError extends QuarryError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class AgentError extends QuarryError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class SchemaValidationError extends QuarryError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends QuarryError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
