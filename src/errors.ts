/**
 * Error types raised by the relay.
 * @packageDocumentation
 */

/**
 * Message text of an error. Node reports a failed dual-stack connect as an
 * AggregateError with an empty message, so the inner messages are used.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof AggregateError && err.message === '') {
    return err.errors.map((e) => errorMessage(e)).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * The Anthropic dialect received a model that has no upstream mapping.
 */
export class ModelNotMappedError extends Error {
  readonly model: string;
  readonly tableName: string;

  constructor(model: string, tableName: string) {
    super(`Model '${model}' not found in ${tableName}`);
    this.name = 'ModelNotMappedError';
    this.model = model;
    this.tableName = tableName;
  }
}

/**
 * The upstream could not be reached, or the exchange failed before a
 * complete response was available.
 */
export class ConnectionError extends Error {
  readonly code: string | undefined;

  constructor(cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = 'ConnectionError';
    this.code =
      cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
        ? cause.code
        : undefined;
  }
}

export class UpstreamTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Upstream exchange exceeded ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class BodyTooLargeError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body too large (max ${limit} bytes)`);
    this.name = 'BodyTooLargeError';
    this.limit = limit;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
