import type { ErrorKind } from '../types/translation';

/**
 * A call to a model or translation service failed in transport: timeout,
 * rate limit, connection reset, 5xx. Retryable unless the service rejected
 * the request itself (bad credentials, malformed request).
 */
export class ExternalCallError extends Error {
  readonly kind: ErrorKind = 'external';

  constructor(
    message: string,
    public readonly retryable = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExternalCallError';
  }
}

/** The service answered, but not in the structured shape we asked for. */
export class SchemaError extends Error {
  readonly kind: ErrorKind = 'schema';

  constructor(message: string, public readonly rawPayload: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

/** A caller broke a contract. Never retried. */
export class ValidationError extends Error {
  readonly kind: ErrorKind = 'validation';

  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
