// engine/errors.ts — Error taxonomy shared by every engine component

export type ErrorKind =
  | 'ContextUnavailable'
  | 'ContextTooLarge'
  | 'InvalidScopePrecondition'
  | 'UpstreamTimeout'
  | 'ProviderUnavailable'
  | 'ProviderRateLimited'
  | 'ContentRejected'
  | 'CacheUnavailable'
  | 'AuthInvalid'
  | 'NotFound'
  | 'RateLimited'
  | 'SourceUnavailable'
  | 'RequestCancelled';

/**
 * Base class for every failure the engine surfaces to callers.
 * `kind` is the stable discriminant; `retryable` marks transient upstream failures.
 */
export class CommitLensError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = `${kind}Error`;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

export class ContextUnavailableError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('ContextUnavailable', message, { cause });
  }
}

export class ContextTooLargeError extends CommitLensError {
  readonly budget: number;
  readonly required: number;

  constructor(message: string, budget: number, required: number) {
    super('ContextTooLarge', message);
    this.budget = budget;
    this.required = required;
  }
}

export class InvalidScopePreconditionError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('InvalidScopePrecondition', message, { cause });
  }
}

export class UpstreamTimeoutError extends CommitLensError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('UpstreamTimeout', `${operation} did not complete within ${timeoutMs}ms`, { retryable: true });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderUnavailableError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('ProviderUnavailable', message, { cause, retryable: true });
  }
}

export class ProviderRateLimitedError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('ProviderRateLimited', message, { cause, retryable: true });
  }
}

export class ContentRejectedError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('ContentRejected', message, { cause });
  }
}

export class CacheUnavailableError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('CacheUnavailable', message, { cause });
  }
}

export class AuthInvalidError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('AuthInvalid', message, { cause });
  }
}

export class NotFoundError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('NotFound', message, { cause });
  }
}

export class RateLimitedError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('RateLimited', message, { cause, retryable: true });
  }
}

export class SourceUnavailableError extends CommitLensError {
  constructor(message: string, cause?: unknown) {
    super('SourceUnavailable', message, { cause, retryable: true });
  }
}

export class RequestCancelledError extends CommitLensError {
  constructor(message = 'Request was cancelled before the result was available') {
    super('RequestCancelled', message);
  }
}

export function isCommitLensError(value: unknown): value is CommitLensError {
  return value instanceof CommitLensError;
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
