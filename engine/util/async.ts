// engine/util/async.ts — Timeout, abort and retry helpers for upstream calls

import { RequestCancelledError, UpstreamTimeoutError, isCommitLensError } from '../errors.js';

/** Resolve after `ms`, or reject with RequestCancelledError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new RequestCancelledError());

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` with a bounded timeout.
 *
 * The task receives an AbortSignal that fires when the timeout elapses (or the
 * optional parent signal aborts) so the underlying HTTP request is torn down.
 * A timeout always rejects with UpstreamTimeoutError, whatever the task does
 * with the abort.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new RequestCancelledError(`${operation} was cancelled`);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const cancelled = new Promise<never>((_, reject) => {
    if (!parent) return;
    onParentAbort = () => {
      controller.abort();
      reject(new RequestCancelledError(`${operation} was cancelled`));
    };
    parent.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Wait for a shared promise, giving up (for this caller only) when `signal` aborts.
 * The promise itself keeps running for anyone else waiting on it.
 */
export function waitWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new RequestCancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Retry `fn` up to `retries` extra times with exponential backoff
 * (`baseDelayMs * 2^attempt`). By default only retryable engine errors are retried.
 * Aborting `signal` during a backoff wait rejects with RequestCancelledError.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? ((error: unknown) => isCommitLensError(error) && error.retryable);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries || !shouldRetry(error) || options.signal?.aborted) {
        throw error;
      }
      const delayMs = options.baseDelayMs * 2 ** attempt;
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestCancelledError();
}
