import { FailureKind } from '@equity-research/shared/types';
import { CancelledError, isResearchError } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  backoffMultiplier?: number;
  /** Hard limit for each attempt; 0 disables the timeout */
  timeoutMs?: number;
  /** Aborting this signal cancels the current attempt and any pending backoff */
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  /** Error raised when an attempt exceeds `timeoutMs` */
  createTimeoutError?: (timeoutMs: number) => Error;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

export const defaultShouldRetry = (error: unknown): boolean => {
  if (error instanceof CancelledError) return false;
  if (isResearchError(error) && error.kind === FailureKind.TICKER_NOT_FOUND) return false;
  return true;
};

/**
 * Runs `operation` with a per-attempt timeout and exponential backoff
 * (`baseDelayMs * backoffMultiplier^attempt`). The operation receives an
 * AbortSignal that fires on timeout or when the caller's signal aborts.
 */
export const withRetry = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxRetries = 3,
    baseDelayMs = 500,
    backoffMultiplier = 2,
    timeoutMs = 0,
    signal,
    shouldRetry = defaultShouldRetry,
    createTimeoutError = (ms: number) => new Error(`Operation timed out after ${ms}ms`),
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfAborted(signal);

    try {
      return await runAttempt(operation, timeoutMs, createTimeoutError, signal);
    } catch (error) {
      lastError = error;

      if (signal?.aborted) {
        throw new CancelledError('Operation cancelled', { cause: error });
      }

      if (!shouldRetry(error) || attempt === maxRetries) {
        throw error;
      }

      const delay = baseDelayMs * Math.pow(backoffMultiplier, attempt);
      onRetry?.(attempt + 1, delay, error);
      await sleep(delay, signal);
    }
  }

  throw lastError;
};

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  createTimeoutError: (timeoutMs: number) => Error,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  parent?.addEventListener('abort', forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const guards: Promise<never>[] = [
    new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(parent?.aborted ? new CancelledError() : createTimeoutError(timeoutMs)),
        { once: true }
      );
    }),
  ];

  if (timeoutMs > 0) {
    timer = setTimeout(() => controller.abort(), timeoutMs);
  }

  try {
    return await Promise.race([operation(controller.signal), ...guards]);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}
