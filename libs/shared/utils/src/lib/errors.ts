/**
 * Research Error Taxonomy
 * Every fault raised by the pipeline carries a FailureKind; callers branch on `kind`.
 */

import { FailureKind } from '@equity-research/shared/types';

export interface ResearchErrorOptions {
  cause?: unknown;
}

export class ResearchError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: ResearchErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResearchError';
    this.kind = kind;
  }
}

export class CapacityExceededError extends ResearchError {
  constructor(limit: number) {
    super(FailureKind.CAPACITY_EXCEEDED, `Maximum of ${limit} concurrent sessions reached`);
    this.name = 'CapacityExceededError';
  }
}

export class SessionNotFoundError extends ResearchError {
  constructor(sessionId: string) {
    super(FailureKind.SESSION_NOT_FOUND, `Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionExpiredError extends ResearchError {
  constructor(sessionId: string) {
    super(FailureKind.SESSION_EXPIRED, `Session ${sessionId} has expired`);
    this.name = 'SessionExpiredError';
  }
}

export class ProviderUnavailableError extends ResearchError {
  constructor(message: string, options?: ResearchErrorOptions) {
    super(FailureKind.PROVIDER_UNAVAILABLE, message, options);
    this.name = 'ProviderUnavailableError';
  }
}

export class RateLimitedError extends ResearchError {
  constructor(message: string, options?: ResearchErrorOptions) {
    super(FailureKind.RATE_LIMITED, message, options);
    this.name = 'RateLimitedError';
  }
}

export class TickerNotFoundError extends ResearchError {
  constructor(ticker: string, options?: ResearchErrorOptions) {
    super(FailureKind.TICKER_NOT_FOUND, `Ticker ${ticker} not found`, options);
    this.name = 'TickerNotFoundError';
  }
}

export class ServiceUnavailableError extends ResearchError {
  constructor(message: string, options?: ResearchErrorOptions) {
    super(FailureKind.SERVICE_UNAVAILABLE, message, options);
    this.name = 'ServiceUnavailableError';
  }
}

export class ResearchFailedError extends ResearchError {
  constructor(message: string, options?: ResearchErrorOptions) {
    super(FailureKind.RESEARCH_FAILED, message, options);
    this.name = 'ResearchFailedError';
  }
}

export class PersistenceFailedError extends ResearchError {
  constructor(message: string, options?: ResearchErrorOptions) {
    super(FailureKind.PERSISTENCE_FAILED, message, options);
    this.name = 'PersistenceFailedError';
  }
}

export class CancelledError extends ResearchError {
  constructor(message = 'Operation cancelled', options?: ResearchErrorOptions) {
    super(FailureKind.CANCELLED, message, options);
    this.name = 'CancelledError';
  }
}

export function isResearchError(error: unknown): error is ResearchError {
  return error instanceof ResearchError;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Normalizes anything thrown inside the pipeline into a ResearchError.
 * Unknown faults become ResearchFailed.
 */
export function toResearchError(error: unknown): ResearchError {
  if (isResearchError(error)) {
    return error;
  }
  return new ResearchFailedError(errorMessage(error), { cause: error });
}
