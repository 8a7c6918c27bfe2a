/**
 * Error types raised by the sync
 */

import type { SyncErrorKind } from '../types';

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/**
 * GitHub kept answering with a rate-limit response after every allowed wait.
 */
export class RateLimitExceededError extends SyncError {
  readonly page: number;
  readonly resetAt?: Date;

  constructor(page: number, waits: number, resetAt?: Date, cause?: unknown) {
    const resume = resetAt ? `, quota resets at ${resetAt.toISOString()}` : '';
    super('RateLimitExceeded', `GitHub rate limit still exceeded on page ${page} after ${waits} wait(s)${resume}`, { cause });
    this.page = page;
    this.resetAt = resetAt;
  }
}

export class SourceFetchFailedError extends SyncError {
  readonly page: number;
  readonly httpStatus?: number;

  constructor(page: number, attempts: number, cause: unknown, httpStatus?: number) {
    const status = httpStatus !== undefined ? ` (HTTP ${httpStatus})` : '';
    super('SourceFetchFailed', `Failed to fetch GitHub issues page ${page} after ${attempts} attempt(s)${status}: ${describeError(cause)}`, { cause });
    this.page = page;
    this.httpStatus = httpStatus;
  }
}

export class DestinationAuthError extends SyncError {
  readonly httpStatus: number;

  constructor(httpStatus: number, message: string, cause?: unknown) {
    super('DestinationAuthError', `Astuto rejected the API key (HTTP ${httpStatus}): ${message}`, { cause });
    this.httpStatus = httpStatus;
  }
}

export class DestinationValidationError extends SyncError {
  readonly httpStatus?: number;

  constructor(message: string, httpStatus?: number, cause?: unknown) {
    const status = httpStatus !== undefined ? ` (HTTP ${httpStatus})` : '';
    super('DestinationValidationError', `Astuto rejected the post${status}: ${message}`, { cause });
    this.httpStatus = httpStatus;
  }
}

export class TransientNetworkError extends SyncError {
  readonly httpStatus?: number;
  /** Wait asked for by the server through `Retry-After` */
  readonly retryAfterMs?: number;

  constructor(message: string, httpStatus?: number, cause?: unknown, retryAfterMs?: number) {
    super('TransientNetworkError', message, { cause });
    this.httpStatus = httpStatus;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ConfigError extends SyncError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('ConfigError', `Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
