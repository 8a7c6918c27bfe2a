/**
 * Publishes mirrored issues as Astuto posts
 *
 * Every post carries a marker line pointing back at its GitHub issue. The
 * board itself is the record of what was already mirrored: a post whose
 * description holds the marker of an issue means that issue is done.
 */

import axios from 'axios';
import type { AstutoPost, IssueRecord, PostDestination, PostStatusMap, PublishResult, RetryPolicy } from '../types';
import {
  DestinationAuthError,
  DestinationValidationError,
  SyncError,
  TransientNetworkError,
  describeError,
} from '../utils/errors';
import { DEFAULT_RETRY_POLICY, policyDecision, retry, sleep, type Sleep } from '../utils/helpers';

export const MARKER_PREFIX = 'Originally reported at:';

// "Original URL:" is the footer line written by the first version of the importer
const MARKER_LINE = /^(?:Originally reported at|Original URL):[ \t]*(\S+)$/;

// 429 is throttling, the others a proxy in front of Astuto
const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);

export function markerFor(issue: Pick<IssueRecord, 'sourceUrl'>): string {
  return `${MARKER_PREFIX} ${issue.sourceUrl}`;
}

/**
 * Canonical form of an issue URL used as the lookup key
 */
export function normalizeSourceUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').toLowerCase();
}

/**
 * Issue URL named by the marker in a post's footer. Only the last non-blank
 * line counts; marker lines quoted in the issue body above it are ignored.
 */
export function extractSourceUrl(description: string | null | undefined): string | undefined {
  if (!description) return undefined;
  const last = description
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '')
    .at(-1);
  const match = last === undefined ? null : MARKER_LINE.exec(last);
  return match ? normalizeSourceUrl(match[1]) : undefined;
}

export function buildMarkerIndex(posts: AstutoPost[]): Set<string> {
  const index = new Set<string>();
  for (const post of posts) {
    const url = extractSourceUrl(post.description);
    if (url !== undefined) index.add(url);
  }
  return index;
}

export function isMirrored(issue: Pick<IssueRecord, 'sourceUrl'>, index: ReadonlySet<string>): boolean {
  return index.has(normalizeSourceUrl(issue.sourceUrl));
}

export function formatPostDescription(issue: IssueRecord): string {
  const body = issue.body.trim() || 'No description provided.';
  const opened = issue.createdAt ? `, opened ${issue.createdAt.slice(0, 10)}` : '';

  return [
    body,
    '',
    '---',
    `GitHub issue #${issue.sourceId} (${issue.state})${opened}`,
    markerFor(issue),
  ].join('\n');
}

/**
 * Map a failed Astuto call to one of the sync error kinds
 */
export function classifyDestinationError(error: unknown): SyncError {
  if (error instanceof SyncError) return error;

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new TransientNetworkError(`Astuto unreachable: ${error.message}`, undefined, error);
    }
    const message = responseMessage(error.response?.data) ?? error.message;
    if (status === 401 || status === 403) {
      return new DestinationAuthError(status, message, error);
    }
    if (TRANSIENT_STATUSES.has(status)) {
      return new TransientNetworkError(
        `Astuto temporarily unavailable (HTTP ${status}): ${message}`,
        status,
        error,
        retryAfterMs(error.response?.headers['retry-after'])
      );
    }
    return new DestinationValidationError(message, status, error);
  }

  return new DestinationValidationError(describeError(error), undefined, error);
}

function retryAfterMs(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  if (String(value).trim() === '') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function responseMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim() !== '') return data.trim();
  if (typeof data !== 'object' || data === null) return undefined;

  if ('error' in data && typeof data.error === 'string') return data.error;
  if ('message' in data && typeof data.message === 'string') return data.message;
  if ('errors' in data && Array.isArray(data.errors)) {
    return data.errors.map(entry => String(entry)).join(', ');
  }
  return undefined;
}

export interface PostPublisherOptions {
  boardId: number;
  /** Astuto status to send per issue state; states left out send none */
  statuses?: PostStatusMap;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  onRetry?: (info: { sourceId: number; attempt: number; delayMs: number; error: string }) => void;
}

export class PostPublisher {
  private destination: PostDestination;
  private boardId: number;
  private statuses: PostStatusMap;
  private retryPolicy: RetryPolicy;
  private sleep: Sleep;
  private onRetry?: PostPublisherOptions['onRetry'];

  constructor(destination: PostDestination, options: PostPublisherOptions) {
    this.destination = destination;
    this.boardId = options.boardId;
    this.statuses = options.statuses ?? {};
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.onRetry = options.onRetry;
  }

  /**
   * Create the post for an issue unless `mirrored` already lists it. Failures
   * come back as a `failed` result; this never throws.
   */
  async publish(issue: IssueRecord, mirrored: ReadonlySet<string>): Promise<PublishResult> {
    if (isMirrored(issue, mirrored)) {
      return { status: 'skipped', sourceId: issue.sourceId };
    }

    const result = await retry(
      () =>
        this.destination.createPost({
          title: issue.title,
          description: formatPostDescription(issue),
          boardId: this.boardId,
          status: this.statuses[issue.state],
        }),
      {
        policy: this.retryPolicy,
        sleep: this.sleep,
        decide: (error, attempt) => {
          const failure = classifyDestinationError(error);
          if (!(failure instanceof TransientNetworkError)) return { retry: false };
          const decision = policyDecision(this.retryPolicy, attempt);
          if (decision.retry && failure.retryAfterMs !== undefined) {
            return { retry: true, delayMs: failure.retryAfterMs };
          }
          return decision;
        },
        onRetry: ({ error, attempt, delayMs }) =>
          this.onRetry?.({ sourceId: issue.sourceId, attempt, delayMs, error: describeError(error) }),
      }
    );

    if (result.ok) {
      return { status: 'created', sourceId: issue.sourceId, postId: result.value.id, attempts: result.attempts };
    }

    const failure = classifyDestinationError(result.error);
    return {
      status: 'failed',
      sourceId: issue.sourceId,
      kind: failure.kind,
      reason: failure.message,
      httpStatus: httpStatusOf(failure),
      attempts: result.attempts,
    };
  }
}

function httpStatusOf(error: SyncError): number | undefined {
  if (
    error instanceof DestinationAuthError ||
    error instanceof DestinationValidationError ||
    error instanceof TransientNetworkError
  ) {
    return error.httpStatus;
  }
  return undefined;
}
