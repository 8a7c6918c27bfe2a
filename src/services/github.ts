/**
 * GitHub Issue Reader
 * Pages through the issues of a public repository without authentication
 */

import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import type {
  IssueRecord,
  IssueSource,
  IssueStateFilter,
  RateLimitPolicy,
  ReaderWaitEvent,
  RetryPolicy,
} from '../types';
import { RateLimitExceededError, SourceFetchFailedError, describeError } from '../utils/errors';
import { DEFAULT_RETRY_POLICY, policyDecision, retry, sleep, type Sleep } from '../utils/helpers';

type ListIssuesResponse = RestEndpointMethodTypes['issues']['listForRepo']['response'];
type GitHubIssue = ListIssuesResponse['data'][number];
type ResponseHeaders = ListIssuesResponse['headers'];

interface OctokitLog {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

// GitHub's reset timestamp has one-second resolution
const RATE_LIMIT_RESET_BUFFER_MS = 1000;

export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  maxWaits: 3,
  fallbackWaitMs: 60_000,
};

export interface GitHubIssueReaderOptions {
  apiUrl?: string;
  userAgent?: string;
  pageSize?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  rateLimit?: RateLimitPolicy;
  /** Prebuilt client, used as is; `apiUrl`, `userAgent` and `log` are then ignored. */
  octokit?: Octokit;
  log?: OctokitLog;
  sleep?: Sleep;
  now?: () => number;
  onWait?: (event: ReaderWaitEvent) => void;
}

interface IssuePage {
  issues: IssueRecord[];
  rawCount: number;
  remaining?: number;
  resetAt?: Date;
}

interface RateLimitHit {
  waitMs: number;
  resetAt?: Date;
}

export class GitHubIssueReader implements IssueSource {
  private octokit: Octokit;
  private pageSize: number;
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;
  private rateLimit: RateLimitPolicy;
  private sleep: Sleep;
  private now: () => number;
  private onWait?: (event: ReaderWaitEvent) => void;

  constructor(options: GitHubIssueReaderOptions = {}) {
    this.octokit =
      options.octokit ??
      new Octokit({
        baseUrl: options.apiUrl,
        userAgent: options.userAgent,
        log: options.log,
      });
    this.pageSize = options.pageSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.rateLimit = options.rateLimit ?? DEFAULT_RATE_LIMIT_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.onWait = options.onWait;
  }

  /**
   * Yield every issue of the repository, oldest first. Each call starts over
   * from the first page. Throws `RateLimitExceededError` or
   * `SourceFetchFailedError` once a page cannot be fetched.
   */
  async *fetchAllIssues(owner: string, repo: string, state: IssueStateFilter): AsyncGenerator<IssueRecord> {
    for (let page = 1; ; page++) {
      const batch = await this.fetchPage(owner, repo, state, page);
      yield* batch.issues;

      if (batch.rawCount < this.pageSize) return;

      if (batch.remaining === 0) {
        const delayMs = this.waitUntil(batch.resetAt);
        this.onWait?.({ reason: 'quota-exhausted', page: page + 1, attempt: 0, delayMs });
        await this.sleep(delayMs);
      }
    }
  }

  private async fetchPage(owner: string, repo: string, state: IssueStateFilter, page: number): Promise<IssuePage> {
    const tally: { waits: number; failures: number; resetAt?: Date } = { waits: 0, failures: 0 };

    const result = await retry(() => this.requestPage(owner, repo, state, page), {
      policy: this.retryPolicy,
      sleep: this.sleep,
      decide: error => {
        const hit = this.rateLimitHit(error);
        if (hit) {
          tally.resetAt = hit.resetAt;
          if (tally.waits >= this.rateLimit.maxWaits) return { retry: false };
          tally.waits++;
          return { retry: true, delayMs: hit.waitMs };
        }
        tally.failures++;
        return policyDecision(this.retryPolicy, tally.failures);
      },
      onRetry: ({ error, attempt, delayMs }) => {
        this.onWait?.({
          reason: isRateLimitResponse(error) ? 'rate-limited' : 'request-failed',
          page,
          attempt,
          delayMs,
          error: describeError(error),
        });
      },
    });

    if (result.ok) return result.value;

    if (isRateLimitResponse(result.error)) {
      throw new RateLimitExceededError(page, tally.waits, tally.resetAt, result.error);
    }
    const status = result.error instanceof RequestError ? result.error.status : undefined;
    throw new SourceFetchFailedError(page, result.attempts, result.error, status);
  }

  private async requestPage(owner: string, repo: string, state: IssueStateFilter, page: number): Promise<IssuePage> {
    const response = await this.octokit.issues.listForRepo({
      owner,
      repo,
      state,
      page,
      per_page: this.pageSize,
      sort: 'created',
      direction: 'asc',
      request: { signal: AbortSignal.timeout(this.timeoutMs) },
    });

    return {
      // The issues endpoint lists pull requests as well
      issues: response.data.filter(issue => !issue.pull_request).map(toIssueRecord),
      rawCount: response.data.length,
      remaining: headerNumber(response.headers['x-ratelimit-remaining']),
      resetAt: resetDate(response.headers['x-ratelimit-reset']),
    };
  }

  private rateLimitHit(error: unknown): RateLimitHit | undefined {
    if (!(error instanceof RequestError) || !isRateLimitResponse(error)) return undefined;

    const headers: ResponseHeaders = error.response?.headers ?? {};
    const resetAt = resetDate(headers['x-ratelimit-reset']);
    const retryAfter = headerNumber(headers['retry-after']);
    if (retryAfter !== undefined) {
      return { waitMs: retryAfter * 1000, resetAt };
    }
    return { waitMs: this.waitUntil(resetAt), resetAt };
  }

  private waitUntil(resetAt?: Date): number {
    if (!resetAt) return this.rateLimit.fallbackWaitMs;
    return Math.max(resetAt.getTime() - this.now(), 0) + RATE_LIMIT_RESET_BUFFER_MS;
  }
}

function isRateLimitResponse(error: unknown): boolean {
  if (!(error instanceof RequestError)) return false;
  if (error.status === 429) return true;
  if (error.status !== 403) return false;

  const headers: ResponseHeaders = error.response?.headers ?? {};
  return (
    headerNumber(headers['x-ratelimit-remaining']) === 0 ||
    headers['retry-after'] !== undefined ||
    /rate limit/i.test(error.message)
  );
}

function toIssueRecord(issue: GitHubIssue): IssueRecord {
  return {
    sourceId: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    sourceUrl: issue.html_url,
    state: issue.state === 'closed' ? 'closed' : 'open',
    createdAt: issue.created_at,
  };
}

function headerNumber(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(String(value).trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

function resetDate(value: string | number | undefined): Date | undefined {
  const seconds = headerNumber(value);
  return seconds !== undefined && seconds > 0 ? new Date(seconds * 1000) : undefined;
}
