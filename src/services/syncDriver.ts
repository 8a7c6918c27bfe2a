/**
 * Sync Driver
 * Mirrors the issues of one GitHub repository onto one Astuto board
 */

import type { Logger } from 'winston';
import type {
  IssueRecord,
  IssueSource,
  PostDestination,
  PublishResult,
  ReaderWaitEvent,
  SyncConfig,
  SyncState,
  SyncSummary,
} from '../types';
import { RateLimitExceededError, SourceFetchFailedError, SyncError, describeError } from '../utils/errors';
import { formatDuration, sleep, truncate, type Sleep } from '../utils/helpers';
import { createSyncLogger } from '../utils/logger';
import { AstutoService } from './astuto';
import { GitHubIssueReader } from './github';
import { PostPublisher, buildMarkerIndex, classifyDestinationError, normalizeSourceUrl } from './publisher';

export interface SyncDependencies {
  /** Defaults to a `GitHubIssueReader` built from the config */
  source?: IssueSource;
  /** Defaults to an `AstutoService` built from the config */
  destination?: PostDestination;
  sleep?: Sleep;
  onStateChange?: (state: SyncState) => void;
}

export function createIssueReader(config: SyncConfig, log: Logger, wait: Sleep = sleep): GitHubIssueReader {
  return new GitHubIssueReader({
    apiUrl: config.github.apiUrl,
    userAgent: config.github.userAgent,
    pageSize: config.github.pageSize,
    timeoutMs: config.timeoutMs,
    retryPolicy: config.retry,
    rateLimit: config.rateLimit,
    sleep: wait,
    // Octokit reports every failed request; retries and failures are logged by onWait and the summary
    log: {
      debug: (message: string) => log.debug(message),
      info: (message: string) => log.debug(message),
      warn: (message: string) => log.warn(message),
      error: (message: string) => log.debug(message),
    },
    onWait: event => logReaderWait(log, event),
  });
}

/**
 * Run one sync. Per-issue failures are counted and the run goes on; a failure
 * to read the board or the issue list ends the run with `finalState: 'fatal'`.
 * Resolves in every case.
 */
export async function runSync(config: SyncConfig, deps: SyncDependencies = {}): Promise<SyncSummary> {
  const { owner, repo, state: stateFilter } = config.github;
  const boardId = config.astuto.boardId;
  const log = createSyncLogger(`${owner}/${repo}`, boardId);
  const wait = deps.sleep ?? sleep;
  const source = deps.source ?? createIssueReader(config, log, wait);
  const destination =
    deps.destination ??
    new AstutoService({ baseUrl: config.astuto.baseUrl, apiKey: config.astuto.apiKey, timeoutMs: config.timeoutMs });

  const startedAt = Date.now();
  const transition = (next: SyncState) => deps.onStateChange?.(next);
  const summary: SyncSummary = {
    created: 0,
    skipped: 0,
    failed: 0,
    total: 0,
    failures: [],
    finalState: 'done',
  };

  transition('start');
  log.info('Starting GitHub → Astuto sync', { stateFilter });

  // Markers of every issue already on the board, plus those created during this run
  let mirrored: Set<string>;
  try {
    const posts = await destination.listPosts(boardId);
    mirrored = buildMarkerIndex(posts);
    log.info('Loaded Astuto board snapshot', { posts: posts.length, mirrored: mirrored.size });
  } catch (error) {
    const failure = classifyDestinationError(error);
    summary.finalState = 'fatal';
    summary.fatalError = { kind: failure.kind, stage: 'snapshot', message: failure.message };
    transition('fatal');
    logSyncSummary(log, summary, Date.now() - startedAt);
    return summary;
  }

  const publisher = new PostPublisher(destination, {
    boardId,
    statuses: config.astuto.statuses,
    retryPolicy: config.retry,
    sleep: wait,
    onRetry: info => log.warn('Retrying Astuto post creation', info),
  });

  transition('fetching');
  try {
    for await (const issue of source.fetchAllIssues(owner, repo, stateFilter)) {
      transition('publishing');
      const result = await publisher.publish(issue, mirrored);
      recordOutcome(summary, result);
      logOutcome(log, issue, result);

      if (result.status === 'created') {
        mirrored.add(normalizeSourceUrl(issue.sourceUrl));
        if (config.publishDelayMs > 0) {
          await wait(config.publishDelayMs);
        }
      }
      transition('fetching');
    }
    transition('done');
  } catch (error) {
    summary.finalState = 'fatal';
    summary.fatalError = {
      kind: error instanceof SyncError ? error.kind : 'SourceFetchFailed',
      stage: 'fetch',
      message: describeError(error),
      page: error instanceof RateLimitExceededError || error instanceof SourceFetchFailedError ? error.page : undefined,
    };
    transition('fatal');
  }

  logSyncSummary(log, summary, Date.now() - startedAt);
  return summary;
}

function recordOutcome(summary: SyncSummary, result: PublishResult): void {
  summary.total++;
  switch (result.status) {
    case 'created':
      summary.created++;
      break;
    case 'skipped':
      summary.skipped++;
      break;
    case 'failed':
      summary.failed++;
      summary.failures.push({
        sourceId: result.sourceId,
        kind: result.kind,
        reason: result.reason,
        httpStatus: result.httpStatus,
      });
      break;
  }
}

function logOutcome(log: Logger, issue: IssueRecord, result: PublishResult): void {
  const title = truncate(issue.title, 80);
  switch (result.status) {
    case 'created':
      log.info('Created Astuto post', { sourceId: issue.sourceId, postId: result.postId, title });
      break;
    case 'skipped':
      log.info('Skipped issue already on the board', { sourceId: issue.sourceId, title });
      break;
    case 'failed':
      log.error('Failed to create Astuto post', {
        sourceId: issue.sourceId,
        stage: 'publish',
        kind: result.kind,
        httpStatus: result.httpStatus,
        attempts: result.attempts,
        error: result.reason,
      });
      break;
  }
}

function logReaderWait(log: Logger, event: ReaderWaitEvent): void {
  const message =
    event.reason === 'request-failed'
      ? 'GitHub request failed, retrying'
      : 'GitHub rate limit reached, waiting';
  log.warn(message, { ...event, wait: formatDuration(event.delayMs) });
}

export function logSyncSummary(log: Logger, summary: SyncSummary, durationMs: number): void {
  const counts = {
    total: summary.total,
    created: summary.created,
    skipped: summary.skipped,
    failed: summary.failed,
    duration: formatDuration(durationMs),
  };

  for (const failure of summary.failures) {
    log.error('Issue not mirrored', { ...failure });
  }

  if (summary.fatalError) {
    log.error('GitHub → Astuto sync aborted', { ...counts, ...summary.fatalError });
    return;
  }
  log.info('GitHub → Astuto sync complete', counts);
}
