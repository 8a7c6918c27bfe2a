/**
 * Core type definitions for the GitHub → Astuto issue mirror
 */

// Source Types
export type IssueState = 'open' | 'closed';
export type IssueStateFilter = IssueState | 'all';

export interface IssueRecord {
  sourceId: number; // issue number, unique within the repository
  title: string;
  body: string;
  sourceUrl: string;
  state: IssueState;
  createdAt: string;
}

export interface IssueSource {
  fetchAllIssues(owner: string, repo: string, state: IssueStateFilter): AsyncIterable<IssueRecord>;
}

export type ReaderWaitReason = 'rate-limited' | 'quota-exhausted' | 'request-failed';

export interface ReaderWaitEvent {
  reason: ReaderWaitReason;
  page: number;
  attempt: number;
  delayMs: number;
  error?: string;
}

// Destination Types
export interface AstutoPost {
  id: number;
  title: string;
  description?: string | null;
  board_id?: number;
}

export interface CreatePostInput {
  title: string;
  description: string;
  boardId: number;
  status?: string;
}

export type PostStatusMap = Partial<Record<IssueState, string>>;

export interface CreatedPost {
  id?: number;
}

export interface PostDestination {
  listPosts(boardId: number): Promise<AstutoPost[]>;
  createPost(input: CreatePostInput): Promise<CreatedPost>;
}

// Errors
export type SyncErrorKind =
  | 'RateLimitExceeded'
  | 'SourceFetchFailed'
  | 'DestinationAuthError'
  | 'DestinationValidationError'
  | 'TransientNetworkError'
  | 'ConfigError';

// Publish Types
export type PublishResult =
  | { status: 'created'; sourceId: number; postId?: number; attempts: number }
  | { status: 'skipped'; sourceId: number }
  | {
      status: 'failed';
      sourceId: number;
      kind: SyncErrorKind;
      reason: string;
      httpStatus?: number;
      attempts: number;
    };

// Run Types
export type SyncState = 'start' | 'fetching' | 'publishing' | 'done' | 'fatal';

export interface SyncFailure {
  sourceId: number;
  kind: SyncErrorKind;
  reason: string;
  httpStatus?: number;
}

export interface FatalSyncError {
  kind: SyncErrorKind;
  stage: 'snapshot' | 'fetch';
  message: string;
  page?: number;
}

export interface SyncSummary {
  created: number;
  skipped: number;
  failed: number;
  total: number;
  failures: SyncFailure[];
  finalState: 'done' | 'fatal';
  fatalError?: FatalSyncError;
}

// Configuration
export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoff: BackoffStrategy;
}

export interface RateLimitPolicy {
  maxWaits: number;
  fallbackWaitMs: number;
}

export interface SyncConfig {
  github: {
    apiUrl: string;
    owner: string;
    repo: string;
    state: IssueStateFilter;
    pageSize: number;
    userAgent: string;
  };
  astuto: {
    baseUrl: string;
    apiKey: string;
    boardId: number;
    statuses: PostStatusMap;
  };
  timeoutMs: number;
  retry: RetryPolicy;
  rateLimit: RateLimitPolicy;
  publishDelayMs: number;
  schedule: string;
}
