/**
 * Environment configuration
 *
 * Read once at startup and passed down as a plain `SyncConfig` object; nothing
 * else in the codebase looks at `process.env` for sync settings.
 */

import { z } from 'zod';
import type { SyncConfig } from '../types';
import { ConfigError } from './errors';

const CRON_FIELD = /^[\d*/,-]+$/;

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const integer = (name: string, min: number, max: number, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(min, `${name} must be at least ${min}`)
    .max(max, `${name} must be at most ${max}`)
    .default(fallback);

const envSchema = z.object({
  ASTUTO_API_KEY: required('ASTUTO_API_KEY'),
  ASTUTO_BASE_URL: required('ASTUTO_BASE_URL').url('ASTUTO_BASE_URL must be a valid URL'),
  ASTUTO_BOARD_ID: required('ASTUTO_BOARD_ID').pipe(
    z.coerce
      .number({ invalid_type_error: 'ASTUTO_BOARD_ID must be a number' })
      .int('ASTUTO_BOARD_ID must be an integer')
      .positive('ASTUTO_BOARD_ID must be positive')
  ),
  ASTUTO_OPEN_STATUS: z.string().trim().optional(),
  ASTUTO_CLOSED_STATUS: z.string().trim().optional(),
  GITHUB_OWNER: required('GITHUB_OWNER'),
  GITHUB_REPO: required('GITHUB_REPO'),
  GITHUB_ISSUE_STATE: z
    .enum(['open', 'closed', 'all'], {
      errorMap: () => ({ message: 'GITHUB_ISSUE_STATE must be one of open, closed, all' }),
    })
    .default('all'),
  GITHUB_API_URL: z.string().url('GITHUB_API_URL must be a valid URL').default('https://api.github.com'),
  GITHUB_PAGE_SIZE: integer('GITHUB_PAGE_SIZE', 1, 100, 100),
  GITHUB_USER_AGENT: z.string().min(1).default('astuto-issue-mirror'),
  HTTP_TIMEOUT_MS: integer('HTTP_TIMEOUT_MS', 1, 10 * 60 * 1000, 30_000),
  SYNC_MAX_ATTEMPTS: integer('SYNC_MAX_ATTEMPTS', 1, 10, 3),
  SYNC_RETRY_DELAY_MS: integer('SYNC_RETRY_DELAY_MS', 0, 60_000, 1000),
  SYNC_RETRY_BACKOFF: z
    .enum(['fixed', 'exponential'], {
      errorMap: () => ({ message: 'SYNC_RETRY_BACKOFF must be fixed or exponential' }),
    })
    .default('exponential'),
  RATE_LIMIT_MAX_WAITS: integer('RATE_LIMIT_MAX_WAITS', 0, 10, 3),
  RATE_LIMIT_FALLBACK_WAIT_MS: integer('RATE_LIMIT_FALLBACK_WAIT_MS', 0, 60 * 60 * 1000, 60_000),
  PUBLISH_DELAY_MS: integer('PUBLISH_DELAY_MS', 0, 60_000, 1000),
  SYNC_SCHEDULE: z
    .string()
    .trim()
    .refine(
      value => {
        const fields = value.split(/\s+/);
        return fields.length === 5 && fields.every(field => CRON_FIELD.test(field));
      },
      { message: 'SYNC_SCHEDULE must be a five-field cron expression' }
    )
    .default('0 * * * *'),
});

/**
 * Build the sync configuration from environment variables. Empty strings count
 * as unset so that a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map(issue => issue.message));
  }

  const e = parsed.data;
  return {
    github: {
      apiUrl: e.GITHUB_API_URL.replace(/\/+$/, ''),
      owner: e.GITHUB_OWNER,
      repo: e.GITHUB_REPO,
      state: e.GITHUB_ISSUE_STATE,
      pageSize: e.GITHUB_PAGE_SIZE,
      userAgent: e.GITHUB_USER_AGENT,
    },
    astuto: {
      baseUrl: e.ASTUTO_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.ASTUTO_API_KEY,
      boardId: e.ASTUTO_BOARD_ID,
      statuses: { open: e.ASTUTO_OPEN_STATUS, closed: e.ASTUTO_CLOSED_STATUS },
    },
    timeoutMs: e.HTTP_TIMEOUT_MS,
    retry: {
      maxAttempts: e.SYNC_MAX_ATTEMPTS,
      baseDelayMs: e.SYNC_RETRY_DELAY_MS,
      backoff: e.SYNC_RETRY_BACKOFF,
    },
    rateLimit: {
      maxWaits: e.RATE_LIMIT_MAX_WAITS,
      fallbackWaitMs: e.RATE_LIMIT_FALLBACK_WAIT_MS,
    },
    publishDelayMs: e.PUBLISH_DELAY_MS,
    schedule: e.SYNC_SCHEDULE,
  };
}
