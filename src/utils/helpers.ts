/**
 * Utility functions for the issue mirror
 */

import type { RetryPolicy } from '../types';

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  backoff: 'exponential',
};

export type Result<T, E = unknown> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: E; attempts: number };

export type RetryDecision = { retry: true; delayMs: number } | { retry: false };

export interface RetryOptions {
  policy: RetryPolicy;
  /**
   * Overrides the policy for a failed attempt. `attempt` is 1-based and counts
   * every call made so far, whatever the outcome of the earlier ones.
   */
  decide?: (error: unknown, attempt: number) => RetryDecision;
  onRetry?: (info: { error: unknown; attempt: number; delayMs: number }) => void;
  sleep?: Sleep;
}

/**
 * Sleep utility
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt once `failures` attempts have failed
 */
export function backoffDelay(policy: RetryPolicy, failures: number): number {
  if (policy.backoff === 'fixed') return policy.baseDelayMs;
  return policy.baseDelayMs * Math.pow(2, Math.max(failures - 1, 0));
}

export function policyDecision(policy: RetryPolicy, failures: number): RetryDecision {
  if (failures >= policy.maxAttempts) return { retry: false };
  return { retry: true, delayMs: backoffDelay(policy, failures) };
}

/**
 * Run `fn` until it resolves or the policy gives up. Never throws: the last
 * error comes back in the result.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<Result<T>> {
  const decide = options.decide ?? ((_error: unknown, attempt: number) => policyDecision(options.policy, attempt));
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      const decision = decide(error, attempt);
      if (!decision.retry) {
        return { ok: false, error, attempts: attempt };
      }
      options.onRetry?.({ error, attempt, delayMs: decision.delayMs });
      await wait(decision.delayMs);
    }
  }
}

/**
 * Format duration from milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

/**
 * Truncate text with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}
