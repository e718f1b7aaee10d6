/**
 * Retry and Backoff
 *
 * One policy object applied uniformly around every remote call:
 * - Exponential backoff with jitter for transient failures
 * - Rate-limit waits driven by the service's reset hint
 * - Immediate rethrow for anything the taxonomy marks non-retryable
 *
 * Attempt counters live on the stack of a single `retry()` call and are
 * never shared between calls.
 *
 * @module @autopr/core/reliability/retry
 */

import { RateLimitError, isRetryable } from './errors.js';
import { createLogger } from '../telemetry/logger.js';

const logger = createLogger('retry');

// =============================================================================
// Retry Policy
// =============================================================================

export interface RetryPolicy {
  /** Total attempts including the first call (default: 3) */
  maxAttempts: number;

  /** Delay before the first retry in ms (default: 500) */
  initialDelayMs: number;

  /** Upper bound for a single backoff delay in ms (default: 8000) */
  maxDelayMs: number;

  /** Backoff multiplier (default: 2.0) */
  backoffMultiplier: number;

  /** Jitter factor 0-1 to randomize delays (default: 0.1) */
  jitterFactor: number;

  /** Longest reset hint honoured for a rate limit, in ms (default: 60000) */
  maxRateLimitWaitMs: number;

  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Callback before each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  /** Replaces the timer, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  backoffMultiplier: 2.0,
  jitterFactor: 0.1,
  maxRateLimitWaitMs: 60000,
};

/**
 * Build a complete policy from partial overrides
 */
export function createRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  return policy;
}

// =============================================================================
// Backoff Calculation
// =============================================================================

/**
 * Calculate delay for a given retry attempt with exponential backoff and jitter
 *
 * @param attempt - Retry number, 0-indexed
 */
export function calculateBackoff(attempt: number, policy: RetryPolicy): number {
  const exponentialDelay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  // Range: [delay * (1 - jitter), delay * (1 + jitter)]
  const jitter = policy.jitterFactor * (2 * Math.random() - 1);

  return Math.round(cappedDelay * (1 + jitter));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt, or undefined when the error must surface now
 */
function nextDelay(error: unknown, retryIndex: number, policy: RetryPolicy): number | undefined {
  if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
    if (error.retryAfterMs > policy.maxRateLimitWaitMs) {
      return undefined;
    }
    return Math.max(0, error.retryAfterMs);
  }
  return calculateBackoff(retryIndex, policy);
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Execute an async function under a retry policy
 *
 * @example
 * ```typescript
 * const ref = await retry(() => octokit.rest.git.getRef(params), { maxAttempts: 5 }, 'getRef');
 * ```
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
  operation = 'operation'
): Promise<T> {
  const fullPolicy = createRetryPolicy(policy);
  const shouldRetry = fullPolicy.isRetryable ?? isRetryable;
  const sleep = fullPolicy.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const retryable = shouldRetry(error);
      const isLastAttempt = attempt >= fullPolicy.maxAttempts;

      if (!retryable || isLastAttempt) {
        throw error;
      }

      const delayMs = nextDelay(error, attempt - 1, fullPolicy);
      if (delayMs === undefined) {
        logger.warn('Rate limit reset is beyond the wait budget', {
          operation,
          attempt,
          maxRateLimitWaitMs: fullPolicy.maxRateLimitWaitMs,
        });
        throw error;
      }

      logger.warn('Retry attempt failed', {
        operation,
        attempt,
        maxAttempts: fullPolicy.maxAttempts,
        nextDelayMs: delayMs,
        error: error instanceof Error ? error.message : String(error),
      });

      fullPolicy.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}
