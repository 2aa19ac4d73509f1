/**
 * Bounded retry and polling helpers
 *
 * Every wait goes through an injectable `Sleeper` so reconciliation logic can
 * be tested without real delays.
 */

import type { RetryPolicy, RetryResult, Sleeper } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Retry policy for creates that hit a name conflict (5 attempts, 3s apart)
 */
export const DEFAULT_CONFLICT_RETRY: Required<RetryPolicy> = {
  maxAttempts: 5,
  delayMs: 3000,
  backoff: 'fixed',
};

/**
 * Polling policy while a delete propagates (10 checks, 2s apart)
 */
export const DEFAULT_DELETION_POLL: Required<RetryPolicy> = {
  maxAttempts: 10,
  delayMs: 2000,
  backoff: 'fixed',
};

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Sleep implementation (default: setTimeout) */
  sleep?: Sleeper;
  /** Only errors accepted here are retried; others fail immediately */
  isRetryable?: (error: Error) => boolean;
  /** Called before each wait */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Options for polling
 */
export interface PollOptions {
  logger?: ApiLogger;
  sleep?: Sleeper;
  /** Called when a check returns false and another will follow */
  onPending?: (attempt: number, maxAttempts: number) => void;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Delay to wait after the given (1-indexed) failed attempt
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  if (policy.backoff === 'exponential') {
    return policy.delayMs * Math.pow(2, attempt - 1);
  }
  return policy.delayMs;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Merge a partial policy over a default one
 */
export function resolvePolicy(
  base: Required<RetryPolicy>,
  override?: Partial<RetryPolicy>
): Required<RetryPolicy> {
  const maxAttempts = override?.maxAttempts ?? base.maxAttempts;
  const delayMs = override?.delayMs ?? base.delayMs;
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    delayMs: Math.max(0, delayMs),
    backoff: override?.backoff ?? base.backoff,
  };
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Execute a function, retrying errors accepted by `isRetryable`
 *
 * Never throws: the outcome, including the last error, is in the result.
 * Without `isRetryable` every error is retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const data = await fn(attempt);
      if (attempt > 1) {
        log.debug(`Succeeded after ${attempt} attempts`, { attempts: attempt });
      }
      return { success: true, data, attempts: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const retryable = options.isRetryable ? options.isRetryable(lastError) : true;
      if (!retryable) {
        log.debug('Error is not retryable', { error: lastError.message, attempts: attempt });
        return { success: false, error: lastError, attempts: attempt };
      }

      if (attempt === maxAttempts) {
        break;
      }

      const delayMs = calculateDelay(attempt, policy);
      options.onRetry?.(attempt, lastError, delayMs);
      await wait(delayMs);
    }
  }

  log.debug(`All ${maxAttempts} attempts exhausted`, {
    error: lastError?.message,
    attempts: maxAttempts,
  });

  return {
    success: false,
    error: lastError ?? new Error('Unknown error'),
    attempts: maxAttempts,
  };
}

/**
 * Poll `check` until it returns true or the policy runs out.
 *
 * A check that throws counts as "not yet". No wait follows the last check.
 * @returns whether the condition was observed
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  policy: RetryPolicy,
  options: PollOptions = {}
): Promise<boolean> {
  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      if (await check()) {
        return true;
      }
      if (attempt < maxAttempts) {
        options.onPending?.(attempt, maxAttempts);
      }
    } catch (error) {
      log.debug('Poll check failed', {
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (attempt < maxAttempts) {
      await wait(calculateDelay(attempt, policy));
    }
  }

  return false;
}
