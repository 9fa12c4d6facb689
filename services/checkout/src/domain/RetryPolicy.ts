import { DateTime, Duration } from "effect"

/**
 * Backoff settings for callbacks whose reconciliation failed on an
 * internal error (database unavailable, serialization failure).
 */
export interface RetryPolicy {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  readonly backoffMultiplier: number
  readonly maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 8,
  baseDelayMs: 500,
  backoffMultiplier: 3,
  maxDelayMs: 5 * 60 * 1000
}

/**
 * Delay before the given attempt (1-indexed). The first attempt runs
 * immediately; later ones wait baseDelay * multiplier^(attempt - 2),
 * capped at maxDelay.
 *
 * | Attempt | Delay (defaults) |
 * |---------|------------------|
 * | 1       | 0ms              |
 * | 2       | 500ms            |
 * | 3       | 1500ms           |
 * | 4       | 4500ms           |
 *
 * @param attemptNumber - The next attempt number (1-indexed)
 * @param policy - Backoff settings, defaults to DEFAULT_RETRY_POLICY
 * @returns Delay before the attempt may run
 */
export const calculateRetryDelay = (
  attemptNumber: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Duration.Duration => {
  if (attemptNumber <= 1) {
    return Duration.zero
  }

  const delayMs = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attemptNumber - 2)
  return Duration.millis(Math.min(delayMs, policy.maxDelayMs))
}

/**
 * When the next attempt becomes due.
 *
 * @param attemptNumber - The next attempt number (1-indexed)
 * @param policy - Backoff settings
 * @param fromTime - Time of the failure being rescheduled
 * @returns Earliest time the callback may be claimed again
 */
export const calculateNextRetryAt = (
  attemptNumber: number,
  policy: RetryPolicy,
  fromTime: DateTime.Utc
): DateTime.Utc => DateTime.addDuration(fromTime, calculateRetryDelay(attemptNumber, policy))

/**
 * Check whether a callback has used up its retries.
 *
 * @param attemptsMade - Attempts that already failed (0 = never failed)
 * @param maxAttempts - Maximum allowed attempts
 * @returns true once the callback should be parked for review
 */
export const isMaxRetriesExceeded = (attemptsMade: number, maxAttempts: number): boolean =>
  attemptsMade >= maxAttempts
