/**
 * Retry with capped exponential backoff.
 *
 * Used by every stage that talks to an external service: repository
 * operations, pages publishing and callback delivery.
 */

import { sleep } from './helpers.js'

export interface BackoffPolicy {
  /** Delay before the first retry */
  baseDelayMs: number
  /** Upper bound for any single delay */
  maxDelayMs: number
  /** Growth factor per attempt (default 2) */
  multiplier?: number
  /** Fraction of the delay applied as +/- jitter (default 0.1) */
  jitter?: number
}

export interface RetryOptions extends BackoffPolicy {
  /** Retries after the first attempt; 0 means a single attempt */
  maxRetries: number
  /** Whether a failure is worth another attempt (default: always) */
  shouldRetry?: (err: unknown, attempt: number) => boolean
  /** Aborts the backoff sleep; the in-flight attempt is left to its own signal */
  signal?: AbortSignal
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void
}

/**
 * Delay before retry number `attempt` (1-indexed):
 * base * multiplier^(attempt-1), capped, with symmetric jitter.
 */
export function computeBackoff(attempt: number, policy: BackoffPolicy): number {
  const multiplier = policy.multiplier ?? 2
  const jitter = policy.jitter ?? 0.1
  const raw = Math.min(policy.baseDelayMs * Math.pow(multiplier, attempt - 1), policy.maxDelayMs)
  const spread = raw * jitter
  return Math.max(0, Math.floor(raw + (Math.random() * spread * 2 - spread)))
}

/**
 * Run `fn` until it succeeds, a failure is not retryable, or retries run out.
 * The last error is re-thrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (err) {
      const retriesUsed = attempt - 1
      if (retriesUsed >= options.maxRetries) throw err
      if (options.signal?.aborted === true) throw err
      if (options.shouldRetry !== undefined && !options.shouldRetry(err, attempt)) throw err
      const delayMs = computeBackoff(attempt, options)
      options.onRetry?.(err, attempt, delayMs)
      await sleep(delayMs, options.signal)
    }
  }
}
