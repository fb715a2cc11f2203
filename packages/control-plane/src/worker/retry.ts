/**
 * Retry schedule for mission requests that found no agent.
 * Exponential backoff with ±25% jitter so queued requests do not all wake
 * up on the same tick.
 *
 * This is independent of Graphile Worker's internal retry mechanism: a
 * retry is a new `mission_dispatch` job with a calculated runAt.
 */

export interface RetryConfig {
  /** Base delay in milliseconds. */
  baseDelayMs: number
  /** Upper bound on a single delay in milliseconds. */
  maxDelayMs: number
  /** Multiplier applied per retry attempt. */
  multiplier: number
}

export const DISPATCH_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 5_000,
  maxDelayMs: 120_000,
  multiplier: 2,
}

/**
 * Delay before retry number `attempt` (0-based).
 * `random` must return a value in [0, 1); it picks the jitter.
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig = DISPATCH_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.multiplier, attempt)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)
  const jitterFactor = 0.75 + random() * 0.5
  return Math.round(cappedDelay * jitterFactor)
}

/** The runAt date for retry number `attempt`, counted from `now`. */
export function calculateRunAt(
  attempt: number,
  config: RetryConfig = DISPATCH_RETRY_CONFIG,
  now: number = Date.now(),
  random: () => number = Math.random,
): Date {
  return new Date(now + calculateRetryDelay(attempt, config, random))
}
