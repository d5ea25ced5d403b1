/**
 * Bounded retry executor shared by the crawler, refresher and scans.
 */

export type BackoffSchedule =
  | { kind: "none" }
  | { kind: "fixed"; delayMs: number }
  | { kind: "exponential"; baseMs: number; maxMs: number }

export interface RetryPolicy {
  maxAttempts: number
  backoff: BackoffSchedule
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean
  /** Runs before the next attempt, e.g. to restart a session */
  onRetry?: (error: unknown, attempt: number) => Promise<void> | void
  sleep?: (ms: number) => Promise<void>
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function backoffDelay(schedule: BackoffSchedule, attempt: number): number {
  switch (schedule.kind) {
    case "none":
      return 0
    case "fixed":
      return schedule.delayMs
    case "exponential":
      return Math.min(schedule.baseMs * Math.pow(2, attempt - 1), schedule.maxMs)
  }
}

/**
 * Run `fn` until it succeeds or the policy gives up. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const wait = policy.sleep ?? sleep
  const maxAttempts = Math.max(1, policy.maxAttempts)

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      const canRetry =
        attempt < maxAttempts && (policy.shouldRetry ? policy.shouldRetry(error, attempt) : true)
      if (!canRetry) {
        throw error
      }

      if (policy.onRetry) {
        await policy.onRetry(error, attempt)
      }

      const delay = backoffDelay(policy.backoff, attempt)
      if (delay > 0) {
        await wait(delay)
      }
    }
  }
}
