/**
 * Maps raw automation errors to a recovery decision.
 */

import {
  AbortError,
  ChallengeDetectedError,
  ConfigurationError,
  LoginTimeoutError,
  SessionDeadError,
  getErrorMessage,
} from "./errors.js"

export type ErrorClass = "retryable" | "session-dead" | "abort"

/**
 * Message fragments that mean the driver behind a session is gone.
 */
export const SESSION_DEAD_PATTERNS: readonly string[] = [
  "driver unresponsive",
  "connection refused",
  "max retries exceeded",
  "invalid session",
  "target closed",
  "browser has been closed",
  "target page, context or browser has been closed",
]

export function isSessionDeadMessage(message: string): boolean {
  const lower = message.toLowerCase()
  return SESSION_DEAD_PATTERNS.some((pattern) => lower.includes(pattern))
}

/**
 * Classify an error.
 *
 * - `abort`: recovery budget exhausted, login timed out or configuration is broken
 * - `session-dead`: discard the session and create a new one
 * - `retryable`: everything else; log at the item or page level and continue
 */
export function classifyError(error: unknown): ErrorClass {
  if (
    error instanceof AbortError ||
    error instanceof LoginTimeoutError ||
    error instanceof ConfigurationError
  ) {
    return "abort"
  }

  if (error instanceof SessionDeadError || error instanceof ChallengeDetectedError) {
    return "session-dead"
  }

  return isSessionDeadMessage(getErrorMessage(error)) ? "session-dead" : "retryable"
}

export function isSessionDead(error: unknown): boolean {
  return classifyError(error) === "session-dead"
}

export function isAbort(error: unknown): boolean {
  return classifyError(error) === "abort"
}
