/**
 * Error taxonomy for the sync engine.
 *
 * Item and page errors are recovered where they happen. Session errors trigger
 * a bounded restart. Only AbortError and LoginTimeoutError reach the caller of
 * a scan.
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Base class so callers can tell engine errors from library errors.
 */
export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SyncError"
  }
}

/**
 * One item block on a listing could not be parsed.
 */
export class ItemExtractionError extends SyncError {
  constructor(
    message: string,
    public readonly snippet?: string
  ) {
    super(message)
    this.name = "ItemExtractionError"
  }
}

/**
 * One listing page failed to load or parse.
 */
export class PageFetchError extends SyncError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly page?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = "PageFetchError"
  }
}

/**
 * The browser session can no longer be used and must be recreated.
 */
export class SessionDeadError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SessionDeadError"
  }
}

/**
 * An anti-bot interstitial was served instead of the requested page.
 */
export class ChallengeDetectedError extends SyncError {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(message)
    this.name = "ChallengeDetectedError"
  }
}

/**
 * The login flow did not reach an authenticated page in time.
 */
export class LoginTimeoutError extends SyncError {
  constructor(
    message: string,
    public readonly waitedMs: number
  ) {
    super(message)
    this.name = "LoginTimeoutError"
  }
}

/**
 * Recovery budget exhausted; the current scan must stop.
 */
export class AbortError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "AbortError"
  }
}

/**
 * Required settings are missing or invalid.
 */
export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super(message)
    this.name = "ConfigurationError"
  }
}

/**
 * Get a printable message from anything that was thrown.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
