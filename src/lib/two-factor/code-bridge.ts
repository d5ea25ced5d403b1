/**
 * Two-factor code bridge.
 *
 * Codes arrive out of band (mail forwarder, CLI) and land in the `codes`
 * table. The bridge polls for the newest unexpired code it has not tried yet,
 * hands it to the login form and keeps polling until one is accepted or the
 * deadline passes. Codes are deleted by the expiry sweeper independently, so a
 * code seen on one poll may be gone on the next.
 */

import type { Pool } from "pg"

import { findNewestUnusedCode } from "../db/codes.js"
import type { CodeRecord } from "../db/types.js"
import { AbortError, LoginTimeoutError, getErrorMessage } from "../errors.js"
import { createComponentLogger } from "../logger.js"
import { sleep as defaultSleep } from "../retry.js"
import type { ShutdownSignal } from "../shutdown.js"

const DEFAULT_POLL_INTERVAL_MS = 2000

export interface CodeBridgeOptions {
  lifetimeMinutes: number
  pollIntervalMs?: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
  shutdown?: ShutdownSignal
}

export interface AwaitCodeOptions {
  /** Epoch milliseconds */
  deadline: number
  /** Code IDs already tried. Updated in place. */
  alreadyUsed: Set<number>
  /** Enter the code and report whether the site accepted it */
  submit: (code: CodeRecord) => Promise<boolean>
  /** True once the login completed by some other path */
  isSatisfied?: () => Promise<boolean>
}

export class CodeBridge {
  private readonly log = createComponentLogger("code-bridge")
  private readonly pollIntervalMs: number
  /** Clock shared with callers computing deadlines */
  readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly pool: Pool,
    private readonly options: CodeBridgeOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * Wait for an accepted code.
   *
   * @returns the accepted code, or null when `isSatisfied` reported success first
   * @throws LoginTimeoutError when the deadline passes
   */
  async awaitCode(options: AwaitCodeOptions): Promise<CodeRecord | null> {
    const started = this.now()
    const lifetimeMs = this.options.lifetimeMinutes * 60 * 1000

    while (this.now() < options.deadline) {
      if (this.options.shutdown?.requested) {
        throw new AbortError("Shutdown requested while waiting for a login code")
      }

      if (options.isSatisfied && (await options.isSatisfied())) {
        return null
      }

      const code = await findNewestUnusedCode(
        this.pool,
        new Date(this.now() - lifetimeMs),
        options.alreadyUsed
      )

      if (code) {
        // Never offered again, whatever the outcome
        options.alreadyUsed.add(code.id)
        this.log.info({ codeId: code.id }, "Trying login code")

        try {
          if (await options.submit(code)) {
            this.log.info({ codeId: code.id }, "Login code accepted")
            return code
          }
          this.log.warn({ codeId: code.id }, "Login code rejected, waiting for a new one")
        } catch (error) {
          this.log.warn(
            { codeId: code.id, error: getErrorMessage(error) },
            "Could not submit login code"
          )
        }
      }

      await this.sleep(this.pollIntervalMs)
    }

    if (options.isSatisfied && (await options.isSatisfied())) {
      return null
    }

    const waitedMs = this.now() - started
    throw new LoginTimeoutError(`No login code accepted within ${waitedMs}ms`, waitedMs)
  }
}
