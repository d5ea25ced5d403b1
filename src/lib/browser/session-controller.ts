/**
 * Browser session controller.
 *
 * Owns the lifecycle of one browser session per acquire: restore saved
 * cookies, validate them, fall back to a full login, and recover from
 * challenge pages and dead drivers with a bounded number of restarts.
 *
 *   uninitialized -> cookies-loaded -> validating -> authenticated
 *                                      validating -> logging-in -> authenticated
 *   any -> challenge-detected -> restarting -> uninitialized
 *   login timeout or restarts exhausted -> unrecoverable
 */

import type { BackupScheduler } from "../backup/types.js"
import type { SiteIdentity } from "../config.js"
import {
  AbortError,
  ChallengeDetectedError,
  SessionDeadError,
  getErrorMessage,
} from "../errors.js"
import { createComponentLogger, type Logger } from "../logger.js"
import { sleep as defaultSleep } from "../retry.js"
import type { CodeBridge } from "../two-factor/code-bridge.js"
import { detectChallenge } from "./challenge-detector.js"
import type { CookieStore } from "./cookie-store.js"
import { SiteLoginHandler } from "./login-handler.js"
import type { BrowserDriver, DriverFactory, SessionKind } from "./types.js"

export type SessionState =
  | "uninitialized"
  | "cookies-loaded"
  | "validating"
  | "authenticated"
  | "logging-in"
  | "challenge-detected"
  | "restarting"
  | "unrecoverable"

/**
 * Handle returned by acquire(). A restart swaps the driver underneath, so
 * callers keep using the same handle.
 */
export class Session {
  state: SessionState = "uninitialized"
  /** Restarts over the life of the handle */
  restarts = 0
  /** Restarts since the last page that loaded cleanly; bounded by maxRestarts */
  consecutiveRestarts = 0
  driver: BrowserDriver | null = null

  constructor(
    readonly kind: SessionKind,
    readonly baseUrl: string
  ) {}

  /** Absolute URL for a site-relative path */
  url(relativePath: string): string {
    return `${this.baseUrl}${relativePath.replace(/^\//, "")}`
  }

  requireDriver(): BrowserDriver {
    if (!this.driver) {
      throw new SessionDeadError(`The ${this.kind} session has no live browser`)
    }
    return this.driver
  }
}

export interface SessionControllerOptions {
  identities: Record<SessionKind, SiteIdentity>
  factory: DriverFactory
  cookies: CookieStore
  codeBridge: CodeBridge
  backup?: BackupScheduler
  otpWaitMs: number
  maxRestarts: number
  cooldownMs: number
  sleep?: (ms: number) => Promise<void>
}

export class SessionController {
  private readonly log: Logger = createComponentLogger("session")
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly options: SessionControllerOptions) {
    this.sleep = options.sleep ?? defaultSleep
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Open an authenticated session for an identity. A challenge on the way in
   * gets one restart.
   */
  async acquire(kind: SessionKind): Promise<Session> {
    const session = new Session(kind, this.options.identities[kind].baseUrl)

    try {
      await this.establish(session)
    } catch (error) {
      if (!(error instanceof ChallengeDetectedError)) {
        await this.teardown(session)
        throw error
      }
      await this.restart(session, "challenge while opening session")
    }

    return session
  }

  /**
   * Load a URL. A challenge page triggers one restart and a second load; a
   * second challenge on the same URL is thrown. A clean load closes the
   * incident and gives the session its full restart budget back.
   */
  async navigate(session: Session, url: string): Promise<void> {
    await session.requireDriver().navigate(url)

    if (!(await this.hasChallenge(session))) {
      session.consecutiveRestarts = 0
      return
    }

    this.log.warn({ sessionKind: session.kind, url }, "Challenge page detected, restarting session")
    await this.restart(session, "challenge")

    await session.requireDriver().navigate(url)
    if (await this.hasChallenge(session)) {
      throw new ChallengeDetectedError(`Challenge persists after restart on ${url}`, url)
    }
    session.consecutiveRestarts = 0
  }

  /**
   * Navigate and return the page markup.
   */
  async fetchSource(session: Session, url: string): Promise<string> {
    await this.navigate(session, url)
    return session.requireDriver().pageSource()
  }

  /**
   * Tear the browser down, wait out the cooldown and log in again.
   *
   * @throws AbortError once the restart budget for the current incident is spent
   */
  async restart(session: Session, reason: string): Promise<void> {
    if (session.consecutiveRestarts >= this.options.maxRestarts) {
      session.state = "unrecoverable"
      await this.teardown(session)
      throw new AbortError(
        `The ${session.kind} session was restarted ${session.consecutiveRestarts} times in a row; giving up (${reason})`
      )
    }

    session.restarts++
    session.consecutiveRestarts++
    session.state = "restarting"
    this.log.warn(
      { sessionKind: session.kind, reason, attempt: session.consecutiveRestarts },
      "Restarting browser session"
    )

    await this.teardown(session)
    await this.sleep(this.options.cooldownMs)
    session.state = "uninitialized"

    try {
      await this.establish(session)
    } catch (error) {
      if (error instanceof ChallengeDetectedError) {
        session.state = "unrecoverable"
      }
      await this.teardown(session)
      throw error
    }
  }

  async release(session: Session): Promise<void> {
    await this.teardown(session)
    if (session.state !== "unrecoverable") {
      session.state = "uninitialized"
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private loginHandler(kind: SessionKind): SiteLoginHandler {
    return new SiteLoginHandler(kind, this.options.identities[kind], this.options.codeBridge, {
      otpWaitMs: this.options.otpWaitMs,
      sleep: this.sleep,
    })
  }

  private async hasChallenge(session: Session): Promise<boolean> {
    const driver = session.requireDriver()
    const result = detectChallenge({
      title: await driver.pageTitle(),
      source: await driver.pageSource(),
    })
    if (result.detected) {
      session.state = "challenge-detected"
    }
    return result.detected
  }

  private async establish(session: Session): Promise<void> {
    const { kind, baseUrl } = session
    const log = this.log.child({ sessionKind: kind })

    try {
      session.driver = await this.options.factory.create(kind)
    } catch (error) {
      throw new SessionDeadError(`Could not start a browser for the ${kind} session`, {
        cause: error,
      })
    }
    const driver = session.driver

    await driver.navigate(baseUrl)
    if (await this.hasChallenge(session)) {
      throw new ChallengeDetectedError(`Challenge on ${baseUrl}`, baseUrl)
    }

    const cookies = await this.options.cookies.load(kind)
    if (cookies) {
      await driver.setCookies(cookies)
      session.state = "cookies-loaded"
      log.info({ count: cookies.length }, "Cookies loaded, validating session")
      await driver.navigate(baseUrl)
    }

    session.state = "validating"
    const handler = this.loginHandler(kind)
    if (await handler.isAuthenticated(driver)) {
      session.state = "authenticated"
      log.info("Session is valid")
      return
    }

    if (cookies) {
      log.warn("Saved cookies did not produce a valid session, discarding them")
      await this.options.cookies.delete(kind)
      await driver.clearCookies()
    }

    session.state = "logging-in"
    try {
      await handler.login(driver)
    } catch (error) {
      if (await this.hasChallenge(session)) {
        throw new ChallengeDetectedError("Challenge during login", handler.loginUrl)
      }
      session.state = "unrecoverable"
      throw error
    }

    await this.options.cookies.save(kind, await driver.getCookies())
    this.options.backup?.scheduleBackup("cookies")
    session.state = "authenticated"
  }

  private async teardown(session: Session): Promise<void> {
    const driver = session.driver
    session.driver = null
    if (!driver) {
      return
    }

    try {
      await driver.close()
    } catch (error) {
      // A crashed browser often fails to close; the handle is dropped either way
      this.log.debug(
        { sessionKind: session.kind, error: getErrorMessage(error) },
        "Browser close failed"
      )
    }
  }
}
