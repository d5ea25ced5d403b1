/**
 * Everything a scan needs, passed in explicitly so tests can wire a fake
 * browser and an in-process database.
 */

import type { Pool } from "pg"
import type { BackupScheduler } from "../backup/types.js"
import { CookieStore } from "../browser/cookie-store.js"
import { PlaywrightDriverFactory } from "../browser/playwright-driver.js"
import { Session, SessionController } from "../browser/session-controller.js"
import type { SessionKind } from "../browser/types.js"
import type { SyncConfig } from "../config.js"
import { DetailRefresher } from "../crawler/detail-refresher.js"
import { PaginationCrawler } from "../crawler/pagination-crawler.js"
import { getErrorMessage } from "../errors.js"
import { isSessionDead } from "../fatal-error-classifier.js"
import { sleep as defaultSleep, withRetry } from "../retry.js"
import type { ShutdownSignal } from "../shutdown.js"
import { CodeBridge } from "../two-factor/code-bridge.js"

export interface ScanContext {
  pool: Pool
  config: SyncConfig
  controller: SessionController
  backup: BackupScheduler
  shutdown?: ShutdownSignal
  sleep?: (ms: number) => Promise<void>
}

/**
 * Counts every scan reports. `processed` is items looked at, `added` is new
 * records written.
 */
export interface ScanResult {
  processed: number
  added: number
}

/**
 * Build a context backed by a real browser.
 */
export function createScanContext(options: {
  pool: Pool
  config: SyncConfig
  backup: BackupScheduler
  shutdown?: ShutdownSignal
}): ScanContext {
  const { pool, config, backup, shutdown } = options
  const controller = new SessionController({
    identities: config.identities,
    factory: new PlaywrightDriverFactory(config.browser),
    cookies: new CookieStore(config.cookiesDir),
    codeBridge: new CodeBridge(pool, { lifetimeMinutes: config.codeLifetimeMinutes, shutdown }),
    backup,
    otpWaitMs: config.otpWaitMs,
    maxRestarts: config.maxSessionRestarts,
    cooldownMs: config.challengeCooldownMs,
  })
  return { pool, config, controller, backup, shutdown }
}

/**
 * Acquire a session for `kind`, run `fn` and always release the browser.
 */
export async function withSession<T>(
  ctx: ScanContext,
  kind: SessionKind,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  const session = await ctx.controller.acquire(kind)
  try {
    return await fn(session)
  } finally {
    await ctx.controller.release(session)
  }
}

export function createCrawler(ctx: ScanContext, session: Session): PaginationCrawler {
  return new PaginationCrawler(ctx.controller, session, {
    shutdown: ctx.shutdown,
    sleep: ctx.sleep,
  })
}

export function createRefresher(
  ctx: ScanContext,
  session: Session,
  fetchDelayMs = 0
): DetailRefresher {
  return new DetailRefresher(ctx.pool, ctx.controller, session, {
    stalenessDays: ctx.config.stalenessDays,
    fetchDelayMs,
    sleep: ctx.sleep,
  })
}

export function pause(ctx: ScanContext, ms: number): Promise<void> {
  return ms > 0 ? (ctx.sleep ?? defaultSleep)(ms) : Promise.resolve()
}

/**
 * Run per-item browser work, restarting the session when it dies underneath.
 * The controller's restart budget bounds the number of attempts.
 */
export function withSessionRecovery<T>(
  ctx: ScanContext,
  session: Session,
  fn: () => Promise<T>,
  maxAttempts = ctx.config.maxSessionRestarts + 1
): Promise<T> {
  return withRetry(fn, {
    maxAttempts,
    backoff: { kind: "none" },
    shouldRetry: isSessionDead,
    onRetry: async (error) => {
      await ctx.controller.restart(session, getErrorMessage(error))
    },
    sleep: ctx.sleep,
  })
}

/**
 * Rows a scan has written so far.
 */
export class ScanChanges {
  private rows = 0

  record(count = 1): void {
    this.rows += count
  }

  get changed(): boolean {
    return this.rows > 0
  }
}

/**
 * Run a scan and request a store backup when it wrote anything. A scan that
 * throws after committing rows is backed up too.
 */
export async function withStoreBackup<T>(
  ctx: ScanContext,
  fn: (changes: ScanChanges) => Promise<T>
): Promise<T> {
  const changes = new ScanChanges()
  try {
    return await fn(changes)
  } finally {
    if (changes.changed) {
      ctx.backup.scheduleBackup("store")
    }
  }
}
