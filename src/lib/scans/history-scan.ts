/**
 * Incremental viewing-history scan.
 *
 * Walks the episodes history and then the movies history, newest first, and
 * stops after the first page that reaches dates already stored. Durations of
 * freshly watched units are cached as pages are processed.
 */

import type { Session } from "../browser/session-controller.js"
import {
  parseHistoryPage,
  requiresProAccount,
  type HistoryItem,
  type HistoryMode,
} from "../crawler/extractors.js"
import type { DetailRefresher } from "../crawler/detail-refresher.js"
import type { PaginationCrawler } from "../crawler/pagination-crawler.js"
import { getLatestViewDate, insertShowsIfAbsent, insertViewHistory } from "../db/index.js"
import { ConfigurationError } from "../errors.js"
import { createComponentLogger } from "../logger.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createCrawler,
  createRefresher,
  withSession,
  withSessionRecovery,
  withStoreBackup,
  type ScanChanges,
  type ScanContext,
  type ScanResult,
} from "./context.js"

const log = createComponentLogger("history-scan")

export const HISTORY_MODES: readonly HistoryMode[] = ["episodes", "movies"]

const HISTORY_PAGE_SIZE = 50

export interface HistoryModeResult {
  mode: HistoryMode
  added: number
  processed: number
  pagesVisited: number
  stoppedEarly: boolean
  /** The account cannot see this history */
  proRequired: boolean
}

export interface HistoryScanResult extends ScanResult {
  modes: HistoryModeResult[]
  durations: number
}

/**
 * Site-relative path of one history page.
 */
export function historyPagePath(login: string, mode: HistoryMode, page: number): string {
  const base = mode === "episodes" ? `history/index/${login}/episodes` : `history/index/${login}`
  return `${base}?page=${page}&per-page=${HISTORY_PAGE_SIZE}`
}

export async function runHistoryScan(ctx: ScanContext): Promise<HistoryScanResult> {
  const login = ctx.config.identities.main.login
  if (!login) {
    throw new ConfigurationError("SITE_LOGIN is required for the history scan")
  }

  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun(ctx.pool, "history", () =>
      withSession(ctx, "main", async (session) => {
        const crawler = createCrawler(ctx, session)
        const refresher = createRefresher(ctx, session)
        const totals: HistoryScanResult = { processed: 0, added: 0, durations: 0, modes: [] }

        for (const mode of HISTORY_MODES) {
          if (ctx.shutdown?.requested) {
            break
          }
          const scanned = await scanMode(
            ctx,
            session,
            crawler,
            refresher,
            login,
            mode,
            totals,
            changes
          )
          totals.modes.push(scanned)
          totals.processed += scanned.processed
          totals.added += scanned.added
        }

        return totals
      })
    )
  )

  log.info(
    { added: result.added, processed: result.processed, durations: result.durations },
    "History scan finished"
  )
  return result
}

async function scanMode(
  ctx: ScanContext,
  session: Session,
  crawler: PaginationCrawler,
  refresher: DetailRefresher,
  login: string,
  mode: HistoryMode,
  totals: HistoryScanResult,
  changes: ScanChanges
): Promise<HistoryModeResult> {
  const latest = await getLatestViewDate(ctx.pool, mode)
  if (latest) {
    log.info({ mode, latest }, "Scanning history until stored dates are reached")
  } else {
    log.info({ mode }, "No stored history for this mode, scanning every page")
  }

  let proRequired = false

  const crawl = await crawler.crawl({
    label: `history:${mode}`,
    pageUrl: (page) => session.url(historyPagePath(login, mode, page)),
    delayMs: ctx.config.historyPageDelayMs,
    processPage: async (doc, page) => {
      if (requiresProAccount(doc)) {
        proRequired = true
        log.error({ mode }, "History page requires a PRO account, skipping this mode")
        return { added: 0, processed: 0, stop: true }
      }

      const parsed = parseHistoryPage(doc, mode)
      for (const failure of parsed.failures) {
        log.warn({ mode, page, failure }, "History block skipped")
      }

      const added = await storeItems(ctx, parsed.items)
      changes.record(added)
      const watched = parsed.items.map((item) => ({
        showId: item.showId,
        season: item.season,
        episode: item.episode,
      }))
      // Units stored before a crash are fresh on the second pass and are not fetched again
      const durations = await withSessionRecovery(ctx, session, () =>
        refresher.refreshWatchedDurations(watched)
      )
      totals.durations += durations
      changes.record(durations)

      // Compared against one stored maximum per mode, so an interleaved
      // listing can hide newer rows that sit on later pages
      const reachedStored = latest !== null && parsed.blockDates.some((date) => date < latest)
      if (reachedStored) {
        log.info({ mode, page, latest }, "Reached stored history, stopping after this page")
      }

      return { added, processed: parsed.items.length, stop: reachedStored }
    },
  })

  return {
    mode,
    added: crawl.itemsAdded,
    processed: crawl.itemsProcessed,
    pagesVisited: crawl.pagesVisited,
    stoppedEarly: crawl.stoppedEarly && !proRequired,
    proRequired,
  }
}

async function storeItems(ctx: ScanContext, items: HistoryItem[]): Promise<number> {
  if (items.length === 0) {
    return 0
  }

  await insertShowsIfAbsent(
    ctx.pool,
    items.map((item) => ({
      id: item.showId,
      title: item.title,
      originalTitle: item.originalTitle,
      type: item.type,
    }))
  )

  return insertViewHistory(
    ctx.pool,
    items.map((item) => ({
      showId: item.showId,
      viewDate: item.viewDate,
      season: item.season,
      episode: item.episode,
    }))
  )
}
