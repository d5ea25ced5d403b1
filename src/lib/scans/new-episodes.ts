/**
 * New-episodes scan.
 *
 * Reads the site's "new episodes" listing per series category, newest first,
 * and fills in whatever the store lacks for each row: full detail and every
 * season's durations for an unknown show, or the one season whose episode
 * duration is missing. A category ends at the first row that needs nothing.
 */

import { NEW_EPISODE_CATEGORIES, SHOW_TYPE_MAPPING } from "../constants.js"
import type { Session } from "../browser/session-controller.js"
import type { DetailRefresher } from "../crawler/detail-refresher.js"
import { parseNewEpisodesPage, type NewEpisodeEntry } from "../crawler/extractors.js"
import { getOrCreateShow, getShow, hasDuration, setShowType } from "../db/index.js"
import { createComponentLogger } from "../logger.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createCrawler,
  createRefresher,
  pause,
  withSession,
  withSessionRecovery,
  withStoreBackup,
  type ScanContext,
  type ScanResult,
} from "./context.js"

const log = createComponentLogger("new-episodes")

const LISTING_PAGE_DELAY_MS = 2000

type NewEpisodeCategory = (typeof NEW_EPISODE_CATEGORIES)[number]

export interface NewEpisodesCategoryResult {
  category: NewEpisodeCategory
  processed: number
  /** Reached a row the store already covers */
  caughtUp: boolean
}

export interface NewEpisodesResult extends ScanResult {
  categories: NewEpisodesCategoryResult[]
}

export function newEpisodesPagePath(category: NewEpisodeCategory, page: number): string {
  return `media/new-serial-episodes?type=${category}&page=${page}`
}

export async function runNewEpisodesScan(ctx: ScanContext): Promise<NewEpisodesResult> {
  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun(ctx.pool, "new-episodes", () =>
      withSession(ctx, "main", async (session) => {
        const crawler = createCrawler(ctx, session)
        const refresher = createRefresher(ctx, session)
        const totals: NewEpisodesResult = { processed: 0, added: 0, categories: [] }

        for (const category of NEW_EPISODE_CATEGORIES) {
          if (ctx.shutdown?.requested) {
            break
          }

          const type = SHOW_TYPE_MAPPING[category]
          const categoryLog = log.child({ category })
          let caughtUp = false

          const crawl = await crawler.crawl({
            label: `new-episodes:${category}`,
            pageUrl: (page) => session.url(newEpisodesPagePath(category, page)),
            delayMs: LISTING_PAGE_DELAY_MS,
            processPage: async (doc, page) => {
              const entries = parseNewEpisodesPage(doc)
              if (entries.length === 0) {
                categoryLog.warn({ page }, "No rows on page")
              }

              let processed = 0
              let added = 0
              for (const entry of entries) {
                if (ctx.shutdown?.requested) {
                  break
                }
                const outcome = await processEntry(ctx, session, refresher, entry, type)
                if (outcome === "current") {
                  categoryLog.info(
                    { showId: entry.showId, season: entry.season, episode: entry.episode },
                    "Row already stored, category is up to date"
                  )
                  caughtUp = true
                  break
                }
                processed++
                changes.record()
                if (outcome === "created") {
                  added++
                }
              }
              return { added, processed, stop: caughtUp }
            },
          })

          totals.categories.push({ category, processed: crawl.itemsProcessed, caughtUp })
          totals.processed += crawl.itemsProcessed
          totals.added += crawl.itemsAdded
          categoryLog.info({ processed: crawl.itemsProcessed }, "Category finished")
        }

        return totals
      })
    )
  )

  log.info({ processed: result.processed, added: result.added }, "New-episodes scan finished")
  return result
}

/**
 * Bring the store up to date for one listing row.
 */
async function processEntry(
  ctx: ScanContext,
  session: Session,
  refresher: DetailRefresher,
  entry: NewEpisodeEntry,
  type: string
): Promise<"current" | "created" | "updated"> {
  const existing = await getShow(ctx.pool, entry.showId)
  const hasDetails = existing !== null && existing.year !== null
  const durationStored = await hasDuration(ctx.pool, entry.showId, entry.season, entry.episode)

  if (hasDetails && durationStored) {
    return "current"
  }

  const { show, created } = await getOrCreateShow(ctx.pool, {
    id: entry.showId,
    title: entry.title,
    originalTitle: entry.originalTitle,
    type,
  })
  if (!created && show.type !== type) {
    await setShowType(ctx.pool, show.id, type)
  }

  if (!hasDetails) {
    log.info({ showId: show.id }, "Show lacks detail, fetching detail and every season")
    await withSessionRecovery(ctx, session, async () => {
      await refresher.refreshDetails(show.id)
      await refresher.refreshDurations({ id: show.id, type })
    })
  } else {
    log.info(
      { showId: show.id, season: entry.season, episode: entry.episode },
      "Episode duration missing, fetching its season"
    )
    await withSessionRecovery(ctx, session, () =>
      refresher.refreshSeasonDurations(show.id, entry.season)
    )
  }

  await pause(ctx, ctx.config.newEpisodesDelayMs)
  return created ? "created" : "updated"
}
