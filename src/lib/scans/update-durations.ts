/**
 * Fill in missing durations.
 *
 * Shows with a recorded duration failure go first, then shows with no
 * duration rows in random order, up to the limit. Naming a series category
 * lifts the limit and takes every show of that type still lacking durations.
 */

import { SHOW_TYPE_MAPPING, isSeriesType, type CategoryKey } from "../constants.js"
import type { ShowRecord } from "../db/index.js"
import { getShowsWithRefreshFailure, getShowsWithoutDurations } from "../db/index.js"
import { createComponentLogger } from "../logger.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createRefresher,
  withSession,
  withSessionRecovery,
  withStoreBackup,
  type ScanContext,
  type ScanResult,
} from "./context.js"
import { assertPositiveLimit } from "./update-details.js"

const log = createComponentLogger("update-durations")

export interface UpdateDurationsOptions {
  type?: CategoryKey
}

export interface UpdateDurationsResult extends ScanResult {
  candidates: number
  failed: number[]
}

/**
 * Shows whose durations should be fetched, in processing order.
 */
export async function selectDurationCandidates(
  ctx: ScanContext,
  limit: number,
  options: UpdateDurationsOptions = {}
): Promise<ShowRecord[]> {
  const dbType = options.type ? SHOW_TYPE_MAPPING[options.type] : undefined
  const types = dbType ? [dbType] : undefined

  if (dbType && isSeriesType(dbType)) {
    const failed = await getShowsWithRefreshFailure(ctx.pool, "durations", { types })
    const missing = await getShowsWithoutDurations(ctx.pool, {
      types,
      excludeIds: failed.map((show) => show.id),
    })
    log.info(
      { type: dbType, failed: failed.length, missing: missing.length },
      "Series type selected, limit ignored"
    )
    return [...failed, ...missing]
  }

  assertPositiveLimit(limit)
  const priority = await getShowsWithRefreshFailure(ctx.pool, "durations", { types, limit })
  const remaining = limit - priority.length
  if (remaining <= 0) {
    return priority
  }

  const random = await getShowsWithoutDurations(ctx.pool, {
    types,
    limit: remaining,
    excludeIds: priority.map((show) => show.id),
  })
  return [...priority, ...random]
}

export async function runUpdateDurations(
  ctx: ScanContext,
  limit: number,
  options: UpdateDurationsOptions = {}
): Promise<UpdateDurationsResult> {
  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun<UpdateDurationsResult>(ctx.pool, "update-durations", async () => {
      const shows = await selectDurationCandidates(ctx, limit, options)
      const totals: UpdateDurationsResult = {
        processed: 0,
        added: 0,
        candidates: shows.length,
        failed: [],
      }
      if (shows.length === 0) {
        log.info("No shows need durations")
        return totals
      }

      log.info({ count: shows.length, type: options.type }, "Updating durations")

      await withSession(ctx, "main", async (session) => {
        const refresher = createRefresher(ctx, session, ctx.config.updateDurationsDelayMs)

        for (const show of shows) {
          if (ctx.shutdown?.requested) {
            break
          }
          const stored = await withSessionRecovery(ctx, session, () =>
            refresher.refreshDurations(show)
          )
          if (stored > 0) {
            totals.processed++
            totals.added += stored
            changes.record(stored)
          } else {
            totals.failed.push(show.id)
          }
        }
      })

      return totals
    })
  )

  log.info(
    { updated: result.processed, rows: result.added, failed: result.failed.length },
    "Duration update finished"
  )
  return result
}
