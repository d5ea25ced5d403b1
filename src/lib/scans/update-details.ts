/**
 * Fetch extended detail for shows that have never had it.
 */

import { getShowsMissingDetails } from "../db/index.js"
import { ConfigurationError } from "../errors.js"
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

const log = createComponentLogger("update-details")

export interface UpdateDetailsResult extends ScanResult {
  candidates: number
  failed: number[]
}

export function assertPositiveLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`Limit must be a positive integer, got ${limit}`)
  }
}

export async function runUpdateDetails(
  ctx: ScanContext,
  limit: number
): Promise<UpdateDetailsResult> {
  assertPositiveLimit(limit)

  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun<UpdateDetailsResult>(ctx.pool, "update-details", async () => {
      const shows = await getShowsMissingDetails(ctx.pool, limit)
      const totals: UpdateDetailsResult = {
        processed: 0,
        added: 0,
        candidates: shows.length,
        failed: [],
      }
      if (shows.length === 0) {
        log.info("No shows without detail")
        return totals
      }

      log.info({ count: shows.length }, "Updating show detail")

      await withSession(ctx, "main", async (session) => {
        const refresher = createRefresher(ctx, session, ctx.config.updateDetailsDelayMs)

        for (const [index, show] of shows.entries()) {
          if (ctx.shutdown?.requested) {
            break
          }
          log.debug({ showId: show.id, position: index + 1, total: shows.length }, "Updating show")

          const outcome = await withSessionRecovery(ctx, session, () =>
            refresher.refreshDetails(show.id)
          )
          if (outcome === "fetched") {
            totals.processed++
            changes.record()
          } else {
            totals.failed.push(show.id)
          }
        }
      })

      return totals
    })
  )

  log.info({ updated: result.processed, failed: result.failed.length }, "Detail update finished")
  return result
}
