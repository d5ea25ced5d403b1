/**
 * Gap scan: visits every ID between the watermark and the highest known show
 * that has no row yet, and stores the ones that turn out to exist.
 *
 * The watermark moves to the top of the range only after every missing ID was
 * attempted. An interrupted or failed run leaves it where it was, so the next
 * run recomputes the same range.
 */

import { GapWatermark } from "../crawler/checkpoint-ledger.js"
import { getShow } from "../db/index.js"
import { PageFetchError, getErrorMessage } from "../errors.js"
import { isAbort, isSessionDead } from "../fatal-error-classifier.js"
import { createComponentLogger } from "../logger.js"
import { withRetry } from "../retry.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createRefresher,
  pause,
  withSession,
  withStoreBackup,
  type ScanContext,
  type ScanResult,
} from "./context.js"

const log = createComponentLogger("gap-scan")

const PROGRESS_EVERY = 50

export interface GapScanResult extends ScanResult {
  range: { start: number; end: number } | null
  missing: number
  found: number[]
  /** The watermark moved to the end of the range */
  advanced: boolean
}

export async function runGapScan(ctx: ScanContext): Promise<GapScanResult> {
  const watermark = new GapWatermark(ctx.pool)

  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun<GapScanResult>(ctx.pool, "gap", async () => {
      const pending = await watermark.pendingRange()
      if (!pending) {
        log.info("No ID range left to check")
        return { processed: 0, added: 0, range: null, missing: 0, found: [], advanced: false }
      }

      const { start, end, missing } = pending
      const totals: GapScanResult = {
        processed: 0,
        added: 0,
        range: { start, end },
        missing: missing.length,
        found: [],
        advanced: false,
      }

      if (missing.length === 0) {
        log.info({ start, end }, "No gaps in range")
        await watermark.advance(end)
        totals.advanced = true
        return totals
      }

      log.info({ start, end, missing: missing.length }, "Checking missing IDs")

      await withSession(ctx, "auxiliary", async (session) => {
        const refresher = createRefresher(ctx, session)

        for (const [index, showId] of missing.entries()) {
          if (ctx.shutdown?.requested) {
            log.warn({ showId }, "Shutdown requested, leaving watermark in place")
            return
          }
          if (index === 0 || (index + 1) % PROGRESS_EVERY === 0) {
            log.info({ checked: index + 1, total: missing.length, showId }, "Gap scan progress")
          }

          const outcome = await withRetry(
            async () => {
              await pause(ctx, ctx.config.fullScanPageDelayMs)
              const fresh = await refresher.ensureFresh(showId, { force: true })
              if (fresh.details === "failed" && !(await getShow(ctx.pool, showId))) {
                throw new PageFetchError(
                  `Show page ${showId} could not be read`,
                  session.url(`item/view/${showId}`)
                )
              }
              return fresh
            },
            {
              maxAttempts: ctx.config.gapScanAttempts,
              backoff: { kind: "fixed", delayMs: 5000 },
              shouldRetry: (error) => !isAbort(error),
              onRetry: async (error, attempt) => {
                log.warn({ showId, attempt, error: getErrorMessage(error) }, "ID check failed")
                if (isSessionDead(error)) {
                  await ctx.controller.restart(session, getErrorMessage(error))
                }
              },
              sleep: ctx.sleep,
            }
          )

          totals.processed++
          if (outcome.details !== "missing") {
            totals.found.push(showId)
            totals.added++
            changes.record()
            log.info({ showId }, "Found show in gap")
          }
        }

        await watermark.advance(end)
        totals.advanced = true
      })

      return totals
    })
  )

  log.info(
    { missing: result.missing, found: result.found.length, advanced: result.advanced },
    "Gap scan finished"
  )
  return result
}
