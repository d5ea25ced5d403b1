/**
 * Refresh an explicit list of show IDs: forced detail plus durations.
 */

import fs from "fs/promises"
import path from "path"
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

const log = createComponentLogger("scan-by-ids")

export interface ScanByIdsResult extends ScanResult {
  requested: number
  missing: number[]
  durations: number
}

/**
 * Parse IDs separated by commas, whitespace or newlines. Duplicates are
 * dropped and the input order kept.
 *
 * @throws ConfigurationError for a token that is not a positive integer
 */
export function parseIdList(text: string): number[] {
  const ids: number[] = []
  const seen = new Set<number>()

  for (const token of text.split(/[\s,]+/)) {
    if (token === "") {
      continue
    }
    if (!/^\d+$/.test(token) || parseInt(token, 10) <= 0) {
      throw new ConfigurationError(`Not a show ID: "${token}"`)
    }
    const id = parseInt(token, 10)
    if (!seen.has(id)) {
      seen.add(id)
      ids.push(id)
    }
  }

  return ids
}

/**
 * Read a file of IDs from the data directory. Only the file name of `fileName`
 * is used, so the read stays inside `dataDir`.
 */
export async function readIdFile(dataDir: string, fileName: string): Promise<number[]> {
  const filePath = path.join(dataDir, path.basename(fileName))
  let content: string
  try {
    content = await fs.readFile(filePath, "utf-8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationError(`ID file not found: ${filePath}`)
    }
    throw error
  }
  return parseIdList(content)
}

export async function runScanByIds(ctx: ScanContext, ids: number[]): Promise<ScanByIdsResult> {
  if (ids.length === 0) {
    throw new ConfigurationError("No show IDs given")
  }

  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun<ScanByIdsResult>(ctx.pool, "scan-by-ids", () =>
      withSession(ctx, "auxiliary", async (session) => {
        const refresher = createRefresher(ctx, session, ctx.config.updateDetailsDelayMs)
        const totals: ScanByIdsResult = {
          processed: 0,
          added: 0,
          requested: ids.length,
          missing: [],
          durations: 0,
        }

        for (const showId of ids) {
          if (ctx.shutdown?.requested) {
            break
          }

          const fresh = await withSessionRecovery(ctx, session, () =>
            refresher.ensureFresh(showId, { force: true })
          )
          if (fresh.details === "missing") {
            totals.missing.push(showId)
            continue
          }

          totals.processed++
          changes.record()
          totals.durations += fresh.durations
          if (fresh.details === "fetched") {
            totals.added++
          }
        }

        return totals
      })
    )
  )

  log.info(
    { requested: result.requested, updated: result.added, missing: result.missing.length },
    "Scan by IDs finished"
  )
  return result
}
