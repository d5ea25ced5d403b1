/**
 * Daily synchronization: new episodes, then the full catalog scan, then
 * detail and durations for as many shows as the full scan discovered.
 */

import { createComponentLogger } from "../logger.js"
import { trackSyncRun } from "../sync-runs.js"
import type { ScanContext, ScanResult } from "./context.js"
import { runFullScan, type FullScanResult } from "./full-scan.js"
import { runNewEpisodesScan, type NewEpisodesResult } from "./new-episodes.js"
import { runUpdateDetails, type UpdateDetailsResult } from "./update-details.js"
import { runUpdateDurations, type UpdateDurationsResult } from "./update-durations.js"

const log = createComponentLogger("daily-sync")

export interface DailySyncResult extends ScanResult {
  newEpisodes: NewEpisodesResult
  fullScan: FullScanResult
  details: UpdateDetailsResult | null
  durations: UpdateDurationsResult | null
}

export async function runDailySync(ctx: ScanContext): Promise<DailySyncResult> {
  return trackSyncRun<DailySyncResult>(ctx.pool, "daily-sync", async () => {
    const newEpisodes = await runNewEpisodesScan(ctx)
    const fullScan = await runFullScan(ctx)

    let details: UpdateDetailsResult | null = null
    let durations: UpdateDurationsResult | null = null
    if (fullScan.added > 0 && !ctx.shutdown?.requested) {
      log.info({ newShows: fullScan.added }, "Fetching detail and durations for new shows")
      details = await runUpdateDetails(ctx, fullScan.added)
      durations = await runUpdateDurations(ctx, fullScan.added)
    }

    const parts = [newEpisodes, fullScan, details, durations]
    return {
      processed: parts.reduce((sum, part) => sum + (part?.processed ?? 0), 0),
      added: parts.reduce((sum, part) => sum + (part?.added ?? 0), 0),
      newEpisodes,
      fullScan,
      details,
      durations,
    }
  })
}
