/**
 * DAILY_SYNC Handler
 *
 * New episodes, then the newest catalog pages, then detail and durations
 * for whatever those turned up.
 */

import { runDailySync, type DailySyncResult } from "../../scans/daily-sync.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, dailySyncPayloadSchema, type EmptyPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class DailySyncHandler extends ScanJobHandler<EmptyPayload, DailySyncResult> {
  readonly jobType = JobType.DAILY_SYNC
  protected readonly schema = dailySyncPayloadSchema

  protected scan(ctx: ScanContext): Promise<DailySyncResult> {
    return runDailySync(ctx)
  }
}
