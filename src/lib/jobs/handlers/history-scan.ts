/**
 * HISTORY_SCAN Handler
 *
 * Pulls the account's recent viewing history, every three hours by default.
 */

import { runHistoryScan, type HistoryScanResult } from "../../scans/history-scan.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, historyScanPayloadSchema, type EmptyPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class HistoryScanHandler extends ScanJobHandler<EmptyPayload, HistoryScanResult> {
  readonly jobType = JobType.HISTORY_SCAN
  protected readonly schema = historyScanPayloadSchema

  protected scan(ctx: ScanContext): Promise<HistoryScanResult> {
    return runHistoryScan(ctx)
  }
}
