/**
 * FULL_SCAN Handler
 *
 * Walks the whole catalog, or one category of it. Resumes from the ledger
 * when a previous run stopped early.
 */

import { runFullScan, type FullScanResult } from "../../scans/full-scan.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, fullScanPayloadSchema, type FullScanPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class FullScanHandler extends ScanJobHandler<FullScanPayload, FullScanResult> {
  readonly jobType = JobType.FULL_SCAN
  protected readonly schema = fullScanPayloadSchema

  protected scan(ctx: ScanContext, payload: FullScanPayload): Promise<FullScanResult> {
    return runFullScan(ctx, { type: payload.type })
  }
}
