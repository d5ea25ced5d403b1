/**
 * SCAN_BY_IDS Handler
 *
 * Detail and durations for an explicit list of shows, on the auxiliary account.
 */

import { runScanByIds, type ScanByIdsResult } from "../../scans/scan-by-ids.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, scanByIdsPayloadSchema, type ScanByIdsPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class ScanByIdsHandler extends ScanJobHandler<ScanByIdsPayload, ScanByIdsResult> {
  readonly jobType = JobType.SCAN_BY_IDS
  protected readonly schema = scanByIdsPayloadSchema

  protected scan(ctx: ScanContext, payload: ScanByIdsPayload): Promise<ScanByIdsResult> {
    return runScanByIds(ctx, payload.ids)
  }
}
