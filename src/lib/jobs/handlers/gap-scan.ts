/**
 * GAP_SCAN Handler
 */

import { runGapScan, type GapScanResult } from "../../scans/gap-scan.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, gapScanPayloadSchema, type EmptyPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class GapScanHandler extends ScanJobHandler<EmptyPayload, GapScanResult> {
  readonly jobType = JobType.GAP_SCAN
  protected readonly schema = gapScanPayloadSchema

  protected scan(ctx: ScanContext): Promise<GapScanResult> {
    return runGapScan(ctx)
  }
}
