/**
 * UPDATE_DETAILS Handler
 */

import { runUpdateDetails, type UpdateDetailsResult } from "../../scans/update-details.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, updateDetailsPayloadSchema, type UpdateDetailsPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class UpdateDetailsHandler extends ScanJobHandler<UpdateDetailsPayload, UpdateDetailsResult> {
  readonly jobType = JobType.UPDATE_DETAILS
  protected readonly schema = updateDetailsPayloadSchema

  protected scan(ctx: ScanContext, payload: UpdateDetailsPayload): Promise<UpdateDetailsResult> {
    return runUpdateDetails(ctx, payload.limit)
  }
}
