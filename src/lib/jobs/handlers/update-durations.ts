/**
 * UPDATE_DURATIONS Handler
 */

import { runUpdateDurations, type UpdateDurationsResult } from "../../scans/update-durations.js"
import type { ScanContext } from "../../scans/context.js"
import { JobType, updateDurationsPayloadSchema, type UpdateDurationsPayload } from "../types.js"
import { ScanJobHandler } from "./scan-handler.js"

export class UpdateDurationsHandler extends ScanJobHandler<
  UpdateDurationsPayload,
  UpdateDurationsResult
> {
  readonly jobType = JobType.UPDATE_DURATIONS
  protected readonly schema = updateDurationsPayloadSchema

  protected scan(ctx: ScanContext, payload: UpdateDurationsPayload): Promise<UpdateDurationsResult> {
    return runUpdateDurations(ctx, payload.limit, { type: payload.type })
  }
}
