/**
 * CLEANUP_LOGS Handler
 *
 * Trims error_logs and old scan checkpoints. Watermarks are kept.
 */

import type { Job } from "bullmq"
import { daysAgo } from "../../date-utils.js"
import { deleteCheckpointsBefore } from "../../db/checkpoints.js"
import { deleteLogsBefore } from "../../log-persistence.js"
import {
  JobType,
  QueueName,
  cleanupLogsPayloadSchema,
  type CleanupLogsPayload,
  type JobResult,
} from "../types.js"
import { BaseJobHandler } from "./base.js"

export interface CleanupLogsResult {
  errorLogsDeleted: number
  checkpointsDeleted: number
}

export class CleanupLogsHandler extends BaseJobHandler<CleanupLogsPayload, CleanupLogsResult> {
  readonly jobType = JobType.CLEANUP_LOGS
  readonly queueName = QueueName.MAINTENANCE
  protected readonly schema = cleanupLogsPayloadSchema

  async process(
    job: Job<unknown>,
    payload: CleanupLogsPayload
  ): Promise<JobResult<CleanupLogsResult>> {
    const errorLogsDeleted = await deleteLogsBefore(this.deps.pool, daysAgo(payload.errorLogDays))
    const checkpointsDeleted = await deleteCheckpointsBefore(
      this.deps.pool,
      daysAgo(payload.checkpointDays)
    )

    this.createLogger(job).info({ errorLogsDeleted, checkpointsDeleted }, "Old records removed")

    return { success: true, data: { errorLogsDeleted, checkpointsDeleted } }
  }
}
