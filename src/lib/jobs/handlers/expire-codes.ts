/**
 * EXPIRE_CODES Handler
 *
 * Deletes one-time login codes past their lifetime.
 */

import type { Job } from "bullmq"
import { expireCodes } from "../../two-factor/code-ingest.js"
import {
  JobType,
  QueueName,
  expireCodesPayloadSchema,
  type EmptyPayload,
  type JobResult,
} from "../types.js"
import { BaseJobHandler } from "./base.js"

export class ExpireCodesHandler extends BaseJobHandler<EmptyPayload, { removed: number }> {
  readonly jobType = JobType.EXPIRE_CODES
  readonly queueName = QueueName.MAINTENANCE
  protected readonly schema = expireCodesPayloadSchema

  async process(_job: Job<unknown>): Promise<JobResult<{ removed: number }>> {
    const removed = await expireCodes(this.deps.pool, this.deps.config.codeLifetimeMinutes)
    return { success: true, data: { removed } }
  }
}
