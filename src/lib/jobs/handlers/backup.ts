/**
 * BACKUP_STORE / BACKUP_COOKIES Handlers
 *
 * Runs one snapshot of a target through the locked runner. A skipped run
 * (lock held elsewhere, store unchanged) completes without data.
 */

import type { Job } from "bullmq"
import type { BackupTarget } from "../../backup/types.js"
import { JobType, QueueName, backupPayloadSchema, type EmptyPayload, type JobResult } from "../types.js"
import { BaseJobHandler, type JobDependencies } from "./base.js"

export interface BackupJobResult {
  target: BackupTarget
  uploaded: boolean
}

export const BACKUP_JOB_TYPES: Record<BackupTarget, JobType> = {
  store: JobType.BACKUP_STORE,
  cookies: JobType.BACKUP_COOKIES,
}

export class BackupHandler extends BaseJobHandler<EmptyPayload, BackupJobResult> {
  readonly jobType: JobType
  readonly queueName = QueueName.BACKUP
  protected readonly schema = backupPayloadSchema

  constructor(
    deps: JobDependencies,
    private readonly target: BackupTarget
  ) {
    super(deps)
    this.jobType = BACKUP_JOB_TYPES[target]
  }

  async process(job: Job<unknown>): Promise<JobResult<BackupJobResult>> {
    const uploaded = await this.deps.backupRunner.run(this.target)

    if (!uploaded) {
      this.createLogger(job).info({ target: this.target }, "Backup not uploaded")
    }

    return {
      success: true,
      skipped: !uploaded,
      data: { target: this.target, uploaded },
    }
  }
}
