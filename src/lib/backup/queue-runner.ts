/**
 * Backup runner for the worker: hands the snapshot to the backup queue, where
 * the backup handler runs it under the per-target lock.
 */

import { BACKUP_JOB_TYPES } from "../jobs/handlers/backup.js"
import type { QueueManager } from "../jobs/queue-manager.js"
import type { BackupRunner, BackupTarget } from "./types.js"

export class QueueBackupRunner implements BackupRunner {
  constructor(private readonly queues: Pick<QueueManager, "addJob">) {}

  async run(target: BackupTarget): Promise<boolean> {
    // Fixed ID: a backup still waiting in the queue absorbs this request
    await this.queues.addJob(
      BACKUP_JOB_TYPES[target],
      {},
      {
        jobId: `backup-${target}`,
        removeOnComplete: true,
        removeOnFail: true,
        createdBy: "backup-trigger",
      }
    )
    return true
  }
}
