/**
 * Recurring jobs, registered as BullMQ job schedulers.
 *
 * upsertJobScheduler is idempotent: running this on every deploy updates
 * the repeat rules in place instead of stacking duplicates.
 */

import type { Queue } from "bullmq"
import { logger } from "../logger.js"
import { JobPriority, JobType, jobTypeToQueue, type JobPayloadMap, type QueueName } from "./types.js"

export type RepeatRule = { pattern: string } | { every: number }

export interface RecurringJob<T extends JobType = JobType> {
  id: string
  jobType: T
  payload: JobPayloadMap[T]
  repeat: RepeatRule
  priority?: JobPriority
}

export const RECURRING_JOBS: readonly RecurringJob[] = [
  {
    id: "history-scan",
    jobType: JobType.HISTORY_SCAN,
    payload: {},
    repeat: { pattern: "0 */3 * * *" },
  },
  {
    id: "daily-sync",
    jobType: JobType.DAILY_SYNC,
    payload: {},
    repeat: { pattern: "0 4 * * *" },
  },
  {
    id: "quarterly-full-scan",
    jobType: JobType.FULL_SCAN,
    payload: {},
    repeat: { pattern: "0 3 1 */3 *" },
    priority: JobPriority.LOW,
  },
  {
    id: "process-refresh-queues",
    jobType: JobType.PROCESS_REFRESH_QUEUES,
    payload: {},
    repeat: { every: 10 * 60 * 1000 },
  },
  {
    id: "expire-codes",
    jobType: JobType.EXPIRE_CODES,
    payload: {},
    repeat: { every: 60 * 1000 },
  },
  {
    id: "cleanup-logs",
    jobType: JobType.CLEANUP_LOGS,
    payload: {},
    repeat: { pattern: "30 2 * * *" },
  },
]

/**
 * Register every recurring job on its queue. Queues missing from the lookup
 * are skipped with a warning.
 *
 * @returns IDs of the schedulers that were registered
 */
export type SchedulerQueue = Pick<Queue, "upsertJobScheduler">

export async function scheduleRecurringJobs(
  getQueue: (queueName: QueueName) => SchedulerQueue | undefined,
  jobs: readonly RecurringJob[] = RECURRING_JOBS
): Promise<string[]> {
  const scheduled: string[] = []

  for (const job of jobs) {
    const queueName = jobTypeToQueue[job.jobType]
    const queue = getQueue(queueName)
    if (!queue) {
      logger.warn({ schedulerId: job.id, queue: queueName }, "Queue not available, not scheduled")
      continue
    }

    await queue.upsertJobScheduler(job.id, job.repeat, {
      name: job.jobType,
      data: job.payload,
      opts: { priority: job.priority ?? JobPriority.NORMAL },
    })
    scheduled.push(job.id)
    logger.info({ schedulerId: job.id, queue: queueName, repeat: job.repeat }, "Recurring job scheduled")
  }

  return scheduled
}
