/**
 * Queue Manager - Centralized job queue management
 *
 * Responsibilities:
 * - Initialize all BullMQ queues on startup
 * - Type-safe job creation API
 * - Event listeners for job lifecycle (queued, active, completed, failed)
 * - Sync job state to PostgreSQL for auditing
 * - Queue management: pause/resume, cleanup, stats
 * - Graceful shutdown
 */

import { Queue, QueueEvents } from "bullmq"
import type { Pool } from "pg"
import { completeJobRun, failJobRun, insertJobRun, setJobRunStatus } from "../db/job-runs.js"
import { getPool } from "../db/pool.js"
import { logger } from "../logger.js"
import { getRedisJobsClient } from "./redis.js"
import {
  JobType,
  QueueName,
  JobPriority,
  JobStatus,
  type JobOptions,
  jobTypeToQueue,
  jobPayloadSchemas,
  queueConfigs,
  type JobPayloadMap,
} from "./types.js"

// Configuration constants
const COMPLETED_JOB_RETENTION_SECONDS = 7 * 24 * 60 * 60 // 7 days
const MAX_COMPLETED_JOBS_TO_KEEP = 1000
const DEFAULT_BACKOFF_DELAY_MS = 60000 // 1 minute

export interface QueueStats {
  waiting: number
  active: number
  completed: number
  failed: number
  delayed: number
  isPaused: boolean
}

/**
 * Centralized queue manager. The worker and the CLI scripts share one instance.
 */
export class QueueManager {
  private queues: Map<QueueName, Queue> = new Map()
  private queueEvents: Map<QueueName, QueueEvents> = new Map()
  private initialized = false

  constructor(private readonly getPoolFn: () => Pool = getPool) {}

  /**
   * Initialize all queues
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      logger.warn("Queue manager already initialized")
      return
    }

    logger.info("Initializing job queue manager...")

    // Create a queue for each queue name
    for (const queueName of Object.values(QueueName)) {
      const config = queueConfigs[queueName]
      const queue = new Queue(queueName, {
        connection: getRedisJobsClient(),
        defaultJobOptions: {
          removeOnComplete: {
            age: COMPLETED_JOB_RETENTION_SECONDS,
            count: MAX_COMPLETED_JOBS_TO_KEEP,
          },
          removeOnFail: false, // Never auto-remove failed jobs
          attempts: config.defaultAttempts,
          backoff: {
            type: "exponential",
            delay: DEFAULT_BACKOFF_DELAY_MS,
          },
        },
      })

      this.queues.set(queueName, queue)

      // Set up queue events
      const queueEvents = new QueueEvents(queueName, {
        connection: getRedisJobsClient(),
      })

      this.queueEvents.set(queueName, queueEvents)

      // Listen to job lifecycle events
      this.setupEventListeners(queueName, queueEvents)

      logger.info({ queue: queueName }, "Queue initialized")
    }

    this.initialized = true
    logger.info("Job queue manager initialized successfully")
  }

  /**
   * Set up event listeners for a queue
   */
  private setupEventListeners(queueName: QueueName, queueEvents: QueueEvents): void {
    // Job added to queue
    queueEvents.on("added", ({ jobId }) => {
      logger.debug({ queue: queueName, jobId }, "Job queued")
    })

    // Job started processing
    queueEvents.on("active", ({ jobId }) => {
      logger.debug({ queue: queueName, jobId }, "Job started")
      this.mirror(queueName, jobId, "active", () =>
        setJobRunStatus(this.getPoolFn(), jobId, JobStatus.ACTIVE)
      )
    })

    // Job completed successfully
    queueEvents.on("completed", ({ jobId, returnvalue }) => {
      logger.info({ queue: queueName, jobId }, "Job completed")
      this.mirror(queueName, jobId, "completed", async () => {
        const durationMs = await completeJobRun(this.getPoolFn(), jobId, returnvalue)
        logger.debug({ queue: queueName, jobId, durationMs }, "Job run closed")
      })
    })

    // Job failed
    queueEvents.on("failed", ({ jobId, failedReason }) => {
      logger.error({ queue: queueName, jobId, error: failedReason }, "Job failed")
      this.mirror(queueName, jobId, "failed", async () => {
        const run = await failJobRun(this.getPoolFn(), jobId, failedReason)
        if (run?.final) {
          logger.warn(
            { queue: queueName, jobId, attempts: run.attempts },
            "Job failed permanently"
          )
        }
      })
    })

    // Job delayed (scheduled for future)
    queueEvents.on("delayed", ({ jobId, delay }) => {
      logger.debug({ queue: queueName, jobId, delayMs: delay }, "Job delayed")
      this.mirror(queueName, jobId, "delayed", () =>
        setJobRunStatus(this.getPoolFn(), jobId, JobStatus.DELAYED)
      )
    })

    // Job stalled (worker crashed during processing)
    queueEvents.on("stalled", ({ jobId }) => {
      logger.warn({ queue: queueName, jobId }, "Job stalled - worker may have crashed")
    })
  }

  /**
   * Apply a job_runs update from an event listener. Failures are logged;
   * the queue itself is the source of truth.
   */
  private mirror(
    queueName: QueueName,
    jobId: string,
    event: string,
    update: () => Promise<void>
  ): void {
    Promise.resolve()
      .then(update)
      .catch((error: unknown) => {
        logger.error(
          { queue: queueName, jobId, event, error },
          "Failed to update job run in database"
        )
      })
  }

  /**
   * Add a job to the queue
   */
  async addJob<T extends JobType>(
    jobType: T,
    payload: JobPayloadMap[T],
    options: JobOptions = {}
  ): Promise<string> {
    if (!this.initialized) {
      throw new Error("Queue manager not initialized. Call initialize() first.")
    }

    // Validate payload
    const schema = jobPayloadSchemas[jobType]
    const validation = schema.safeParse(payload)

    if (!validation.success) {
      logger.error({ jobType, error: validation.error }, "Invalid job payload")
      throw new Error(`Invalid payload for job type ${jobType}: ${validation.error.message}`)
    }

    // Get queue for this job type
    const queueName = jobTypeToQueue[jobType]
    const queue = this.queues.get(queueName)

    if (!queue) {
      throw new Error(`Queue not found for job type: ${jobType}`)
    }

    // Pre-generate job ID for database consistency
    const jobId = options.jobId ?? `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`
    const priority = options.priority ?? JobPriority.NORMAL
    const attempts = options.attempts ?? queueConfigs[queueName].defaultAttempts

    // Insert into database BEFORE adding to BullMQ queue so the worker
    // always finds the row
    await insertJobRun(this.getPoolFn(), {
      jobId,
      jobType,
      queueName,
      priority,
      payload,
      maxAttempts: attempts,
      createdBy: options.createdBy,
    })

    const job = await queue.add(jobType, payload, {
      jobId,
      priority,
      delay: options.delay,
      attempts,
      backoff: options.backoff ?? {
        type: "exponential",
        delay: DEFAULT_BACKOFF_DELAY_MS,
      },
      removeOnComplete: options.removeOnComplete,
      removeOnFail: options.removeOnFail,
    })

    logger.info(
      {
        jobId: job.id,
        jobType,
        queue: queueName,
        priority: job.opts.priority,
        createdBy: options.createdBy ?? "unknown",
      },
      "Job added to queue"
    )

    return job.id ?? jobId
  }

  /**
   * Get queue by name
   */
  getQueue(queueName: QueueName): Queue | undefined {
    return this.queues.get(queueName)
  }

  /**
   * Get all queues
   */
  getAllQueues(): Queue[] {
    return Array.from(this.queues.values())
  }

  private requireQueue(queueName: QueueName): Queue {
    const queue = this.queues.get(queueName)

    if (!queue) {
      throw new Error(`Queue not found: ${queueName}`)
    }

    return queue
  }

  /**
   * Get queue statistics
   */
  async getQueueStats(queueName: QueueName): Promise<QueueStats> {
    const queue = this.requireQueue(queueName)

    const [waiting, active, completed, failed, delayed, isPaused] = await Promise.all([
      queue.getWaitingCount(),
      queue.getActiveCount(),
      queue.getCompletedCount(),
      queue.getFailedCount(),
      queue.getDelayedCount(),
      queue.isPaused(),
    ])

    return {
      waiting,
      active,
      completed,
      failed,
      delayed,
      isPaused,
    }
  }

  /**
   * Pause a queue
   */
  async pauseQueue(queueName: QueueName): Promise<void> {
    await this.requireQueue(queueName).pause()
    logger.info({ queue: queueName }, "Queue paused")
  }

  /**
   * Resume a paused queue
   */
  async resumeQueue(queueName: QueueName): Promise<void> {
    await this.requireQueue(queueName).resume()
    logger.info({ queue: queueName }, "Queue resumed")
  }

  /**
   * Clean completed jobs older than specified age
   */
  async cleanOldJobs(
    queueName: QueueName,
    olderThanMs: number = 7 * 24 * 60 * 60 * 1000
  ): Promise<number> {
    const jobs = await this.requireQueue(queueName).clean(olderThanMs, 1000, "completed")
    logger.info({ queue: queueName, cleaned: jobs.length }, "Cleaned old completed jobs")

    return jobs.length
  }

  /**
   * Graceful shutdown - close all queues and event listeners
   */
  async shutdown(): Promise<void> {
    logger.info("Shutting down queue manager...")

    // Close all queue events
    for (const [queueName, queueEvents] of this.queueEvents.entries()) {
      await queueEvents.close()
      logger.debug({ queue: queueName }, "Queue events closed")
    }

    // Close all queues
    for (const [queueName, queue] of this.queues.entries()) {
      await queue.close()
      logger.debug({ queue: queueName }, "Queue closed")
    }

    this.queues.clear()
    this.queueEvents.clear()
    this.initialized = false

    logger.info("Queue manager shut down successfully")
  }
}

// Export singleton instance
export const queueManager = new QueueManager()
