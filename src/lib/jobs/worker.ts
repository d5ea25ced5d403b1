/**
 * Job Worker - Processes jobs from queues
 *
 * Responsibilities:
 * - Start workers for specified queues
 * - Process jobs by delegating to the registered handler
 * - Configure concurrency per queue
 * - Configure rate limits per queue
 * - Handle worker errors gracefully
 * - Log a periodic heartbeat
 */

import { Worker, type Job } from "bullmq"
import type { Pool } from "pg"
import { startJobRun } from "../db/job-runs.js"
import { getPool } from "../db/pool.js"
import { logger } from "../logger.js"
import { getRedisJobsClient } from "./redis.js"
import { QueueName, queueConfigs, isJobType } from "./types.js"
import { getHandler } from "./handlers/index.js"

const HEARTBEAT_INTERVAL_MS = 60000

export interface WorkerStats {
  processedCount: number
  failedCount: number
  successRate: number
  workerCount: number
}

/**
 * Parse a comma-separated queue list (WORKER_QUEUES). Unset means every queue.
 *
 * @throws Error on unknown names or a list with no names in it
 */
export function parseQueueNames(value: string | undefined): QueueName[] {
  if (value === undefined) {
    return Object.values(QueueName)
  }

  const parsed = value
    .split(",")
    .map((q) => q.trim())
    .filter((q) => q.length > 0)

  const queueNames: QueueName[] = []
  const invalid: string[] = []
  for (const entry of parsed) {
    const queueName = Object.values(QueueName).find((name) => name === entry)
    if (!queueName) {
      invalid.push(entry)
    } else if (!queueNames.includes(queueName)) {
      // Deduplicate while preserving order
      queueNames.push(queueName)
    }
  }

  if (invalid.length > 0) {
    throw new Error(`Invalid queue names: ${invalid.join(", ")}`)
  }

  if (queueNames.length === 0) {
    throw new Error("Queue list contains no queue names")
  }

  return queueNames
}

/**
 * Job Worker class
 */
export class JobWorker {
  private workers: Map<QueueName, Worker> = new Map()
  private processedCount = 0
  private failedCount = 0
  private heartbeatInterval?: NodeJS.Timeout

  constructor(private readonly getPoolFn: () => Pool = getPool) {}

  /**
   * Start workers for specified queues
   * If no queues specified, starts workers for all queues
   */
  async start(queueNames: QueueName[] = Object.values(QueueName)): Promise<void> {
    logger.info({ queues: queueNames }, "Starting job workers...")

    for (const queueName of queueNames) {
      const config = queueConfigs[queueName]

      // Create worker for this queue
      const worker = new Worker(queueName, (job: Job<unknown>) => this.processJob(job), {
        connection: getRedisJobsClient(),
        concurrency: config.concurrency,
        limiter: config.rateLimit
          ? {
              max: config.rateLimit.max,
              duration: config.rateLimit.duration,
            }
          : undefined,
        autorun: true,
      })

      // Set up worker event listeners
      this.setupWorkerEvents(worker, queueName)

      this.workers.set(queueName, worker)

      logger.info(
        {
          queue: queueName,
          concurrency: config.concurrency,
          rateLimit: config.rateLimit,
        },
        "Worker started"
      )
    }

    // Start heartbeat
    this.startHeartbeat()

    logger.info({ workerCount: this.workers.size }, "All workers started successfully")
  }

  /**
   * Process a job by delegating to appropriate handler
   */
  async processJob(job: Job<unknown>): Promise<unknown> {
    const jobLogger = logger.child({
      jobId: job.id,
      jobType: job.name,
      attemptNumber: job.attemptsMade + 1,
    })

    jobLogger.info("Processing job")

    // Get handler for this job type
    const handler = isJobType(job.name) ? getHandler(job.name) : undefined

    if (!handler) {
      jobLogger.error("No handler registered for job type")
      throw new Error(`No handler registered for job type: ${job.name}`)
    }

    await this.recordStart(job, handler.queueName)

    // Execute job through handler
    const startTime = Date.now()
    this.processedCount++

    try {
      const result = await handler.execute(job)

      jobLogger.info({ durationMs: Date.now() - startTime }, "Job processed successfully")

      return result
    } catch (error) {
      jobLogger.error({ durationMs: Date.now() - startTime, error }, "Job processing failed")

      this.failedCount++

      throw error
    }
  }

  /**
   * Jobs from schedulers never pass through addJob, so their job_runs row
   * is created here.
   */
  private async recordStart(job: Job<unknown>, queueName: QueueName): Promise<void> {
    if (!job.id) {
      return
    }

    try {
      await startJobRun(this.getPoolFn(), {
        jobId: job.id,
        jobType: job.name,
        queueName,
        priority: job.opts.priority ?? 0,
        payload: job.data,
        maxAttempts: job.opts.attempts ?? 1,
      })
    } catch (error) {
      logger.error({ jobId: job.id, error }, "Failed to record job start in database")
    }
  }

  /**
   * Set up event listeners for a worker
   */
  private setupWorkerEvents(worker: Worker, queueName: QueueName): void {
    // Worker started
    worker.on("ready", () => {
      logger.info({ queue: queueName }, "Worker ready")
    })

    // Worker active (processing job)
    worker.on("active", (job: Job) => {
      logger.debug(
        {
          queue: queueName,
          jobId: job.id,
          jobType: job.name,
          waitTimeMs: Date.now() - job.timestamp,
        },
        "Worker started processing job"
      )
    })

    // Worker completed job
    worker.on("completed", (job: Job) => {
      logger.info(
        {
          queue: queueName,
          jobId: job.id,
          jobType: job.name,
          durationMs: job.processedOn ? Date.now() - job.processedOn : 0,
        },
        "Worker completed job"
      )
    })

    // Worker failed to process job
    worker.on("failed", (job: Job | undefined, error: Error) => {
      if (!job) {
        logger.error({ queue: queueName, error }, "Worker failed without job context")
        return
      }

      logger.error(
        {
          queue: queueName,
          jobId: job.id,
          jobType: job.name,
          attemptNumber: job.attemptsMade,
          maxAttempts: job.opts.attempts ?? 1,
          durationMs: job.processedOn ? Date.now() - job.processedOn : 0,
          error: error.message,
        },
        "Worker failed to process job"
      )
    })

    // Worker stalled (job stuck, worker may have crashed)
    worker.on("stalled", (jobId: string) => {
      logger.warn({ queue: queueName, jobId }, "Worker detected stalled job")
    })

    // Worker error
    worker.on("error", (error: Error) => {
      logger.error(
        {
          queue: queueName,
          error: error.message,
          stack: error.stack,
        },
        "Worker error"
      )
    })

    // Worker closing
    worker.on("closing", () => {
      logger.info({ queue: queueName }, "Worker closing")
    })

    // Worker closed
    worker.on("closed", () => {
      logger.info({ queue: queueName }, "Worker closed")
    })
  }

  /**
   * Start periodic heartbeat log
   */
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      const stats = this.getStats()
      logger.debug(
        {
          processed: stats.processedCount,
          failed: stats.failedCount,
          successRate: stats.successRate.toFixed(2),
        },
        "Worker heartbeat"
      )
    }, HEARTBEAT_INTERVAL_MS)
    this.heartbeatInterval.unref()
  }

  /**
   * Get worker statistics
   */
  getStats(): WorkerStats {
    const successRate =
      this.processedCount > 0
        ? ((this.processedCount - this.failedCount) / this.processedCount) * 100
        : 100

    return {
      processedCount: this.processedCount,
      failedCount: this.failedCount,
      successRate,
      workerCount: this.workers.size,
    }
  }

  /**
   * Graceful shutdown
   */
  async shutdown(): Promise<void> {
    logger.info("Shutting down workers...")

    // Stop heartbeat
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval)
      this.heartbeatInterval = undefined
    }

    // Close all workers (gracefully finish current jobs)
    const closePromises = Array.from(this.workers.entries()).map(([queueName, worker]) => {
      logger.info({ queue: queueName }, "Closing worker...")
      return worker.close()
    })

    await Promise.all(closePromises)

    this.workers.clear()

    logger.info("All workers shut down successfully")
  }
}
