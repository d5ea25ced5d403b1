/**
 * Base Job Handler - Abstract base class for all job handlers
 *
 * All job handlers must extend this class and implement:
 * - jobType: The JobType enum value
 * - queueName: The QueueName this handler belongs to
 * - schema: Zod schema the job data is parsed with
 * - process(): Main job processing logic
 *
 * Optional overrides:
 * - exclusiveLock: distributed lock held for the whole run
 * - onCompleted(): Hook called after successful completion
 * - onFailed(): Hook called after failure
 */

import { UnrecoverableError, type Job } from "bullmq"
import { randomUUID } from "crypto"
import type { Pool } from "pg"
import type { z } from "zod"
import type { BackupRunner, BackupScheduler } from "../../backup/types.js"
import type { SyncConfig } from "../../config.js"
import { getErrorMessage } from "../../errors.js"
import { isAbort } from "../../fatal-error-classifier.js"
import { persistLog } from "../../log-persistence.js"
import { createComponentLogger, type Logger } from "../../logger.js"
import type { LockProvider } from "../../redis.js"
import type { ScanContext } from "../../scans/context.js"
import type { ShutdownSignal } from "../../shutdown.js"
import type { JobType, QueueName, JobResult } from "../types.js"

/**
 * What handlers are built with. The worker wires the real implementations,
 * tests pass in-process ones.
 */
export interface JobDependencies {
  pool: Pool
  config: SyncConfig
  locks: LockProvider
  /** Where scans request backups after changing the store */
  backup: BackupScheduler
  /** Performs the backup jobs themselves */
  backupRunner: BackupRunner
  shutdown?: ShutdownSignal
  /** Overrides the browser-backed scan context */
  scanContext?: () => ScanContext
}

/**
 * A lock held while the job runs. A job that cannot take it is skipped, not failed.
 */
export interface ExclusiveLock {
  name: string
  ttlMs: number
}

/**
 * Abstract base class for job handlers
 */
export abstract class BaseJobHandler<TPayload = unknown, TResult = unknown> {
  /**
   * Job type this handler processes
   */
  abstract readonly jobType: JobType

  /**
   * Queue this handler belongs to
   */
  abstract readonly queueName: QueueName

  /**
   * Schema the raw job data is parsed with, defaults applied
   */
  protected abstract readonly schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>

  readonly exclusiveLock?: ExclusiveLock

  constructor(protected readonly deps: JobDependencies) {}

  /**
   * Main processing logic - must be implemented by subclasses
   */
  abstract process(job: Job<unknown>, payload: TPayload): Promise<JobResult<TResult>>

  /**
   * Parse the job payload. Bad data never gets better on retry, so it fails
   * the job for good.
   */
  validate(payload: unknown): TPayload {
    const parsed = this.schema.safeParse(payload)
    if (!parsed.success) {
      throw new UnrecoverableError(`Invalid ${this.jobType} payload: ${parsed.error.message}`)
    }
    return parsed.data
  }

  /**
   * Hook called after successful job completion
   */
  async onCompleted(job: Job<unknown>, result: JobResult<TResult>): Promise<void> {
    this.createLogger(job).info(
      { skipped: result.skipped ?? false, metadata: result.metadata },
      result.skipped ? "Job skipped" : "Job completed successfully"
    )
  }

  /**
   * Hook called after job failure. The error is also kept in error_logs.
   */
  async onFailed(job: Job<unknown>, error: Error): Promise<void> {
    const maxAttempts = job.opts.attempts ?? 1
    const isPermanent = error instanceof UnrecoverableError || job.attemptsMade + 1 >= maxAttempts

    this.createLogger(job).error(
      { maxAttempts, error: error.message, stack: error.stack, isPermanent },
      "Job failed"
    )

    await persistLog(this.deps.pool, {
      level: "error",
      source: "job",
      message: error.message,
      jobName: this.jobType,
      details: { jobId: job.id, attemptNumber: job.attemptsMade + 1, isPermanent },
      errorStack: error.stack,
    })
  }

  /**
   * Validate, process and report. Called by the worker - not meant to be overridden
   */
  async execute(job: Job<unknown>): Promise<JobResult<TResult>> {
    try {
      const payload = this.validate(job.data)
      const result = await this.withExclusiveLock(job, () => this.process(job, payload))

      await this.onCompleted(job, result)

      return result
    } catch (error) {
      const failure = toJobError(error)

      await this.onFailed(job, failure)

      // Re-throw for BullMQ to handle retries
      throw failure
    }
  }

  private async withExclusiveLock(
    job: Job<unknown>,
    fn: () => Promise<JobResult<TResult>>
  ): Promise<JobResult<TResult>> {
    const lock = this.exclusiveLock
    if (!lock) {
      return fn()
    }

    const holder = `${this.jobType}:${job.id ?? "unknown"}:${randomUUID()}`
    const acquired = await this.deps.locks.acquire(lock.name, holder, lock.ttlMs)
    if (!acquired) {
      this.createLogger(job).info({ lockName: lock.name }, "Lock held by another job")
      return { success: true, skipped: true }
    }

    try {
      return await fn()
    } finally {
      await this.deps.locks.release(lock.name, holder)
    }
  }

  /**
   * Helper: Create a child logger with job context
   */
  protected createLogger(job: Job<unknown>): Logger {
    return createComponentLogger("job", {
      jobId: job.id,
      jobType: this.jobType,
      queueName: this.queueName,
      attemptNumber: job.attemptsMade + 1,
    })
  }
}

/**
 * Errors that no retry can fix stop BullMQ from trying again.
 */
function toJobError(error: unknown): Error {
  if (error instanceof UnrecoverableError) {
    return error
  }
  if (isAbort(error)) {
    const wrapped = new UnrecoverableError(getErrorMessage(error))
    if (error instanceof Error) {
      wrapped.stack = error.stack
    }
    return wrapped
  }
  return error instanceof Error ? error : new Error(getErrorMessage(error))
}
