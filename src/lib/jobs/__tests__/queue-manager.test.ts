/**
 * Queue Manager Tests
 *
 * BullMQ is replaced with in-process queues; job_runs lives in PGlite.
 *
 * Tests:
 * - Queue initialization
 * - Job creation and validation
 * - Job state mirrored from queue events
 * - Queue statistics and management
 */

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest"
import type { Pool } from "pg"

const { FakeQueue, FakeQueueEvents } = vi.hoisted(() => {
  interface AddOptions {
    jobId?: string
    priority?: number
  }

  class FakeQueue {
    static instances: FakeQueue[] = []
    readonly add = vi.fn(async (name: string, data: unknown, opts: AddOptions) => ({
      id: opts.jobId,
      name,
      data,
      opts,
    }))
    readonly getWaitingCount = vi.fn(async () => 3)
    readonly getActiveCount = vi.fn(async () => 1)
    readonly getCompletedCount = vi.fn(async () => 12)
    readonly getFailedCount = vi.fn(async () => 2)
    readonly getDelayedCount = vi.fn(async () => 0)
    readonly isPaused = vi.fn(async () => false)
    readonly pause = vi.fn(async () => undefined)
    readonly resume = vi.fn(async () => undefined)
    readonly clean = vi.fn(async () => ["a", "b"])
    readonly close = vi.fn(async () => undefined)

    constructor(
      readonly name: string,
      readonly options: { defaultJobOptions?: { attempts?: number } }
    ) {
      FakeQueue.instances.push(this)
    }
  }

  type Listener = (args: Record<string, string>) => void

  class FakeQueueEvents {
    static instances: FakeQueueEvents[] = []
    readonly listeners = new Map<string, Listener>()
    readonly close = vi.fn(async () => undefined)

    constructor(readonly name: string) {
      FakeQueueEvents.instances.push(this)
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, listener)
      return this
    }

    emit(event: string, args: Record<string, string>): void {
      this.listeners.get(event)?.(args)
    }
  }

  return { FakeQueue, FakeQueueEvents }
})

vi.mock("bullmq", () => ({ Queue: FakeQueue, QueueEvents: FakeQueueEvents }))
vi.mock("../redis.js", () => ({ getRedisJobsClient: () => ({}) }))

import { getJobRun } from "../../db/job-runs.js"
import { logger } from "../../logger.js"
import { closeTestDb, getTestPool } from "../../../test/pglite-helper.js"
import { QueueManager } from "../queue-manager.js"
import { JobType, QueueName, JobPriority } from "../types.js"

function queueNamed(name: QueueName) {
  const queue = FakeQueue.instances.find((q) => q.name === name)
  if (!queue) {
    throw new Error(`no fake queue ${name}`)
  }
  return queue
}

function eventsFor(name: QueueName) {
  const events = FakeQueueEvents.instances.find((e) => e.name === name)
  if (!events) {
    throw new Error(`no fake queue events ${name}`)
  }
  return events
}

describe("QueueManager", () => {
  let pool: Pool
  let manager: QueueManager

  beforeEach(async () => {
    FakeQueue.instances = []
    FakeQueueEvents.instances = []
    pool = await getTestPool()
    manager = new QueueManager(() => pool)
  })

  afterEach(async () => {
    await manager.shutdown()
    vi.restoreAllMocks()
  })

  afterAll(async () => {
    await closeTestDb()
  })

  describe("Initialization", () => {
    it("creates a queue and an event stream per queue name", async () => {
      await manager.initialize()

      expect(FakeQueue.instances.map((q) => q.name)).toEqual(["browser", "backup", "maintenance"])
      expect(FakeQueueEvents.instances).toHaveLength(3)
      expect(manager.getQueue(QueueName.BACKUP)).toBe(queueNamed(QueueName.BACKUP))
    })

    it("never retries browser jobs by default", async () => {
      await manager.initialize()

      expect(queueNamed(QueueName.BROWSER).options.defaultJobOptions?.attempts).toBe(1)
      expect(queueNamed(QueueName.BACKUP).options.defaultJobOptions?.attempts).toBe(3)
    })

    it("ignores a second initialize", async () => {
      await manager.initialize()
      await manager.initialize()

      expect(FakeQueue.instances).toHaveLength(3)
    })
  })

  describe("Job Creation", () => {
    it("refuses jobs before initialize", async () => {
      await expect(manager.addJob(JobType.HISTORY_SCAN, {})).rejects.toThrow(
        "Queue manager not initialized. Call initialize() first."
      )
    })

    it("records the run and queues the job", async () => {
      await manager.initialize()

      const jobId = await manager.addJob(
        JobType.SCAN_BY_IDS,
        { ids: [4, 9] },
        { jobId: "manual-1", priority: JobPriority.HIGH, createdBy: "test" }
      )

      expect(jobId).toBe("manual-1")
      expect(queueNamed(QueueName.BROWSER).add).toHaveBeenCalledWith(
        "scan-by-ids",
        { ids: [4, 9] },
        expect.objectContaining({ jobId: "manual-1", priority: 2, attempts: 1 })
      )
      expect(await getJobRun(pool, "manual-1")).toMatchObject({
        job_type: "scan-by-ids",
        queue_name: "browser",
        status: "pending",
        priority: 2,
        payload: { ids: [4, 9] },
        max_attempts: 1,
        created_by: "test",
      })
    })

    it("generates an ID when none is given", async () => {
      await manager.initialize()

      const jobId = await manager.addJob(JobType.EXPIRE_CODES, {})

      expect(jobId).toMatch(/^\d+-[a-z0-9]+$/)
      expect((await getJobRun(pool, jobId))?.priority).toBe(JobPriority.NORMAL)
    })

    it("rejects payloads the job type does not accept", async () => {
      await manager.initialize()

      await expect(manager.addJob(JobType.SCAN_BY_IDS, { ids: [] })).rejects.toThrow(
        "Invalid payload for job type scan-by-ids"
      )
      expect(queueNamed(QueueName.BROWSER).add).not.toHaveBeenCalled()
      const runs = await pool.query("SELECT job_id FROM job_runs")
      expect(runs.rows).toEqual([])
    })

    it("writes the run before handing the job to the queue", async () => {
      await manager.initialize()
      queueNamed(QueueName.MAINTENANCE).add.mockRejectedValueOnce(new Error("Connection is closed"))

      await expect(
        manager.addJob(JobType.CLEANUP_LOGS, {}, { jobId: "cleanup-1" })
      ).rejects.toThrow("Connection is closed")

      expect((await getJobRun(pool, "cleanup-1"))?.status).toBe("pending")
    })
  })

  describe("Event mirroring", () => {
    beforeEach(async () => {
      await manager.initialize()
    })

    it("marks runs active and then completed", async () => {
      await manager.addJob(JobType.GAP_SCAN, {}, { jobId: "gap-1" })
      const events = eventsFor(QueueName.BROWSER)

      events.emit("active", { jobId: "gap-1" })
      await vi.waitFor(async () => {
        expect((await getJobRun(pool, "gap-1"))?.status).toBe("active")
      })

      events.emit("completed", { jobId: "gap-1", returnvalue: '{"success":true}' })
      await vi.waitFor(async () => {
        expect(await getJobRun(pool, "gap-1")).toMatchObject({
          status: "completed",
          result: { success: true },
          attempts: 1,
        })
      })
    })

    it("keeps a failed run open while retries remain", async () => {
      await manager.addJob(JobType.BACKUP_STORE, {}, { jobId: "backup-store" })

      eventsFor(QueueName.BACKUP).emit("failed", {
        jobId: "backup-store",
        failedReason: "upload exited with 1",
      })

      await vi.waitFor(async () => {
        expect(await getJobRun(pool, "backup-store")).toMatchObject({
          status: "failed",
          error_message: "upload exited with 1",
          attempts: 1,
          completed_at: null,
        })
      })
    })

    it("logs database failures instead of throwing from the listener", async () => {
      const errorSpy = vi.spyOn(logger, "error")
      const broken = new QueueManager(() => {
        throw new Error("pool is gone")
      })
      await broken.initialize()
      const events = FakeQueueEvents.instances[FakeQueueEvents.instances.length - 1]

      expect(() => events?.emit("delayed", { jobId: "x", delay: "500" })).not.toThrow()
      await vi.waitFor(() => {
        expect(errorSpy).toHaveBeenCalledWith(
          expect.objectContaining({ jobId: "x", event: "delayed" }),
          "Failed to update job run in database"
        )
      })

      await broken.shutdown()
    })
  })

  describe("Queue Management", () => {
    beforeEach(async () => {
      await manager.initialize()
    })

    it("reports queue statistics", async () => {
      expect(await manager.getQueueStats(QueueName.BROWSER)).toEqual({
        waiting: 3,
        active: 1,
        completed: 12,
        failed: 2,
        delayed: 0,
        isPaused: false,
      })
    })

    it("pauses and resumes a queue", async () => {
      await manager.pauseQueue(QueueName.BACKUP)
      await manager.resumeQueue(QueueName.BACKUP)

      expect(queueNamed(QueueName.BACKUP).pause).toHaveBeenCalledTimes(1)
      expect(queueNamed(QueueName.BACKUP).resume).toHaveBeenCalledTimes(1)
    })

    it("cleans completed jobs older than the given age", async () => {
      expect(await manager.cleanOldJobs(QueueName.MAINTENANCE, 1000)).toBe(2)
      expect(queueNamed(QueueName.MAINTENANCE).clean).toHaveBeenCalledWith(1000, 1000, "completed")
    })

    it("closes everything on shutdown", async () => {
      await manager.shutdown()

      for (const queue of FakeQueue.instances) {
        expect(queue.close).toHaveBeenCalledTimes(1)
      }
      for (const events of FakeQueueEvents.instances) {
        expect(events.close).toHaveBeenCalledTimes(1)
      }
      expect(manager.getAllQueues()).toEqual([])
      await expect(manager.getQueueStats(QueueName.BROWSER)).rejects.toThrow(
        "Queue not found: browser"
      )
    })
  })
})
