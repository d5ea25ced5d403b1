/**
 * Tests for job queue type system
 *
 * Validates:
 * - Zod schema validation
 * - Job type to queue mapping
 * - Queue configurations
 */

import { describe, it, expect } from "vitest"
import {
  JobType,
  QueueName,
  JobPriority,
  isJobType,
  fullScanPayloadSchema,
  updateDetailsPayloadSchema,
  updateDurationsPayloadSchema,
  scanByIdsPayloadSchema,
  processRefreshQueuesPayloadSchema,
  cleanupLogsPayloadSchema,
  historyScanPayloadSchema,
  jobPayloadSchemas,
  jobTypeToQueue,
  queueConfigs,
} from "../types.js"

describe("Job Types", () => {
  it("uses kebab-case names as BullMQ job names", () => {
    expect(JobType.HISTORY_SCAN).toBe("history-scan")
    expect(JobType.PROCESS_REFRESH_QUEUES).toBe("process-refresh-queues")
    expect(JobType.BACKUP_COOKIES).toBe("backup-cookies")
  })

  it("recognises job type names", () => {
    expect(isJobType("gap-scan")).toBe(true)
    expect(isJobType("GAP_SCAN")).toBe(false)
    expect(isJobType("warm-cache")).toBe(false)
  })

  it("has all queue names defined", () => {
    expect(Object.values(QueueName)).toEqual(["browser", "backup", "maintenance"])
  })

  it("orders priorities the way BullMQ does, lowest number first", () => {
    expect(JobPriority.CRITICAL).toBeLessThan(JobPriority.HIGH)
    expect(JobPriority.HIGH).toBeLessThan(JobPriority.NORMAL)
    expect(JobPriority.NORMAL).toBeLessThan(JobPriority.LOW)
  })
})

describe("Payload Schemas", () => {
  it("rejects unknown keys on parameterless jobs", () => {
    expect(historyScanPayloadSchema.safeParse({}).success).toBe(true)
    expect(historyScanPayloadSchema.safeParse({ limit: 5 }).success).toBe(false)
  })

  it("accepts only catalog categories for the full scan", () => {
    expect(fullScanPayloadSchema.parse({ type: "serial" })).toEqual({ type: "serial" })
    expect(fullScanPayloadSchema.parse({})).toEqual({})
    // 3d is a show type but has no catalog listing
    expect(fullScanPayloadSchema.safeParse({ type: "3d" }).success).toBe(false)
  })

  it("defaults limits to 100", () => {
    expect(updateDetailsPayloadSchema.parse({})).toEqual({ limit: 100 })
    expect(updateDurationsPayloadSchema.parse({ type: "3d" })).toEqual({ limit: 100, type: "3d" })
  })

  it("rejects non-positive limits and unknown categories", () => {
    expect(updateDetailsPayloadSchema.safeParse({ limit: 0 }).success).toBe(false)
    expect(updateDetailsPayloadSchema.safeParse({ limit: 2.5 }).success).toBe(false)
    expect(updateDurationsPayloadSchema.safeParse({ type: "anime" }).success).toBe(false)
  })

  it("requires at least one positive ID", () => {
    expect(scanByIdsPayloadSchema.parse({ ids: [3, 1] })).toEqual({ ids: [3, 1] })
    expect(scanByIdsPayloadSchema.safeParse({ ids: [] }).success).toBe(false)
    expect(scanByIdsPayloadSchema.safeParse({ ids: [0] }).success).toBe(false)
  })

  it("caps the refresh batch size", () => {
    expect(processRefreshQueuesPayloadSchema.parse({})).toEqual({})
    expect(processRefreshQueuesPayloadSchema.safeParse({ batchSize: 501 }).success).toBe(false)
  })

  it("defaults retention windows for log cleanup", () => {
    expect(cleanupLogsPayloadSchema.parse({})).toEqual({ errorLogDays: 90, checkpointDays: 30 })
  })

  it("has a schema for every job type", () => {
    for (const jobType of Object.values(JobType)) {
      expect(jobPayloadSchemas[jobType]).toBeDefined()
    }
  })
})

describe("Queue Mapping", () => {
  it("routes browser scans to the browser queue", () => {
    expect(jobTypeToQueue[JobType.FULL_SCAN]).toBe(QueueName.BROWSER)
    expect(jobTypeToQueue[JobType.SCAN_BY_IDS]).toBe(QueueName.BROWSER)
    expect(jobTypeToQueue[JobType.PROCESS_REFRESH_QUEUES]).toBe(QueueName.BROWSER)
  })

  it("routes backups and maintenance to their own queues", () => {
    expect(jobTypeToQueue[JobType.BACKUP_STORE]).toBe(QueueName.BACKUP)
    expect(jobTypeToQueue[JobType.EXPIRE_CODES]).toBe(QueueName.MAINTENANCE)
    expect(jobTypeToQueue[JobType.CLEANUP_LOGS]).toBe(QueueName.MAINTENANCE)
  })

  it("runs one job at a time per queue", () => {
    for (const queueName of Object.values(QueueName)) {
      expect(queueConfigs[queueName].concurrency).toBe(1)
    }
    expect(queueConfigs[QueueName.BROWSER].defaultAttempts).toBe(1)
  })
})
