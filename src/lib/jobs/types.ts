/**
 * Type definitions for the job queue system
 *
 * This file defines:
 * - Job types (every scan, backup and maintenance task)
 * - Queue names (job routing)
 * - Priority levels
 * - Payload schemas (type-safe job data with Zod validation)
 * - Job options and results
 */

import { z } from "zod"
import { CATALOG_CATEGORIES, isCategoryKey } from "../constants.js"

// ============================================================
// JOB TYPES
// ============================================================

/**
 * All available job types in the system
 *
 * Scan jobs drive a browser session; backup and maintenance jobs do not.
 */
export enum JobType {
  // Browser scans
  HISTORY_SCAN = "history-scan",
  FULL_SCAN = "full-scan",
  GAP_SCAN = "gap-scan",
  NEW_EPISODES = "new-episodes",
  DAILY_SYNC = "daily-sync",
  UPDATE_DETAILS = "update-details",
  UPDATE_DURATIONS = "update-durations",
  SCAN_BY_IDS = "scan-by-ids",
  PROCESS_REFRESH_QUEUES = "process-refresh-queues",

  // Off-box snapshots
  BACKUP_STORE = "backup-store",
  BACKUP_COOKIES = "backup-cookies",

  // Maintenance operations
  EXPIRE_CODES = "expire-codes",
  CLEANUP_LOGS = "cleanup-logs",
}

export function isJobType(value: string): value is JobType {
  return Object.values<string>(JobType).includes(value)
}

// ============================================================
// QUEUE NAMES
// ============================================================

/**
 * Queue categories for job routing
 */
export enum QueueName {
  BROWSER = "browser", // One browser session per worker
  BACKUP = "backup", // Snapshot uploads, serialized
  MAINTENANCE = "maintenance", // Periodic housekeeping
}

// ============================================================
// JOB PRIORITY LEVELS
// ============================================================

/**
 * Priority levels for job processing
 *
 * BullMQ runs lower numbers first
 */
export enum JobPriority {
  CRITICAL = 1,
  HIGH = 2, // Operator-triggered runs
  NORMAL = 5, // Default priority for most jobs
  LOW = 10, // Quarterly and catch-up scans
}

// ============================================================
// JOB STATUS
// ============================================================

/**
 * Possible job states, mirrored into job_runs
 */
export enum JobStatus {
  PENDING = "pending", // Waiting in queue
  ACTIVE = "active", // Currently being processed
  COMPLETED = "completed", // Successfully finished
  FAILED = "failed", // Attempt failed
  DELAYED = "delayed", // Scheduled for future execution
  CANCELLED = "cancelled", // Manually cancelled
}

// ============================================================
// PAYLOAD SCHEMAS
// ============================================================

const emptyPayloadSchema = z.object({}).strict()

const catalogCategorySchema = z.enum(CATALOG_CATEGORIES)

const categoryKeySchema = z.string().refine(isCategoryKey, {
  message: "Unknown category",
})

const limitSchema = z.number().int().positive()

export const historyScanPayloadSchema = emptyPayloadSchema

export const fullScanPayloadSchema = z.object({
  type: catalogCategorySchema.optional(),
})

export const gapScanPayloadSchema = emptyPayloadSchema

export const newEpisodesPayloadSchema = emptyPayloadSchema

export const dailySyncPayloadSchema = emptyPayloadSchema

export const updateDetailsPayloadSchema = z.object({
  limit: limitSchema.default(100),
})

export const updateDurationsPayloadSchema = z.object({
  limit: limitSchema.default(100),
  type: categoryKeySchema.optional(),
})

export const scanByIdsPayloadSchema = z.object({
  ids: z.array(z.number().int().positive()).min(1),
})

export const processRefreshQueuesPayloadSchema = z.object({
  batchSize: z.number().int().positive().max(500).optional(),
})

export const backupPayloadSchema = emptyPayloadSchema

export const expireCodesPayloadSchema = emptyPayloadSchema

export const cleanupLogsPayloadSchema = z.object({
  errorLogDays: z.number().int().positive().default(90),
  checkpointDays: z.number().int().positive().default(30),
})

/**
 * Map of job types to their payload schemas
 */
export const jobPayloadSchemas = {
  [JobType.HISTORY_SCAN]: historyScanPayloadSchema,
  [JobType.FULL_SCAN]: fullScanPayloadSchema,
  [JobType.GAP_SCAN]: gapScanPayloadSchema,
  [JobType.NEW_EPISODES]: newEpisodesPayloadSchema,
  [JobType.DAILY_SYNC]: dailySyncPayloadSchema,
  [JobType.UPDATE_DETAILS]: updateDetailsPayloadSchema,
  [JobType.UPDATE_DURATIONS]: updateDurationsPayloadSchema,
  [JobType.SCAN_BY_IDS]: scanByIdsPayloadSchema,
  [JobType.PROCESS_REFRESH_QUEUES]: processRefreshQueuesPayloadSchema,
  [JobType.BACKUP_STORE]: backupPayloadSchema,
  [JobType.BACKUP_COOKIES]: backupPayloadSchema,
  [JobType.EXPIRE_CODES]: expireCodesPayloadSchema,
  [JobType.CLEANUP_LOGS]: cleanupLogsPayloadSchema,
} as const

// ============================================================
// PAYLOAD TYPE INFERENCE
// ============================================================

/**
 * Payloads as handlers see them, defaults applied
 */
export type FullScanPayload = z.infer<typeof fullScanPayloadSchema>
export type UpdateDetailsPayload = z.infer<typeof updateDetailsPayloadSchema>
export type UpdateDurationsPayload = z.infer<typeof updateDurationsPayloadSchema>
export type ScanByIdsPayload = z.infer<typeof scanByIdsPayloadSchema>
export type ProcessRefreshQueuesPayload = z.infer<typeof processRefreshQueuesPayloadSchema>
export type CleanupLogsPayload = z.infer<typeof cleanupLogsPayloadSchema>
export type EmptyPayload = z.infer<typeof emptyPayloadSchema>

/**
 * Type-safe payload lookup by job type, as callers pass it (defaults optional)
 */
export type JobPayloadMap = {
  [K in JobType]: z.input<(typeof jobPayloadSchemas)[K]>
}

/**
 * Union type of all possible payloads
 */
export type JobPayload = JobPayloadMap[keyof JobPayloadMap]

// ============================================================
// JOB OPTIONS
// ============================================================

/**
 * Options when creating a job
 */
export interface JobOptions {
  jobId?: string // Override the job ID. A job with the same ID still queued absorbs the add.
  priority?: JobPriority
  delay?: number // Delay in milliseconds before job is processed
  attempts?: number // Maximum number of attempts (default: 1)
  backoff?: {
    type: "exponential" | "fixed"
    delay: number // Base delay in milliseconds
  }
  removeOnComplete?: boolean | number
  removeOnFail?: boolean | number
  createdBy?: string // Who/what created this job (script name, scan, schedule)
}

// ============================================================
// JOB RESULT
// ============================================================

/**
 * Result returned by job handlers
 */
export interface JobResult<T = unknown> {
  success: boolean
  data?: T
  error?: string
  /** The run did not happen, e.g. another job held the exclusive lock */
  skipped?: boolean
  metadata?: Record<string, unknown>
}

// ============================================================
// JOB QUEUE CONFIGURATION
// ============================================================

/**
 * Configuration for each queue
 */
export interface QueueConfig {
  name: QueueName
  concurrency: number // Number of jobs processed concurrently
  defaultAttempts: number
  rateLimit?: {
    max: number // Maximum number of jobs
    duration: number // Per duration in milliseconds
  }
}

/**
 * Default queue configurations
 */
export const queueConfigs: Record<QueueName, QueueConfig> = {
  [QueueName.BROWSER]: {
    name: QueueName.BROWSER,
    concurrency: 1, // A worker owns one browser session at a time
    defaultAttempts: 1, // Scans resume or rerun on their own schedule
  },
  [QueueName.BACKUP]: {
    name: QueueName.BACKUP,
    concurrency: 1, // Uploads overwrite the same remote snapshot
    defaultAttempts: 3,
  },
  [QueueName.MAINTENANCE]: {
    name: QueueName.MAINTENANCE,
    concurrency: 1,
    defaultAttempts: 3,
  },
}

// ============================================================
// JOB TYPE TO QUEUE MAPPING
// ============================================================

/**
 * Map job types to their queues
 */
export const jobTypeToQueue: Record<JobType, QueueName> = {
  [JobType.HISTORY_SCAN]: QueueName.BROWSER,
  [JobType.FULL_SCAN]: QueueName.BROWSER,
  [JobType.GAP_SCAN]: QueueName.BROWSER,
  [JobType.NEW_EPISODES]: QueueName.BROWSER,
  [JobType.DAILY_SYNC]: QueueName.BROWSER,
  [JobType.UPDATE_DETAILS]: QueueName.BROWSER,
  [JobType.UPDATE_DURATIONS]: QueueName.BROWSER,
  [JobType.SCAN_BY_IDS]: QueueName.BROWSER,
  [JobType.PROCESS_REFRESH_QUEUES]: QueueName.BROWSER,
  [JobType.BACKUP_STORE]: QueueName.BACKUP,
  [JobType.BACKUP_COOKIES]: QueueName.BACKUP,
  [JobType.EXPIRE_CODES]: QueueName.MAINTENANCE,
  [JobType.CLEANUP_LOGS]: QueueName.MAINTENANCE,
}
