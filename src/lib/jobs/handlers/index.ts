/**
 * Job Handler Registry
 *
 * Central registry of all job handlers.
 * Maps job types to their handler implementations.
 */

import { BACKUP_TARGETS } from "../../backup/types.js"
import type { JobType } from "../types.js"
import type { BaseJobHandler, JobDependencies } from "./base.js"
import { BackupHandler } from "./backup.js"
import { CleanupLogsHandler } from "./cleanup-logs.js"
import { DailySyncHandler } from "./daily-sync.js"
import { ExpireCodesHandler } from "./expire-codes.js"
import { FullScanHandler } from "./full-scan.js"
import { GapScanHandler } from "./gap-scan.js"
import { HistoryScanHandler } from "./history-scan.js"
import { NewEpisodesHandler } from "./new-episodes.js"
import { ProcessRefreshQueuesHandler } from "./process-refresh-queues.js"
import { ScanByIdsHandler } from "./scan-by-ids.js"
import { UpdateDetailsHandler } from "./update-details.js"
import { UpdateDurationsHandler } from "./update-durations.js"

/**
 * Registry of job type to handler instance
 */
const handlerRegistry = new Map<JobType, BaseJobHandler>()

/**
 * Register a job handler
 */
export function registerHandler(handler: BaseJobHandler): void {
  if (handlerRegistry.has(handler.jobType)) {
    throw new Error(`Handler already registered for job type: ${handler.jobType}`)
  }

  handlerRegistry.set(handler.jobType, handler)
}

/**
 * Get handler for a job type
 */
export function getHandler(jobType: JobType): BaseJobHandler | undefined {
  return handlerRegistry.get(jobType)
}

/**
 * Get all registered handlers
 */
export function getAllHandlers(): BaseJobHandler[] {
  return Array.from(handlerRegistry.values())
}

/**
 * Clear all handlers (for testing)
 */
export function clearHandlers(): void {
  handlerRegistry.clear()
}

/**
 * One handler per job type
 */
export function createHandlers(deps: JobDependencies): BaseJobHandler[] {
  return [
    new HistoryScanHandler(deps),
    new FullScanHandler(deps),
    new GapScanHandler(deps),
    new NewEpisodesHandler(deps),
    new DailySyncHandler(deps),
    new UpdateDetailsHandler(deps),
    new UpdateDurationsHandler(deps),
    new ScanByIdsHandler(deps),
    new ProcessRefreshQueuesHandler(deps),
    ...BACKUP_TARGETS.map((target) => new BackupHandler(deps, target)),
    new ExpireCodesHandler(deps),
    new CleanupLogsHandler(deps),
  ]
}

/**
 * Build and register every handler. Called once by the worker at startup.
 */
export function registerHandlers(deps: JobDependencies): void {
  for (const handler of createHandlers(deps)) {
    registerHandler(handler)
  }
}
