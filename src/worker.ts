#!/usr/bin/env tsx
/**
 * Job Worker Process
 *
 * Long-lived process that runs BullMQ workers for the scan, backup and
 * maintenance queues.
 *
 * Usage:
 *   npx tsx src/worker.ts
 *   WORKER_QUEUES=browser,backup node dist/src/worker.js
 */

import "dotenv/config"
import { BackupTrigger } from "./lib/backup/trigger.js"
import { createLockedBackupRunner } from "./lib/backup/factory.js"
import { QueueBackupRunner } from "./lib/backup/queue-runner.js"
import { getSyncConfig } from "./lib/config.js"
import { getPool, resetPool } from "./lib/db/pool.js"
import { getErrorMessage } from "./lib/errors.js"
import { registerHandlers } from "./lib/jobs/handlers/index.js"
import { queueManager } from "./lib/jobs/queue-manager.js"
import { closeRedisJobsClient } from "./lib/jobs/redis.js"
import { JobWorker, parseQueueNames } from "./lib/jobs/worker.js"
import { persistLog } from "./lib/log-persistence.js"
import { logger } from "./lib/logger.js"
import { closeRedis, initRedis, redisLockProvider } from "./lib/redis.js"
import { ShutdownSignal } from "./lib/shutdown.js"
import { initializeDatabase } from "./lib/startup.js"

const worker = new JobWorker()
const shutdownSignal = new ShutdownSignal()
let isShuttingDown = false

async function main(): Promise<void> {
  logger.info("Starting job worker process...")

  const queueNames = parseQueueNames(process.env.WORKER_QUEUES)
  logger.info({ queues: queueNames }, "Worker will process queues")

  const config = getSyncConfig()
  const pool = getPool()

  await initializeDatabase()
  await initRedis()
  await queueManager.initialize()

  registerHandlers({
    pool,
    config,
    locks: redisLockProvider,
    backup: new BackupTrigger(new QueueBackupRunner(queueManager)),
    backupRunner: createLockedBackupRunner(config, pool),
    shutdown: shutdownSignal,
  })

  await worker.start(queueNames)

  logger.info("Job worker process started successfully")
}

// Graceful shutdown: scans see the signal at their next page boundary,
// then the workers finish their current jobs
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info({ signal }, "Shutdown already in progress, ignoring signal")
    return
  }
  isShuttingDown = true
  shutdownSignal.request(signal)
  logger.info({ signal }, "Received shutdown signal, stopping workers...")

  try {
    await worker.shutdown()
    await queueManager.shutdown()
    await closeRedisJobsClient()
    await closeRedis()
    await resetPool()
    logger.info("Workers shut down successfully")
    process.exit(0)
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, "Error during shutdown")
    process.exit(1)
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"))
process.on("SIGINT", () => void shutdown("SIGINT"))

main().catch(async (error: unknown) => {
  logger.fatal({ error: getErrorMessage(error) }, "Failed to start worker process")
  if (process.env.DATABASE_URL) {
    await persistLog(getPool(), {
      level: "fatal",
      source: "worker",
      message: getErrorMessage(error),
      errorStack: error instanceof Error ? error.stack : undefined,
    })
  }
  process.exit(1)
})
