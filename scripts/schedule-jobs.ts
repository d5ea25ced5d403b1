#!/usr/bin/env tsx
/**
 * Register the recurring jobs (history scan, daily sync, quarterly full
 * scan, code expiry, refresh queues, log cleanup). Safe to run on every deploy.
 *
 * Usage:
 *   npm run jobs:schedule
 */

import "dotenv/config"
import { Command } from "commander"
import { resetPool } from "../src/lib/db/pool.js"
import { getErrorMessage } from "../src/lib/errors.js"
import { queueManager } from "../src/lib/jobs/queue-manager.js"
import { closeRedisJobsClient } from "../src/lib/jobs/redis.js"
import { scheduleRecurringJobs } from "../src/lib/jobs/schedule.js"
import { logger } from "../src/lib/logger.js"

const program = new Command()
  .name("schedule-jobs")
  .description("Register recurring jobs with BullMQ")
  .action(async () => {
    try {
      await queueManager.initialize()
      const scheduled = await scheduleRecurringJobs((queueName) => queueManager.getQueue(queueName))
      console.log(`Scheduled ${scheduled.length} recurring jobs: ${scheduled.join(", ")}`)
    } catch (error) {
      logger.fatal({ error: getErrorMessage(error) }, "Scheduling failed")
      process.exitCode = 1
    } finally {
      await queueManager.shutdown()
      await closeRedisJobsClient()
      await resetPool()
    }
  })

await program.parseAsync()
