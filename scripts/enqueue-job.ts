#!/usr/bin/env tsx
/**
 * Queue a one-off job for the worker.
 *
 * Usage:
 *   npm run jobs:enqueue -- history-scan
 *   npm run jobs:enqueue -- full-scan --payload '{"type":"serial"}'
 *   npm run jobs:enqueue -- scan-by-ids --payload '{"ids":[101,102]}' --priority 1
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"
import { resetPool } from "../src/lib/db/pool.js"
import { getErrorMessage } from "../src/lib/errors.js"
import { queueManager } from "../src/lib/jobs/queue-manager.js"
import { closeRedisJobsClient } from "../src/lib/jobs/redis.js"
import { JobPriority, JobType, isJobType, jobPayloadSchemas } from "../src/lib/jobs/types.js"
import { logger } from "../src/lib/logger.js"
import { parsePositiveInt } from "./lib/cli.js"

function parseJobType(value: string): JobType {
  if (!isJobType(value)) {
    throw new InvalidArgumentError(`Must be one of: ${Object.values(JobType).join(", ")}`)
  }
  return value
}

function parsePayload(value: string): unknown {
  try {
    return JSON.parse(value)
  } catch {
    throw new InvalidArgumentError("Payload must be JSON")
  }
}

const program = new Command()
  .name("enqueue-job")
  .description("Add a job to its queue")
  .argument("<job-type>", "Job type", parseJobType)
  .option("-p, --payload <json>", "Job payload", parsePayload, {})
  .option("--priority <number>", "Priority, lower runs first", parsePositiveInt)
  .action(async (jobType: JobType, options: { payload: unknown; priority?: number }) => {
    try {
      const payload = jobPayloadSchemas[jobType].parse(options.payload)

      await queueManager.initialize()
      const jobId = await queueManager.addJob(jobType, payload, {
        priority: options.priority ?? JobPriority.HIGH,
        createdBy: "enqueue-job",
      })
      console.log(`Queued ${jobType} as job ${jobId}`)
    } catch (error) {
      logger.fatal({ error: getErrorMessage(error) }, "Enqueue failed")
      process.exitCode = 1
    } finally {
      await queueManager.shutdown()
      await closeRedisJobsClient()
      await resetPool()
    }
  })

await program.parseAsync()
