#!/usr/bin/env tsx
/**
 * Queue show IDs for the next refresh-queue job.
 *
 * Usage:
 *   npm run queue:refresh -- details 101,102
 *   npm run queue:refresh -- durations --file ids.txt
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"
import { ConfigurationError } from "../src/lib/errors.js"
import { parseIdList, readIdFile } from "../src/lib/scans/scan-by-ids.js"
import {
  REFRESH_QUEUES,
  enqueueRefresh,
  type RefreshQueueKind,
} from "../src/lib/scans/refresh-queues.js"
import { runScript } from "./lib/cli.js"

function parseQueueKind(value: string): RefreshQueueKind {
  if (value !== "details" && value !== "durations") {
    throw new InvalidArgumentError(`Must be one of: ${Object.keys(REFRESH_QUEUES).join(", ")}`)
  }
  return value
}

const program = new Command()
  .name("queue-refresh")
  .description("Add show IDs to a refresh queue")
  .argument("<queue>", "details or durations", parseQueueKind)
  .argument("[ids]", "Comma-separated show IDs")
  .option("-f, --file <name>", "File of show IDs in DATA_DIR")
  .action(async (kind: RefreshQueueKind, idList: string | undefined, options: { file?: string }) => {
    await runScript("queue-refresh", async ({ config }) => {
      if (!idList && !options.file) {
        throw new ConfigurationError("Pass IDs or --file")
      }
      const ids = idList ? parseIdList(idList) : await readIdFile(config.dataDir, options.file ?? "")

      const added = await enqueueRefresh(kind, ids)
      if (added === null) {
        throw new ConfigurationError("Redis is not available; set REDIS_URL")
      }
      console.log(`Queued ${added} new IDs for ${kind} (${ids.length - added} already queued)`)
    })
  })

await program.parseAsync()
