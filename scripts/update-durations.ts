#!/usr/bin/env tsx
/**
 * Fetch episode and movie durations from the player playlists.
 *
 * Usage:
 *   npm run update:durations                  # Up to 100 shows
 *   npm run update:durations -- --limit 20
 *   npm run update:durations -- --type serial # Every serial lacking durations
 */

import "dotenv/config"
import { Command } from "commander"
import type { CategoryKey } from "../src/lib/constants.js"
import { runUpdateDurations } from "../src/lib/scans/update-durations.js"
import { parseCategoryKey, parsePositiveInt, printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("update-durations")
  .description("Fill in durations for shows without them")
  .option("-l, --limit <number>", "Maximum number of shows", parsePositiveInt, 100)
  .option("-t, --type <category>", "Only shows of this type", parseCategoryKey)
  .action(async (options: { limit: number; type?: CategoryKey }) => {
    await runScript("update-durations", async ({ ctx }) => {
      const result = await runUpdateDurations(ctx, options.limit, { type: options.type })

      printSummary("Update durations", {
        Candidates: result.candidates,
        "Shows updated": result.processed,
        "Durations written": result.added,
        Failed: result.failed.length,
      })
      if (result.failed.length > 0) {
        console.log(`Failed IDs: ${result.failed.join(", ")}`)
      }
    })
  })

await program.parseAsync()
