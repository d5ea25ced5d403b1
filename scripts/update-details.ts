#!/usr/bin/env tsx
/**
 * Fetch detail pages for shows that have none yet.
 *
 * Usage:
 *   npm run update:details               # Up to 100 shows
 *   npm run update:details -- --limit 20
 */

import "dotenv/config"
import { Command } from "commander"
import { runUpdateDetails } from "../src/lib/scans/update-details.js"
import { parsePositiveInt, printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("update-details")
  .description("Fill in detail for shows without it")
  .option("-l, --limit <number>", "Maximum number of shows", parsePositiveInt, 100)
  .action(async (options: { limit: number }) => {
    await runScript("update-details", async ({ ctx }) => {
      const result = await runUpdateDetails(ctx, options.limit)

      printSummary("Update details", {
        Candidates: result.candidates,
        Updated: result.processed,
        Failed: result.failed.length,
      })
      if (result.failed.length > 0) {
        console.log(`Failed IDs: ${result.failed.join(", ")}`)
      }
    })
  })

await program.parseAsync()
