#!/usr/bin/env tsx
/**
 * New episodes, a catalog pass, then detail and durations for whatever the
 * catalog pass added.
 *
 * Usage:
 *   npm run sync:daily
 */

import "dotenv/config"
import { Command } from "commander"
import { runDailySync } from "../src/lib/scans/daily-sync.js"
import { printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("daily-sync")
  .description("Run the daily catalog sync")
  .action(async () => {
    await runScript("daily-sync", async ({ ctx }) => {
      const result = await runDailySync(ctx)

      printSummary("Daily sync", {
        "New episodes processed": result.newEpisodes.processed,
        "Catalog shows added": result.fullScan.added,
        "Details updated": result.details?.processed ?? null,
        "Durations updated": result.durations?.processed ?? null,
        "Total processed": result.processed,
        "Total added": result.added,
      })
    })
  })

await program.parseAsync()
