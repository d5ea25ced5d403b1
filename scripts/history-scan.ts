#!/usr/bin/env tsx
/**
 * Pull recent viewing history (episodes, then movies) for the main account.
 * Stops each mode at the first item older than what is already stored.
 *
 * Usage:
 *   npm run scan:history
 */

import "dotenv/config"
import { Command } from "commander"
import { runHistoryScan } from "../src/lib/scans/history-scan.js"
import { printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("history-scan")
  .description("Sync viewing history from the site")
  .action(async () => {
    await runScript("history-scan", async ({ ctx }) => {
      const result = await runHistoryScan(ctx)

      for (const mode of result.modes) {
        printSummary(`History: ${mode.mode}`, {
          "Pages visited": mode.pagesVisited,
          "Items processed": mode.processed,
          "Items added": mode.added,
          "Stopped early": mode.stoppedEarly ? "yes" : "no",
          "PRO account required": mode.proRequired ? "yes" : "no",
        })
      }
      printSummary("Totals", {
        Processed: result.processed,
        Added: result.added,
        "Durations refreshed": result.durations,
      })
    })
  })

await program.parseAsync()
