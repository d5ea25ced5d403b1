#!/usr/bin/env tsx
/**
 * Read the new-episodes listings and fetch detail and durations for shows
 * the store does not cover yet.
 *
 * Usage:
 *   npm run scan:new-episodes
 */

import "dotenv/config"
import { Command } from "commander"
import { runNewEpisodesScan } from "../src/lib/scans/new-episodes.js"
import { printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("new-episodes")
  .description("Sync recently released episodes")
  .action(async () => {
    await runScript("new-episodes", async ({ ctx }) => {
      const result = await runNewEpisodesScan(ctx)

      for (const category of result.categories) {
        printSummary(`Category: ${category.category}`, {
          "Rows processed": category.processed,
          "Caught up": category.caughtUp ? "yes" : "no",
        })
      }
      printSummary("Totals", { Processed: result.processed, Added: result.added })
    })
  })

await program.parseAsync()
