#!/usr/bin/env tsx
/**
 * Probe show IDs between the gap watermark and the highest stored ID, and
 * record the ones the catalog listings missed.
 *
 * Usage:
 *   npm run scan:gaps
 */

import "dotenv/config"
import { Command } from "commander"
import { runGapScan } from "../src/lib/scans/gap-scan.js"
import { printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("gap-scan")
  .description("Find shows missing from the catalog listings by ID")
  .action(async () => {
    await runScript("gap-scan", async ({ ctx }) => {
      const result = await runGapScan(ctx)

      printSummary("Gap scan", {
        Range: result.range ? `${result.range.start}-${result.range.end}` : null,
        "Missing IDs": result.missing,
        Probed: result.processed,
        Found: result.found.length,
        Added: result.added,
        "Watermark advanced": result.advanced ? "yes" : "no",
      })
    })
  })

await program.parseAsync()
