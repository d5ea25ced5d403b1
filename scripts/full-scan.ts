#!/usr/bin/env tsx
/**
 * Walk the catalog listings and record every show. Resumes from the last
 * checkpoint when a previous run stopped within the resume window.
 *
 * Usage:
 *   npm run scan:full                  # All categories
 *   npm run scan:full -- --type serial # One category
 */

import "dotenv/config"
import { Command } from "commander"
import type { CatalogCategory } from "../src/lib/constants.js"
import { runFullScan } from "../src/lib/scans/full-scan.js"
import { parseCatalogCategory, printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("full-scan")
  .description("Scan the full catalog, category by category")
  .option("-t, --type <category>", "Scan only this category", parseCatalogCategory)
  .action(async (options: { type?: CatalogCategory }) => {
    await runScript("full-scan", async ({ ctx }) => {
      const result = await runFullScan(ctx, { type: options.type })

      for (const category of result.categories) {
        printSummary(`Category: ${category.category}`, {
          "Pages visited": category.pagesVisited,
          "Shows processed": category.processed,
          "Shows added": category.added,
          Error: category.error ?? null,
        })
      }
      printSummary("Totals", {
        Processed: result.processed,
        Added: result.added,
        Completed: result.completed ? "yes" : "no",
      })

      const failed = result.categories.filter((category) => category.error)
      if (failed.length > 0) {
        process.exitCode = 1
      }
    })
  })

await program.parseAsync()
