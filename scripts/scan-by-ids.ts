#!/usr/bin/env tsx
/**
 * Refresh detail and durations for specific shows.
 *
 * Usage:
 *   npm run scan:ids -- --ids 101,102,103
 *   npm run scan:ids -- --file ids.txt    # One ID per line, under DATA_DIR
 */

import "dotenv/config"
import { Command } from "commander"
import { ConfigurationError } from "../src/lib/errors.js"
import { parseIdList, readIdFile, runScanByIds } from "../src/lib/scans/scan-by-ids.js"
import { printSummary, runScript } from "./lib/cli.js"

const program = new Command()
  .name("scan-by-ids")
  .description("Refresh the given shows")
  .option("-i, --ids <list>", "Comma-separated show IDs")
  .option("-f, --file <name>", "File of show IDs in DATA_DIR")
  .action(async (options: { ids?: string; file?: string }) => {
    await runScript("scan-by-ids", async ({ ctx, config }) => {
      if (!options.ids && !options.file) {
        throw new ConfigurationError("Pass --ids or --file")
      }

      const ids = options.ids
        ? parseIdList(options.ids)
        : await readIdFile(config.dataDir, options.file ?? "")
      const result = await runScanByIds(ctx, ids)

      printSummary("Scan by IDs", {
        Requested: result.requested,
        Updated: result.processed,
        "Not on site": result.missing.length,
        "Durations written": result.durations,
      })
      if (result.missing.length > 0) {
        console.log(`Missing IDs: ${result.missing.join(", ")}`)
      }
    })
  })

await program.parseAsync()
