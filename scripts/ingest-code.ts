#!/usr/bin/env tsx
/**
 * Store a one-time login code from a message piped on stdin. The mail
 * transport (procmail, an IMAP poller, a webhook) stays outside this script.
 *
 * Usage:
 *   cat message.eml | npm run codes:ingest
 */

import "dotenv/config"
import { Command } from "commander"
import { extractCode, recordCode } from "../src/lib/two-factor/code-ingest.js"
import { readStdin, runScript } from "./lib/cli.js"

const program = new Command()
  .name("ingest-code")
  .description("Record a login code from a message body on stdin")
  .action(async () => {
    await runScript("ingest-code", async ({ pool, config, backup, log }) => {
      const body = await readStdin()
      const code = extractCode(body, config.codePattern)
      if (!code) {
        throw new Error("No code found in message")
      }

      const record = await recordCode(pool, code, new Date(), backup)
      log.info({ codeId: record.id }, "Code ingested")
      console.log(`Code stored (id ${record.id})`)
    })
  })

await program.parseAsync()
