#!/usr/bin/env tsx
/**
 * Apply or roll back schema migrations.
 *
 * Usage:
 *   npm run migrate:up
 *   npm run migrate:down                # Roll back the latest migration
 *   npm run migrate:down -- --count 2
 */

import "dotenv/config"
import { Command } from "commander"
import { getErrorMessage } from "../src/lib/errors.js"
import { logger } from "../src/lib/logger.js"
import { runMigrations } from "../src/lib/startup.js"
import { parsePositiveInt } from "./lib/cli.js"

async function migrate(direction: "up" | "down", count?: number): Promise<void> {
  try {
    await runMigrations(direction, count)
  } catch (error) {
    logger.fatal({ error: getErrorMessage(error) }, "Migration failed")
    process.exitCode = 1
  }
}

const program = new Command().name("migrate").description("Run database migrations")

program
  .command("up")
  .description("Apply pending migrations")
  .option("-c, --count <number>", "Apply at most this many", parsePositiveInt)
  .action(async (options: { count?: number }) => {
    await migrate("up", options.count)
  })

program
  .command("down")
  .description("Roll back migrations")
  .option("-c, --count <number>", "Roll back this many", parsePositiveInt)
  .action(async (options: { count?: number }) => {
    await migrate("down", options.count)
  })

await program.parseAsync()
