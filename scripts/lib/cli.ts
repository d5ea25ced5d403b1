/**
 * Shared plumbing for the scan scripts: argument parsers and a runner that
 * wires config, database, Redis locks and backups around a script body.
 */

import { InvalidArgumentError } from "commander"
import type { Pool } from "pg"
import { BackupTrigger } from "../../src/lib/backup/trigger.js"
import { createLockedBackupRunner } from "../../src/lib/backup/factory.js"
import { getSyncConfig, type SyncConfig } from "../../src/lib/config.js"
import {
  CATALOG_CATEGORIES,
  isCategoryKey,
  type CatalogCategory,
  type CategoryKey,
} from "../../src/lib/constants.js"
import { getPool, resetPool } from "../../src/lib/db/pool.js"
import { getErrorMessage } from "../../src/lib/errors.js"
import { persistLog } from "../../src/lib/log-persistence.js"
import { createComponentLogger, type Logger } from "../../src/lib/logger.js"
import { closeRedis, initRedis } from "../../src/lib/redis.js"
import { createScanContext, type ScanContext } from "../../src/lib/scans/context.js"
import { ShutdownSignal } from "../../src/lib/shutdown.js"

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10)
  if (isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  return parsed
}

export function parseCatalogCategory(value: string): CatalogCategory {
  const category = CATALOG_CATEGORIES.find((candidate) => candidate === value)
  if (!category) {
    throw new InvalidArgumentError(`Must be one of: ${CATALOG_CATEGORIES.join(", ")}`)
  }
  return category
}

export function parseCategoryKey(value: string): CategoryKey {
  if (!isCategoryKey(value)) {
    throw new InvalidArgumentError(`Unknown category: ${value}`)
  }
  return value
}

export interface ScriptRuntime {
  pool: Pool
  config: SyncConfig
  shutdown: ShutdownSignal
  backup: BackupTrigger
  ctx: ScanContext
  log: Logger
}

/**
 * Run a script body with everything it needs, then wait for backups and
 * close connections. A failure is logged, kept in error_logs and turned into
 * exit code 1; partial progress already written stays.
 */
export async function runScript(
  scriptName: string,
  body: (runtime: ScriptRuntime) => Promise<void>
): Promise<void> {
  const log = createComponentLogger("script", { scriptName })
  const shutdown = new ShutdownSignal()
  const removeSignalHandlers = shutdown.installSignalHandlers()
  let pool: Pool | null = null
  let backup: BackupTrigger | null = null

  try {
    pool = getPool()
    const config = getSyncConfig()
    await initRedis()

    backup = new BackupTrigger(createLockedBackupRunner(config, pool))
    const ctx = createScanContext({ pool, config, backup, shutdown })

    await body({ pool, config, shutdown, backup, ctx, log })

    if (shutdown.requested) {
      log.warn({ reason: shutdown.requestedBecause }, "Stopped early on shutdown request")
    }
  } catch (error) {
    const message = getErrorMessage(error)
    log.fatal({ error: message }, "Script failed")
    console.error(`\n${scriptName} failed: ${message}`)
    if (pool) {
      await persistLog(pool, {
        level: "fatal",
        source: "script",
        message,
        scriptName,
        errorStack: error instanceof Error ? error.stack : undefined,
      })
    }
    process.exitCode = 1
  } finally {
    if (backup) {
      await backup.drain()
    }
    removeSignalHandlers()
    await closeRedis()
    await resetPool()
  }
}

/**
 * Print a result summary line by line, the way every scan script reports.
 */
export function printSummary(title: string, rows: Record<string, number | string | null>): void {
  console.log(`\n${title}`)
  console.log("=".repeat(title.length))
  for (const [label, value] of Object.entries(rows)) {
    console.log(`${label}: ${value ?? "-"}`)
  }
}

/**
 * Read everything piped to the script.
 */
export async function readStdin(stream: AsyncIterable<Buffer | string> = process.stdin): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk)
  }
  return Buffer.concat(chunks).toString("utf-8")
}
