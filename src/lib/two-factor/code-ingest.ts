/**
 * Code ingestion: pull a one-time code out of a message body and store it.
 */

import type { Pool } from "pg"

import type { BackupScheduler } from "../backup/types.js"
import { deleteCodesReceivedBefore, insertCode } from "../db/codes.js"
import type { CodeRecord } from "../db/types.js"
import { ConfigurationError } from "../errors.js"
import { createComponentLogger } from "../logger.js"

const log = createComponentLogger("codes")

/**
 * First match of `pattern` in `body`, or null.
 */
export function extractCode(body: string, pattern: string): string | null {
  let regex: RegExp
  try {
    regex = new RegExp(pattern)
  } catch (error) {
    throw new ConfigurationError(`Invalid code pattern ${pattern}: ${String(error)}`)
  }
  const match = regex.exec(body)
  return match ? match[0] : null
}

export async function recordCode(
  pool: Pool,
  code: string,
  receivedAt: Date = new Date(),
  backup?: BackupScheduler
): Promise<CodeRecord> {
  const record = await insertCode(pool, code, receivedAt)
  log.info({ codeId: record.id, receivedAt: record.received_at }, "Stored login code")
  backup?.scheduleBackup("store")
  return record
}

/**
 * Remove codes older than their lifetime, consumed or not.
 *
 * @returns number of codes removed
 */
export async function expireCodes(
  pool: Pool,
  lifetimeMinutes: number,
  now: Date = new Date()
): Promise<number> {
  const cutoff = new Date(now.getTime() - lifetimeMinutes * 60 * 1000)
  const removed = await deleteCodesReceivedBefore(pool, cutoff)
  if (removed > 0) {
    log.info({ removed, cutoff }, "Expired login codes")
  } else {
    log.debug("No expired login codes")
  }
  return removed
}
