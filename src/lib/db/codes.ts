/**
 * One-time login codes delivered out of band (mail forwarder, CLI).
 */

import type { Pool } from "pg"
import { listPlaceholders } from "./pool.js"
import type { CodeRecord } from "./types.js"

export async function insertCode(
  pool: Pool,
  code: string,
  receivedAt: Date = new Date()
): Promise<CodeRecord> {
  const result = await pool.query<CodeRecord>(
    `INSERT INTO codes (code, received_at) VALUES ($1, $2)
     RETURNING id, code, received_at`,
    [code, receivedAt]
  )
  const row = result.rows[0]
  if (!row) {
    throw new Error("Code insert returned no row")
  }
  return row
}

/**
 * Newest code received at or after `since` that has not been tried yet.
 */
export async function findNewestUnusedCode(
  pool: Pool,
  since: Date,
  excludeIds: Iterable<number> = []
): Promise<CodeRecord | null> {
  const excluded = [...excludeIds]
  const params: (Date | number)[] = [since, ...excluded]
  const exclusion =
    excluded.length > 0 ? `AND id NOT IN (${listPlaceholders(excluded.length, 1)})` : ""

  const result = await pool.query<CodeRecord>(
    `SELECT id, code, received_at FROM codes
     WHERE received_at >= $1 ${exclusion}
     ORDER BY received_at DESC, id DESC
     LIMIT 1`,
    params
  )
  return result.rows[0] ?? null
}

/**
 * Delete codes received before the cutoff.
 *
 * @returns number of codes deleted
 */
export async function deleteCodesReceivedBefore(pool: Pool, cutoff: Date): Promise<number> {
  const result = await pool.query<{ id: number }>(
    "DELETE FROM codes WHERE received_at < $1 RETURNING id",
    [cutoff]
  )
  return result.rows.length
}
