/**
 * Shows whose detail or duration refresh keeps failing. Duration sweeps skip
 * these so a broken player page is not retried on every run.
 */

import type { Pool } from "pg"
import type { RefreshFailureRecord, RefreshKind } from "./types.js"

export async function recordRefreshFailure(
  pool: Pool,
  showId: number,
  kind: RefreshKind,
  error: string
): Promise<void> {
  await pool.query(
    `INSERT INTO refresh_failures (show_id, kind, error) VALUES ($1, $2, $3)
     ON CONFLICT (show_id, kind) DO UPDATE SET
       error = EXCLUDED.error,
       attempts = refresh_failures.attempts + 1,
       last_failed_at = NOW()`,
    [showId, kind, error]
  )
}

export async function clearRefreshFailure(
  pool: Pool,
  showId: number,
  kind: RefreshKind
): Promise<void> {
  await pool.query("DELETE FROM refresh_failures WHERE show_id = $1 AND kind = $2", [showId, kind])
}

export async function getFailedShowIds(pool: Pool, kind: RefreshKind): Promise<number[]> {
  const result = await pool.query<{ show_id: number }>(
    "SELECT show_id FROM refresh_failures WHERE kind = $1 ORDER BY show_id",
    [kind]
  )
  return result.rows.map((row) => row.show_id)
}

export async function getRefreshFailure(
  pool: Pool,
  showId: number,
  kind: RefreshKind
): Promise<RefreshFailureRecord | null> {
  const result = await pool.query<RefreshFailureRecord>(
    `SELECT show_id, kind, error, attempts, last_failed_at
     FROM refresh_failures WHERE show_id = $1 AND kind = $2`,
    [showId, kind]
  )
  return result.rows[0] ?? null
}
