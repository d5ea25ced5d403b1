/**
 * Scan progress: page checkpoints for resumable listing scans and
 * per-scan watermarks for ID-range scans.
 */

import type { Pool } from "pg"
import type { CheckpointKind, CheckpointRecord } from "./types.js"

export async function recordCheckpoint(
  pool: Pool,
  scanType: string,
  category: string,
  page: number,
  kind: CheckpointKind = "progress"
): Promise<void> {
  await pool.query(
    "INSERT INTO scan_checkpoints (scan_type, category, page, kind) VALUES ($1, $2, $3, $4)",
    [scanType, category, page, kind]
  )
}

/**
 * Most recent checkpoint of a scan type created at or after `since`.
 */
export async function getLatestCheckpoint(
  pool: Pool,
  scanType: string,
  since: Date
): Promise<CheckpointRecord | null> {
  const result = await pool.query<CheckpointRecord>(
    `SELECT id, scan_type, category, page, kind, created_at
     FROM scan_checkpoints
     WHERE scan_type = $1 AND created_at >= $2
     ORDER BY created_at DESC, id DESC
     LIMIT 1`,
    [scanType, since]
  )
  return result.rows[0] ?? null
}

export async function deleteCheckpointsBefore(pool: Pool, cutoff: Date): Promise<number> {
  const result = await pool.query<{ id: number }>(
    "DELETE FROM scan_checkpoints WHERE created_at < $1 RETURNING id",
    [cutoff]
  )
  return result.rows.length
}

export async function getWatermark(pool: Pool, scanType: string): Promise<number | null> {
  const result = await pool.query<{ value: number }>(
    "SELECT value FROM scan_watermarks WHERE scan_type = $1",
    [scanType]
  )
  return result.rows[0]?.value ?? null
}

export async function setWatermark(pool: Pool, scanType: string, value: number): Promise<void> {
  await pool.query(
    `INSERT INTO scan_watermarks (scan_type, value) VALUES ($1, $2)
     ON CONFLICT (scan_type) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
    [scanType, value]
  )
}
