/**
 * Sync run tracking.
 *
 * Every scan records one row per execution: when it started, how it ended,
 * how many items it looked at and how many it added.
 */

import type { Pool } from "pg"
import { getErrorMessage } from "./errors.js"

export type SyncRunStatus = "running" | "success" | "failure"

export interface SyncRun {
  id: number
  operation: string
  status: SyncRunStatus
  items_processed: number | null
  items_added: number | null
  error_message: string | null
  started_at: Date
  completed_at: Date | null
  duration_ms: number | null
}

export interface SyncCounts {
  processed: number
  added: number
}

/**
 * Start tracking a run.
 *
 * @param operation - scan name, e.g. "history" or "gap-scan"
 * @returns Run ID for completeSyncRun
 */
export async function startSyncRun(pool: Pool, operation: string): Promise<number> {
  const result = await pool.query<{ id: number }>(
    `
    INSERT INTO sync_runs (operation, status)
    VALUES ($1, 'running')
    RETURNING id
    `,
    [operation]
  )

  const row = result.rows[0]
  if (!row) {
    throw new Error(`Could not start sync run for ${operation}`)
  }
  return row.id
}

export async function completeSyncRun(
  pool: Pool,
  runId: number,
  status: "success" | "failure",
  counts: Partial<SyncCounts> = {},
  errorMessage?: string
): Promise<void> {
  await pool.query(
    `
    UPDATE sync_runs
    SET
      completed_at = NOW(),
      status = $2,
      items_processed = $3,
      items_added = $4,
      error_message = $5,
      duration_ms = (EXTRACT(EPOCH FROM (NOW() - started_at)) * 1000)::int
    WHERE id = $1
    `,
    [runId, status, counts.processed ?? null, counts.added ?? null, errorMessage ?? null]
  )
}

/**
 * Run `fn` inside a tracked sync run. The run is marked failed and the error
 * rethrown when `fn` throws.
 */
export async function trackSyncRun<T extends Partial<SyncCounts>>(
  pool: Pool,
  operation: string,
  fn: (runId: number) => Promise<T>
): Promise<T> {
  const runId = await startSyncRun(pool, operation)
  try {
    const result = await fn(runId)
    await completeSyncRun(pool, runId, "success", result)
    return result
  } catch (error) {
    await completeSyncRun(pool, runId, "failure", {}, getErrorMessage(error))
    throw error
  }
}

/**
 * Run history, most recent first.
 */
export async function getSyncRuns(
  pool: Pool,
  operation?: string,
  limit: number = 100
): Promise<SyncRun[]> {
  const params: (string | number)[] = []
  let whereClause = ""

  if (operation) {
    params.push(operation)
    whereClause = "WHERE operation = $1"
  }

  params.push(limit)

  const result = await pool.query<SyncRun>(
    `
    SELECT id, operation, status, items_processed, items_added, error_message,
      started_at, completed_at, duration_ms
    FROM sync_runs
    ${whereClause}
    ORDER BY started_at DESC, id DESC
    LIMIT $${params.length}
    `,
    params
  )

  return result.rows
}

/**
 * Completion time of the latest successful run of an operation.
 */
export async function getLastSuccessfulRun(pool: Pool, operation: string): Promise<Date | null> {
  const result = await pool.query<{ completed_at: Date | null }>(
    `
    SELECT MAX(completed_at) AS completed_at
    FROM sync_runs
    WHERE operation = $1 AND status = 'success'
    `,
    [operation]
  )
  return result.rows[0]?.completed_at ?? null
}
