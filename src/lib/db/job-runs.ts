/**
 * job_runs: a PostgreSQL mirror of BullMQ job state, kept for auditing after
 * Redis has dropped the job.
 */

import type { Pool } from "pg"

export interface JobRunRow {
  job_id: string
  job_type: string
  queue_name: string
  status: string
  priority: number | null
  payload: unknown
  result: unknown
  error_message: string | null
  attempts: number
  max_attempts: number
  created_by: string | null
  started_at: Date | null
  completed_at: Date | null
  duration_ms: number | null
}

export interface NewJobRun {
  jobId: string
  jobType: string
  queueName: string
  priority: number
  payload: unknown
  maxAttempts: number
  createdBy?: string
}

/**
 * Record a queued job. A finished run under the same ID is reset, so fixed
 * job IDs can be reused once the previous job is done.
 */
export async function insertJobRun(pool: Pool, run: NewJobRun): Promise<void> {
  await pool.query(
    `INSERT INTO job_runs (
       job_id, job_type, queue_name, status, priority, payload, max_attempts, created_by
     )
     VALUES ($1, $2, $3, 'pending', $4, $5::text::jsonb, $6, $7)
     ON CONFLICT (job_id) DO UPDATE SET
       status = 'pending',
       priority = EXCLUDED.priority,
       payload = EXCLUDED.payload,
       max_attempts = EXCLUDED.max_attempts,
       created_by = EXCLUDED.created_by,
       result = NULL,
       error_message = NULL,
       attempts = 0,
       queued_at = NOW(),
       started_at = NULL,
       completed_at = NULL,
       duration_ms = NULL
     WHERE job_runs.completed_at IS NOT NULL`,
    [
      run.jobId,
      run.jobType,
      run.queueName,
      run.priority,
      toJsonText(run.payload),
      run.maxAttempts,
      run.createdBy ?? "unknown",
    ]
  )
}

/**
 * Mark a run active, creating the row for jobs that never went through
 * insertJobRun (scheduler iterations).
 */
export async function startJobRun(
  pool: Pool,
  run: Omit<NewJobRun, "createdBy">,
  startedAt: Date = new Date()
): Promise<void> {
  await pool.query(
    `INSERT INTO job_runs (
       job_id, job_type, queue_name, status, priority, payload, max_attempts, created_by, started_at
     )
     VALUES ($1, $2, $3, 'active', $4, $5::text::jsonb, $6, 'scheduler', $7)
     ON CONFLICT (job_id) DO UPDATE SET status = 'active', started_at = EXCLUDED.started_at
     WHERE job_runs.completed_at IS NULL`,
    [
      run.jobId,
      run.jobType,
      run.queueName,
      run.priority,
      toJsonText(run.payload),
      run.maxAttempts,
      startedAt,
    ]
  )
}

export async function completeJobRun(
  pool: Pool,
  jobId: string,
  result: unknown,
  completedAt: Date = new Date()
): Promise<number | null> {
  const updated = await pool.query<{ duration_ms: number | null }>(
    `UPDATE job_runs
     SET status = 'completed',
         completed_at = $2,
         result = $3::text::jsonb,
         attempts = attempts + 1,
         duration_ms = CASE
           WHEN started_at IS NOT NULL
             THEN EXTRACT(EPOCH FROM ($2::timestamptz - started_at)) * 1000
           ELSE NULL
         END
     WHERE job_id = $1
       AND completed_at IS NULL
     RETURNING duration_ms`,
    [jobId, completedAt, toJsonText(result)]
  )
  return updated.rows[0]?.duration_ms ?? null
}

export interface FailedJobRun {
  attempts: number
  maxAttempts: number
  /** No attempts left; the run is closed */
  final: boolean
}

/**
 * Count a failed attempt. The run is only closed once its attempts are used up.
 */
export async function failJobRun(
  pool: Pool,
  jobId: string,
  reason: string,
  completedAt: Date = new Date()
): Promise<FailedJobRun | null> {
  const updated = await pool.query<{ attempts: number; max_attempts: number }>(
    `UPDATE job_runs
     SET status = 'failed',
         error_message = $3,
         attempts = attempts + 1,
         completed_at = CASE WHEN attempts + 1 >= max_attempts THEN $2 ELSE NULL END,
         duration_ms = CASE
           WHEN attempts + 1 >= max_attempts AND started_at IS NOT NULL
             THEN EXTRACT(EPOCH FROM ($2::timestamptz - started_at)) * 1000
           ELSE NULL
         END
     WHERE job_id = $1
       AND completed_at IS NULL
     RETURNING attempts, max_attempts`,
    [jobId, completedAt, reason]
  )

  const row = updated.rows[0]
  if (!row) {
    return null
  }
  return {
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    final: row.attempts >= row.max_attempts,
  }
}

export async function setJobRunStatus(pool: Pool, jobId: string, status: string): Promise<void> {
  await pool.query(
    "UPDATE job_runs SET status = $2 WHERE job_id = $1 AND completed_at IS NULL",
    [jobId, status]
  )
}

export async function getJobRun(pool: Pool, jobId: string): Promise<JobRunRow | null> {
  const result = await pool.query<JobRunRow>(
    `SELECT job_id, job_type, queue_name, status, priority, payload, result, error_message,
            attempts, max_attempts, created_by, started_at, completed_at, duration_ms
     FROM job_runs WHERE job_id = $1`,
    [jobId]
  )
  return result.rows[0] ?? null
}

/**
 * JSON text for a jsonb column. Values that already arrive as JSON text
 * (BullMQ return values) pass through unchanged.
 */
function toJsonText(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null
  }
  if (typeof value === "string") {
    try {
      JSON.parse(value)
      return value
    } catch {
      return JSON.stringify(value)
    }
  }
  return JSON.stringify(value)
}
