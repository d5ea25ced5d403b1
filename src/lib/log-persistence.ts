/**
 * Log persistence module for storing error logs to the database.
 * Only ERROR and FATAL level logs are persisted.
 */

import type { Pool } from "pg"
import { logger, type LogSource } from "./logger.js"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace"

/**
 * Log entry structure for database persistence
 */
export interface LogEntry {
  level: LogLevel
  source: LogSource
  message: string
  details?: Record<string, unknown>
  scriptName?: string
  jobName?: string
  runId?: number
  errorStack?: string
}

const PERSIST_LEVELS = new Set<LogLevel>(["fatal", "error"])

const LOG_SOURCES: readonly LogSource[] = [
  "script",
  "job",
  "worker",
  "session",
  "crawler",
  "backup",
  "other",
]

const INSERT_SQL = `INSERT INTO error_logs (
  level, source, message, details, script_name, job_name, run_id, error_stack
) VALUES ($1, $2, $3, $4::text::jsonb, $5, $6, $7, $8)`

function insertParams(entry: LogEntry): unknown[] {
  return [
    entry.level,
    entry.source,
    entry.message,
    entry.details ? JSON.stringify(entry.details) : null,
    entry.scriptName ?? null,
    entry.jobName ?? null,
    entry.runId ?? null,
    entry.errorStack ?? null,
  ]
}

/**
 * Persist a log entry. Never throws: a failed insert is reported through the
 * process logger instead.
 */
export async function persistLog(pool: Pool, entry: LogEntry): Promise<void> {
  if (!PERSIST_LEVELS.has(entry.level)) {
    return
  }

  try {
    await pool.query(INSERT_SQL, insertParams(entry))
  } catch (dbError) {
    logger.warn({ err: dbError, original: entry.message }, "Failed to persist log entry")
  }
}

/**
 * Persist a log entry, throwing if the insert fails.
 */
export async function persistLogRequired(pool: Pool, entry: LogEntry): Promise<void> {
  if (!PERSIST_LEVELS.has(entry.level)) {
    return
  }

  await pool.query(INSERT_SQL, insertParams(entry))
}

/**
 * Delete persisted logs created before the cutoff.
 */
export async function deleteLogsBefore(pool: Pool, cutoff: Date): Promise<number> {
  const result = await pool.query<{ id: number }>(
    "DELETE FROM error_logs WHERE created_at < $1 RETURNING id",
    [cutoff]
  )
  return result.rows.length
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined
}

function isLogSource(value: unknown): value is LogSource {
  return typeof value === "string" && LOG_SOURCES.some((source) => source === value)
}

const STANDARD_FIELDS = new Set([
  "level",
  "time",
  "pid",
  "hostname",
  "msg",
  "service",
  "env",
  "source",
  "scriptName",
  "jobName",
  "runId",
  "err",
  "error",
])

/**
 * Convert a pino log object into a database entry.
 */
export function extractLogEntry(
  pinoLog: Record<string, unknown>,
  message: string
): Partial<LogEntry> {
  const entry: Partial<LogEntry> = {
    message,
    source: isLogSource(pinoLog.source) ? pinoLog.source : "other",
  }

  const scriptName = asString(pinoLog.scriptName)
  if (scriptName) entry.scriptName = scriptName
  const jobName = asString(pinoLog.jobName)
  if (jobName) entry.jobName = jobName

  // runId may arrive as a number or a numeric string
  if (pinoLog.runId !== undefined) {
    const numericRunId =
      typeof pinoLog.runId === "number" ? pinoLog.runId : parseInt(String(pinoLog.runId), 10)
    if (!isNaN(numericRunId)) {
      entry.runId = numericRunId
    }
  }

  const err = pinoLog.err ?? pinoLog.error
  if (err instanceof Error && err.stack) {
    entry.errorStack = err.stack
  } else if (err && typeof err === "object" && "stack" in err) {
    const stack = asString(err.stack)
    if (stack) entry.errorStack = stack
  }

  const details: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(pinoLog)) {
    if (!STANDARD_FIELDS.has(key)) {
      details[key] = value
    }
  }

  if (Object.keys(details).length > 0) {
    entry.details = details
  }

  return entry
}
