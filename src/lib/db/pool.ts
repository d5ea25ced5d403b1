/**
 * Database connection pool management.
 * Provides connection pooling with automatic retry on connection errors.
 */

import pg from "pg"
import { logger } from "../logger.js"

const { Pool } = pg

let pool: pg.Pool | null = null

/**
 * Creates a new database pool with connection recovery settings.
 */
function createPool(): pg.Pool {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error("DATABASE_URL environment variable is not set")
  }

  const newPool = new Pool({
    connectionString,
    // Scans are serial; a handful of clients covers the worker plus backups
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  })

  // Pool-level errors (dropped idle clients) must not crash the process
  newPool.on("error", (err: Error) => {
    logger.error({ err: err.message }, "Unexpected database pool error")
  })

  return newPool
}

export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool()
  }
  return pool
}

/**
 * Close the pool. The next getPool() call creates a fresh one.
 */
export async function resetPool(): Promise<void> {
  if (pool) {
    const closing = pool
    pool = null
    try {
      await closing.end()
    } catch (err) {
      logger.error({ err }, "Error closing pool")
    }
  }
}

/**
 * Check if an error is a connection-related error that should be retried.
 */
export function isConnectionError(err: unknown): boolean {
  if (err instanceof Error) {
    const message = err.message.toLowerCase()
    return (
      message.includes("connection terminated") ||
      message.includes("connection refused") ||
      message.includes("connection reset") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("etimedout") ||
      message.includes("socket hang up") ||
      message.includes("network error")
    )
  }
  return false
}

/**
 * Execute a query with automatic retry on connection errors.
 * Retries up to 3 times with exponential backoff (100ms, 200ms, 400ms).
 */
export async function queryWithRetry<T>(
  queryFn: (pool: pg.Pool) => Promise<T>,
  maxRetries: number = 3
): Promise<T> {
  let lastError: Error | null = null

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await queryFn(getPool())
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err))

      if (isConnectionError(err) && attempt < maxRetries - 1) {
        const delay = 100 * Math.pow(2, attempt)
        logger.warn(
          { attempt: attempt + 1, maxRetries, delayMs: delay, err: lastError.message },
          "Database connection error, retrying"
        )
        await new Promise((resolve) => setTimeout(resolve, delay))
        continue
      }

      throw lastError
    }
  }

  throw lastError ?? new Error("Query failed after retries")
}

/**
 * Build "($1, $2), ($3, $4)" style placeholders for multi-row inserts.
 */
export function valuesPlaceholders(rowCount: number, columnCount: number, offset = 0): string {
  const rows: string[] = []
  for (let r = 0; r < rowCount; r++) {
    const cols: string[] = []
    for (let c = 0; c < columnCount; c++) {
      cols.push(`$${offset + r * columnCount + c + 1}`)
    }
    rows.push(`(${cols.join(", ")})`)
  }
  return rows.join(", ")
}

/**
 * Build "$n, $n+1, ..." for an IN list.
 */
export function listPlaceholders(count: number, offset = 0): string {
  return Array.from({ length: count }, (_, i) => `$${offset + i + 1}`).join(", ")
}
