/**
 * PGlite test helper.
 *
 * Runs the real migration against an in-memory PostgreSQL so repository
 * queries are checked by an actual SQL engine without a database server.
 */

import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { PGlite } from "@electric-sql/pglite"
import type { Pool } from "pg"

const MIGRATION_PATH = fileURLToPath(
  new URL("../../migrations/1700000000000_catalog-schema.sql", import.meta.url)
)

const TABLES = [
  "job_runs",
  "error_logs",
  "sync_runs",
  "refresh_failures",
  "scan_watermarks",
  "scan_checkpoints",
  "codes",
  "show_actors",
  "show_directors",
  "show_genres",
  "show_countries",
  "persons",
  "genres",
  "countries",
  "show_durations",
  "view_history",
  "shows",
]

let db: PGlite | null = null

function upMigration(): string {
  const sql = readFileSync(MIGRATION_PATH, "utf8")
  const [up] = sql.split("-- Down Migration")
  return up ?? sql
}

/**
 * Get or create the shared PGlite instance
 */
export async function getTestDb(): Promise<PGlite> {
  if (!db) {
    db = new PGlite()
    await db.exec(upMigration())
  }
  return db
}

export async function closeTestDb(): Promise<void> {
  if (db) {
    await db.close()
    db = null
  }
}

/**
 * Truncate every table and restart identity sequences.
 */
export async function resetTestDb(): Promise<void> {
  const testDb = await getTestDb()
  await testDb.exec(`TRUNCATE ${TABLES.join(", ")} RESTART IDENTITY CASCADE`)
}

/**
 * Expose PGlite through the slice of the pg Pool API the repositories use.
 */
export function asPool(testDb: PGlite): Pool {
  const adapter = {
    query: async (text: string, values?: unknown[]) => {
      const result = await testDb.query<Record<string, unknown>>(text, values)
      return { rows: result.rows, rowCount: result.affectedRows ?? result.rows.length }
    },
  }
  return adapter as unknown as Pool
}

/**
 * Shared pool for a test file: fresh schema, empty tables.
 */
export async function getTestPool(): Promise<Pool> {
  const testDb = await getTestDb()
  await resetTestDb()
  return asPool(testDb)
}
