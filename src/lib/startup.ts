/**
 * Database setup: applies the SQL migrations with node-pg-migrate.
 */
import { runner } from "node-pg-migrate"
import { existsSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"
import { ConfigurationError } from "./errors.js"
import { logger } from "./logger.js"

const __dirname = dirname(fileURLToPath(import.meta.url))

export type MigrationDirection = "up" | "down"

/**
 * Find the migrations directory, handling both development and production paths.
 */
export function findMigrationsDir(): string {
  // src/lib/startup.ts -> migrations, dist/src/lib/startup.js -> migrations
  const possiblePaths = [
    join(__dirname, "..", "..", "migrations"),
    join(__dirname, "..", "..", "..", "migrations"),
  ]

  return possiblePaths.find((path) => existsSync(path)) ?? join(__dirname, "..", "..", "migrations")
}

/**
 * Run migrations in one direction. `count` limits how many run; down
 * migrations default to one.
 */
export async function runMigrations(
  direction: MigrationDirection = "up",
  count?: number
): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL
  if (!databaseUrl) {
    throw new ConfigurationError("DATABASE_URL environment variable is not set")
  }

  const dir = findMigrationsDir()
  logger.info({ dir, direction, count }, "Running database migrations")

  const applied = await runner({
    databaseUrl,
    dir,
    direction,
    count: count ?? (direction === "down" ? 1 : Infinity),
    migrationsTable: "pgmigrations",
    log: (msg) => logger.debug(msg),
  })

  if (applied.length === 0) {
    logger.info("No pending migrations")
  } else {
    logger.info({ migrations: applied.map((migration) => migration.name) }, "Migrations complete")
  }
}

/**
 * Bring the schema up to date before the worker takes jobs.
 */
export async function initializeDatabase(): Promise<void> {
  if (!process.env.DATABASE_URL) {
    logger.warn("DATABASE_URL not set - skipping database initialization")
    return
  }

  await runMigrations("up")
}
