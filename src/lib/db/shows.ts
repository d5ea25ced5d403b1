/**
 * Shows database functions.
 *
 * A show row can exist with only a title and type (discovered from a listing)
 * long before its extended detail is fetched. `year` marks "has detail".
 */

import type { Pool } from "pg"
import type { ShowDetails } from "../crawler/extractors.js"
import { listPlaceholders, valuesPlaceholders } from "./pool.js"
import type { NewShow, RefreshKind, ShowRecord } from "./types.js"

const SHOW_COLUMNS = `id, title, original_title, type, year, status,
  kinopoisk_url, kinopoisk_rating, kinopoisk_votes,
  imdb_url, imdb_rating, imdb_votes, created_at, updated_at`

// Keeps multi-row statements well under the protocol's parameter limit
const INSERT_BATCH_SIZE = 500

// ============================================================================
// Reads
// ============================================================================

export async function getShow(pool: Pool, id: number): Promise<ShowRecord | null> {
  const result = await pool.query<ShowRecord>(`SELECT ${SHOW_COLUMNS} FROM shows WHERE id = $1`, [
    id,
  ])
  return result.rows[0] ?? null
}

export async function getMaxShowId(pool: Pool): Promise<number | null> {
  const result = await pool.query<{ max_id: number | null }>(
    "SELECT MAX(id)::int AS max_id FROM shows"
  )
  return result.rows[0]?.max_id ?? null
}

/**
 * IDs present in [start, end], ascending.
 */
export async function getExistingIdsInRange(
  pool: Pool,
  start: number,
  end: number
): Promise<number[]> {
  const result = await pool.query<{ id: number }>(
    "SELECT id FROM shows WHERE id BETWEEN $1 AND $2 ORDER BY id",
    [start, end]
  )
  return result.rows.map((row) => row.id)
}

/**
 * Shows that have never had extended detail fetched, oldest IDs first.
 */
export async function getShowsMissingDetails(pool: Pool, limit: number): Promise<ShowRecord[]> {
  const result = await pool.query<ShowRecord>(
    `SELECT ${SHOW_COLUMNS} FROM shows WHERE year IS NULL ORDER BY id LIMIT $1`,
    [limit]
  )
  return result.rows
}

/**
 * Shows with no cached duration at all, in random order.
 *
 * @param types - restrict to these show types
 * @param limit - omit to return every match
 */
export async function getShowsWithoutDurations(
  pool: Pool,
  options: { types?: string[]; limit?: number; excludeIds?: number[] } = {}
): Promise<ShowRecord[]> {
  const conditions = [
    "NOT EXISTS (SELECT 1 FROM show_durations d WHERE d.show_id = shows.id)",
  ]
  const params: (string | number)[] = []

  if (options.types && options.types.length > 0) {
    conditions.push(`type IN (${listPlaceholders(options.types.length, params.length)})`)
    params.push(...options.types)
  }

  if (options.excludeIds && options.excludeIds.length > 0) {
    conditions.push(`id NOT IN (${listPlaceholders(options.excludeIds.length, params.length)})`)
    params.push(...options.excludeIds)
  }

  let limitClause = ""
  if (options.limit !== undefined) {
    params.push(options.limit)
    limitClause = `LIMIT $${params.length}`
  }

  const result = await pool.query<ShowRecord>(
    `SELECT ${SHOW_COLUMNS} FROM shows
     WHERE ${conditions.join(" AND ")}
     ORDER BY RANDOM()
     ${limitClause}`,
    params
  )
  return result.rows
}

/**
 * Shows with a recorded refresh failure of `kind`, lowest IDs first.
 */
export async function getShowsWithRefreshFailure(
  pool: Pool,
  kind: RefreshKind,
  options: { types?: string[]; limit?: number } = {}
): Promise<ShowRecord[]> {
  const params: (string | number)[] = [kind]
  let typeClause = ""
  if (options.types && options.types.length > 0) {
    typeClause = `AND type IN (${listPlaceholders(options.types.length, params.length)})`
    params.push(...options.types)
  }

  let limitClause = ""
  if (options.limit !== undefined) {
    params.push(options.limit)
    limitClause = `LIMIT $${params.length}`
  }

  const result = await pool.query<ShowRecord>(
    `SELECT ${SHOW_COLUMNS} FROM shows
     WHERE EXISTS (SELECT 1 FROM refresh_failures f WHERE f.show_id = shows.id AND f.kind = $1)
     ${typeClause}
     ORDER BY id
     ${limitClause}`,
    params
  )
  return result.rows
}

// ============================================================================
// Writes
// ============================================================================

/**
 * Insert shows that do not exist yet. Existing rows are never touched.
 *
 * @returns IDs of the rows actually created
 */
export async function insertShowsIfAbsent(pool: Pool, shows: NewShow[]): Promise<number[]> {
  const unique = new Map<number, NewShow>()
  for (const show of shows) {
    if (!unique.has(show.id)) {
      unique.set(show.id, show)
    }
  }

  const created: number[] = []
  const rows = [...unique.values()]

  for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
    const batch = rows.slice(i, i + INSERT_BATCH_SIZE)
    const params = batch.flatMap((show) => [show.id, show.title, show.originalTitle, show.type])
    const result = await pool.query<{ id: number }>(
      `INSERT INTO shows (id, title, original_title, type)
       VALUES ${valuesPlaceholders(batch.length, 4)}
       ON CONFLICT (id) DO NOTHING
       RETURNING id`,
      params
    )
    created.push(...result.rows.map((row) => row.id))
  }

  return created
}

/**
 * Return the show, creating it from listing data when absent.
 */
export async function getOrCreateShow(
  pool: Pool,
  show: NewShow
): Promise<{ show: ShowRecord; created: boolean }> {
  const created = await insertShowsIfAbsent(pool, [show])
  const record = await getShow(pool, show.id)
  if (!record) {
    throw new Error(`Show ${show.id} vanished right after insert`)
  }
  return { show: record, created: created.length > 0 }
}

export async function setShowType(pool: Pool, id: number, type: string): Promise<void> {
  await pool.query("UPDATE shows SET type = $2, updated_at = NOW() WHERE id = $1", [id, type])
}

/**
 * Store fetched detail. Fields the page did not provide keep their old values.
 */
export async function updateShowDetails(
  pool: Pool,
  id: number,
  details: ShowDetails
): Promise<void> {
  await pool.query(
    `UPDATE shows SET
       year = COALESCE($2, year),
       type = COALESCE($3, type),
       status = COALESCE($4, status),
       kinopoisk_url = COALESCE($5, kinopoisk_url),
       kinopoisk_rating = COALESCE($6, kinopoisk_rating),
       kinopoisk_votes = COALESCE($7, kinopoisk_votes),
       imdb_url = COALESCE($8, imdb_url),
       imdb_rating = COALESCE($9, imdb_rating),
       imdb_votes = COALESCE($10, imdb_votes),
       updated_at = NOW()
     WHERE id = $1`,
    [
      id,
      details.year,
      details.type,
      details.status,
      details.kinopoisk?.url ?? null,
      details.kinopoisk?.rating ?? null,
      details.kinopoisk?.votes ?? null,
      details.imdb?.url ?? null,
      details.imdb?.rating ?? null,
      details.imdb?.votes ?? null,
    ]
  )
}
