/**
 * Cached runtimes. Movies use (show, NULL, NULL); series use one row per
 * (show, season, episode).
 */

import type { Pool } from "pg"
import { listPlaceholders } from "./pool.js"

export function durationKey(
  showId: number,
  season: number | null,
  episode: number | null
): string {
  return `${showId}|${season ?? "-"}|${episode ?? "-"}`
}

export async function upsertDuration(
  pool: Pool,
  showId: number,
  season: number | null,
  episode: number | null,
  seconds: number
): Promise<void> {
  await pool.query(
    `INSERT INTO show_durations (show_id, season_number, episode_number, duration_seconds)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (show_id, COALESCE(season_number, -1), COALESCE(episode_number, -1))
     DO UPDATE SET duration_seconds = EXCLUDED.duration_seconds, updated_at = NOW()`,
    [showId, season, episode, Math.round(seconds)]
  )
}

/**
 * Last update time of every cached duration for the given shows, keyed by durationKey().
 */
export async function getDurationTimestamps(
  pool: Pool,
  showIds: number[]
): Promise<Map<string, Date>> {
  const timestamps = new Map<string, Date>()
  const unique = [...new Set(showIds)]
  if (unique.length === 0) {
    return timestamps
  }

  const result = await pool.query<{
    show_id: number
    season_number: number | null
    episode_number: number | null
    updated_at: Date
  }>(
    `SELECT show_id, season_number, episode_number, updated_at
     FROM show_durations
     WHERE show_id IN (${listPlaceholders(unique.length)})`,
    unique
  )

  for (const row of result.rows) {
    timestamps.set(durationKey(row.show_id, row.season_number, row.episode_number), row.updated_at)
  }
  return timestamps
}

export async function hasDuration(
  pool: Pool,
  showId: number,
  season: number | null,
  episode: number | null
): Promise<boolean> {
  const result = await pool.query(
    `SELECT 1 FROM show_durations
     WHERE show_id = $1
       AND season_number IS NOT DISTINCT FROM $2::int
       AND episode_number IS NOT DISTINCT FROM $3::int`,
    [showId, season, episode]
  )
  return result.rows.length > 0
}

export async function countDurations(pool: Pool, showId: number): Promise<number> {
  const result = await pool.query<{ count: number }>(
    "SELECT COUNT(*)::int AS count FROM show_durations WHERE show_id = $1",
    [showId]
  )
  return result.rows[0]?.count ?? 0
}
