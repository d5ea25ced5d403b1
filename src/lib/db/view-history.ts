/**
 * View history database functions.
 *
 * Rows are keyed by (show, date, season, episode); re-reading a page inserts
 * nothing new. Season 0 / episode 0 marks a movie watch.
 */

import type { Pool } from "pg"
import type { HistoryMode } from "../crawler/extractors.js"
import { valuesPlaceholders } from "./pool.js"
import type { ViewHistoryInput, ViewHistoryRecord } from "./types.js"

const INSERT_BATCH_SIZE = 500

/**
 * Insert view records, ignoring ones already stored.
 *
 * @returns number of rows created
 */
export async function insertViewHistory(pool: Pool, views: ViewHistoryInput[]): Promise<number> {
  const unique = new Map<string, ViewHistoryInput>()
  for (const view of views) {
    unique.set(`${view.showId}|${view.viewDate}|${view.season}|${view.episode}`, view)
  }

  const rows = [...unique.values()]
  let created = 0

  for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
    const batch = rows.slice(i, i + INSERT_BATCH_SIZE)
    const params = batch.flatMap((view) => [view.showId, view.viewDate, view.season, view.episode])
    const result = await pool.query<{ id: number }>(
      `INSERT INTO view_history (show_id, view_date, season_number, episode_number)
       VALUES ${valuesPlaceholders(batch.length, 4)}
       ON CONFLICT (show_id, view_date, season_number, episode_number) DO NOTHING
       RETURNING id`,
      params
    )
    created += result.rows.length
  }

  return created
}

/**
 * Newest stored watch date for a history mode: episodes are season > 0,
 * movies are season 0.
 */
export async function getLatestViewDate(pool: Pool, mode: HistoryMode): Promise<string | null> {
  const condition = mode === "episodes" ? "season_number > 0" : "season_number = 0"
  const result = await pool.query<{ max_date: string | null }>(
    `SELECT to_char(MAX(view_date), 'YYYY-MM-DD') AS max_date FROM view_history WHERE ${condition}`
  )
  return result.rows[0]?.max_date ?? null
}

export async function getViewHistoryForShow(
  pool: Pool,
  showId: number
): Promise<ViewHistoryRecord[]> {
  const result = await pool.query<ViewHistoryRecord>(
    `SELECT id, show_id, to_char(view_date, 'YYYY-MM-DD') AS view_date, season_number, episode_number
     FROM view_history
     WHERE show_id = $1
     ORDER BY view_date DESC, season_number, episode_number`,
    [showId]
  )
  return result.rows
}
