/**
 * Last write time across the tables a store snapshot covers.
 */

import type { Pool } from "pg"

export async function getLatestStoreChange(pool: Pool): Promise<Date | null> {
  const result = await pool.query<{ latest: Date | null }>(
    `SELECT GREATEST(
       (SELECT MAX(updated_at) FROM shows),
       (SELECT MAX(created_at) FROM view_history),
       (SELECT MAX(updated_at) FROM show_durations),
       (SELECT MAX(created_at) FROM codes)
     ) AS latest`
  )
  return result.rows[0]?.latest ?? null
}
