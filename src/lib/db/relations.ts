/**
 * Many-to-many show metadata: countries, genres, directors and actors.
 */

import type { Pool } from "pg"
import { listPlaceholders, valuesPlaceholders } from "./pool.js"

type LookupTable = "countries" | "genres" | "persons"

interface LinkTable {
  table: "show_countries" | "show_genres" | "show_directors" | "show_actors"
  column: "country_id" | "genre_id" | "person_id"
  lookup: LookupTable
}

const LINKS = {
  countries: { table: "show_countries", column: "country_id", lookup: "countries" },
  genres: { table: "show_genres", column: "genre_id", lookup: "genres" },
  directors: { table: "show_directors", column: "person_id", lookup: "persons" },
  actors: { table: "show_actors", column: "person_id", lookup: "persons" },
} as const satisfies Record<string, LinkTable>

export type RelationKind = keyof typeof LINKS

export const RELATION_KINDS: readonly RelationKind[] = ["countries", "genres", "directors", "actors"]

export type ShowRelations = Record<RelationKind, string[]>

/**
 * Resolve names to IDs in a lookup table, creating missing entries.
 */
async function ensureNames(
  pool: Pool,
  lookup: LookupTable,
  names: string[]
): Promise<Map<string, number>> {
  const ids = new Map<string, number>()
  const unique = [...new Set(names.map((name) => name.trim()).filter((name) => name.length > 0))]
  if (unique.length === 0) {
    return ids
  }

  await pool.query(
    `INSERT INTO ${lookup} (name) VALUES ${valuesPlaceholders(unique.length, 1)}
     ON CONFLICT (name) DO NOTHING`,
    unique
  )

  const result = await pool.query<{ id: number; name: string }>(
    `SELECT id, name FROM ${lookup} WHERE name IN (${listPlaceholders(unique.length)})`,
    unique
  )
  for (const row of result.rows) {
    ids.set(row.name, row.id)
  }
  return ids
}

/**
 * Link a show to the named entities. Existing links stay; nothing is removed.
 *
 * @returns number of new links per relation
 */
export async function attachRelations(
  pool: Pool,
  showId: number,
  relations: Partial<ShowRelations>
): Promise<Record<RelationKind, number>> {
  const added: Record<RelationKind, number> = { countries: 0, genres: 0, directors: 0, actors: 0 }

  for (const kind of RELATION_KINDS) {
    const names = relations[kind]
    if (!names || names.length === 0) continue

    const link = LINKS[kind]
    const ids = [...new Set((await ensureNames(pool, link.lookup, names)).values())]
    if (ids.length === 0) continue

    const params = ids.flatMap((id) => [showId, id])
    const result = await pool.query<{ show_id: number }>(
      `INSERT INTO ${link.table} (show_id, ${link.column})
       VALUES ${valuesPlaceholders(ids.length, 2)}
       ON CONFLICT DO NOTHING
       RETURNING show_id`,
      params
    )
    added[kind] = result.rows.length
  }

  return added
}

/**
 * Names linked to a show, alphabetically per relation.
 */
export async function getShowRelations(pool: Pool, showId: number): Promise<ShowRelations> {
  const relations: ShowRelations = { countries: [], genres: [], directors: [], actors: [] }

  for (const kind of RELATION_KINDS) {
    const link = LINKS[kind]
    const result = await pool.query<{ name: string }>(
      `SELECT l.name FROM ${link.table} t
       JOIN ${link.lookup} l ON l.id = t.${link.column}
       WHERE t.show_id = $1
       ORDER BY l.name`,
      [showId]
    )
    relations[kind] = result.rows.map((row) => row.name)
  }

  return relations
}
