/**
 * Database types and interfaces.
 * Row shapes as returned by the queries in this directory.
 */

export interface ShowRecord {
  id: number
  title: string
  original_title: string | null
  type: string | null
  /** Null until extended detail has been fetched */
  year: number | null
  status: string | null
  kinopoisk_url: string | null
  kinopoisk_rating: number | null
  kinopoisk_votes: number | null
  imdb_url: string | null
  imdb_rating: number | null
  imdb_votes: number | null
  created_at: Date
  updated_at: Date
}

export interface NewShow {
  id: number
  title: string
  originalTitle: string | null
  type: string | null
}

export interface ViewHistoryInput {
  showId: number
  /** YYYY-MM-DD */
  viewDate: string
  season: number
  episode: number
}

export interface ViewHistoryRecord {
  id: number
  show_id: number
  view_date: string
  season_number: number
  episode_number: number
}

export interface ShowDurationRecord {
  show_id: number
  season_number: number | null
  episode_number: number | null
  duration_seconds: number
  updated_at: Date
}

export interface CodeRecord {
  id: number
  code: string
  received_at: Date
}

export type CheckpointKind = "progress" | "complete"

export interface CheckpointRecord {
  id: number
  scan_type: string
  category: string
  page: number
  kind: CheckpointKind
  created_at: Date
}

export type RefreshKind = "details" | "durations"

export interface RefreshFailureRecord {
  show_id: number
  kind: RefreshKind
  error: string | null
  attempts: number
  last_failed_at: Date
}
