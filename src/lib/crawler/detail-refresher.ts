/**
 * Staleness-aware detail refresher.
 *
 * Extended detail (year, status, ratings, relations) is fetched when a show has
 * none yet or it is older than the staleness window. Durations come from the
 * player's inline playlist: once for a movie, per season for a series.
 */

import type { Pool } from "pg"
import { isSeriesType } from "../constants.js"
import {
  attachRelations,
  clearRefreshFailure,
  durationKey,
  getDurationTimestamps,
  getOrCreateShow,
  getShow,
  recordRefreshFailure,
  updateShowDetails,
  upsertDuration,
} from "../db/index.js"
import type { RefreshKind, ShowRecord } from "../db/index.js"
import { daysAgo } from "../date-utils.js"
import { getErrorMessage } from "../errors.js"
import { classifyError } from "../fatal-error-classifier.js"
import { createComponentLogger, type Logger } from "../logger.js"
import { sleep as defaultSleep } from "../retry.js"
import type { Session, SessionController } from "../browser/session-controller.js"
import { inspectItemPage, parsePlaylist, parseSeasons, parseShowDetails } from "./extractors.js"
import { parseDocument } from "./html.js"

export type DetailOutcome = "fetched" | "fresh" | "missing" | "failed"

export interface FreshnessResult {
  details: DetailOutcome
  /** Duration rows written */
  durations: number
}

/** A watched unit whose duration should be cached */
export interface WatchedUnit {
  showId: number
  season: number
  episode: number
}

export interface DetailRefresherOptions {
  stalenessDays: number
  /** Pause after every page load */
  fetchDelayMs?: number
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
}

export class DetailRefresher {
  private readonly log: Logger
  private readonly now: () => Date
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly pool: Pool,
    private readonly controller: SessionController,
    private readonly session: Session,
    private readonly options: DetailRefresherOptions
  ) {
    this.log = createComponentLogger("refresher", { sessionKind: session.kind })
    this.now = options.now ?? (() => new Date())
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * True when a timestamp is missing or older than the staleness window.
   */
  isStale(updatedAt: Date | null | undefined): boolean {
    if (!updatedAt) {
      return true
    }
    return updatedAt.getTime() < daysAgo(this.options.stalenessDays, this.now()).getTime()
  }

  needsDetails(show: ShowRecord | null): boolean {
    return !show || show.year === null || this.isStale(show.updated_at)
  }

  /**
   * Bring a show's detail and durations up to date, fetching only what is
   * missing or stale unless `force` is set.
   */
  async ensureFresh(showId: number, options: { force?: boolean } = {}): Promise<FreshnessResult> {
    const force = options.force ?? false
    const existing = await getShow(this.pool, showId)

    let details: DetailOutcome = "fresh"
    if (force || this.needsDetails(existing)) {
      details = await this.refreshDetails(showId)
    }

    const show = await getShow(this.pool, showId)
    if (!show) {
      return { details, durations: 0 }
    }

    let durations = 0
    if (force || (await this.durationsStale(show))) {
      durations = await this.refreshDurations(show)
    }
    return { details, durations }
  }

  /**
   * Load the show page and store what it lists. A show that is not in the
   * store yet is created from the page heading.
   */
  async refreshDetails(showId: number): Promise<DetailOutcome> {
    try {
      const loaded = await this.load(`item/view/${showId}`)
      const details = parseShowDetails(parseDocument(loaded.source))

      if (!(await getShow(this.pool, showId))) {
        const item = inspectItemPage(loaded.title, loaded.source)
        if (item.status !== "valid") {
          this.log.warn({ showId, status: item.status }, "No show at this ID")
          return "missing"
        }
        await getOrCreateShow(this.pool, {
          id: showId,
          title: item.title || `Show ${showId}`,
          originalTitle: null,
          type: details?.type ?? null,
        })
      }

      if (!details) {
        await this.recordFailure(showId, "details", "show page has no info table")
        return "failed"
      }

      await updateShowDetails(this.pool, showId, details)
      await attachRelations(this.pool, showId, {
        countries: details.countries,
        genres: details.genres,
        directors: details.directors,
        actors: details.actors,
      })
      await clearRefreshFailure(this.pool, showId, "details")

      this.log.info({ showId, year: details.year, type: details.type }, "Details updated")
      return "fetched"
    } catch (error) {
      await this.handleError(error, showId, "details")
      return "failed"
    }
  }

  /**
   * Fetch every duration of a show: the single runtime of a movie, or each
   * season the player lists for a series (season 1 when it lists none).
   *
   * @returns duration rows written
   */
  async refreshDurations(show: Pick<ShowRecord, "id" | "type">): Promise<number> {
    if (!isSeriesType(show.type)) {
      return this.refreshMovieDuration(show.id)
    }

    let seasons: number[]
    try {
      const { source } = await this.load(`item/play/${show.id}/s1e1`)
      const listed = parseSeasons(source)
      if (!listed || listed.length === 0) {
        this.log.warn({ showId: show.id }, "Player lists no seasons, defaulting to season 1")
      }
      seasons = listed && listed.length > 0 ? listed : [1]
    } catch (error) {
      await this.handleError(error, show.id, "durations")
      return 0
    }

    this.log.info({ showId: show.id, seasons }, "Fetching season durations")
    let stored = 0
    for (const season of seasons) {
      stored += await this.refreshSeasonDurations(show.id, season)
    }
    return stored
  }

  async refreshMovieDuration(showId: number): Promise<number> {
    try {
      const { source } = await this.load(`item/play/${showId}/s0e1`)
      const duration = parsePlaylist(source)?.[0]?.duration
      if (duration == null) {
        await this.recordFailure(showId, "durations", "player playlist has no duration")
        return 0
      }

      await upsertDuration(this.pool, showId, null, null, duration)
      await clearRefreshFailure(this.pool, showId, "durations")
      this.log.debug({ showId, duration }, "Movie duration stored")
      return 1
    } catch (error) {
      await this.handleError(error, showId, "durations")
      return 0
    }
  }

  async refreshSeasonDurations(showId: number, season: number): Promise<number> {
    try {
      const { source } = await this.load(`item/play/${showId}/s${season}e1`)
      const playlist = parsePlaylist(source)
      if (!playlist) {
        await this.recordFailure(showId, "durations", `no playlist for season ${season}`)
        return 0
      }

      let stored = 0
      for (const entry of playlist) {
        if (entry.season !== season || entry.episode == null || entry.duration == null) {
          continue
        }
        await upsertDuration(this.pool, showId, season, entry.episode, entry.duration)
        stored++
      }

      if (stored === 0) {
        await this.recordFailure(showId, "durations", `season ${season} has no episode durations`)
        return 0
      }

      await clearRefreshFailure(this.pool, showId, "durations")
      this.log.debug({ showId, season, stored }, "Season durations stored")
      return stored
    } catch (error) {
      await this.handleError(error, showId, "durations")
      return 0
    }
  }

  /**
   * Cache durations for freshly watched units. Each stale or missing
   * (show, season) is fetched once; season 0 means a movie.
   *
   * @returns duration rows written
   */
  async refreshWatchedDurations(units: WatchedUnit[]): Promise<number> {
    if (units.length === 0) {
      return 0
    }

    const timestamps = await getDurationTimestamps(
      this.pool,
      units.map((unit) => unit.showId)
    )

    const movies = new Set<number>()
    const seasons = new Map<string, { showId: number; season: number }>()

    for (const unit of units) {
      if (unit.season === 0) {
        if (this.isStale(timestamps.get(durationKey(unit.showId, null, null)))) {
          movies.add(unit.showId)
        }
      } else if (this.isStale(timestamps.get(durationKey(unit.showId, unit.season, unit.episode)))) {
        seasons.set(`${unit.showId}|${unit.season}`, { showId: unit.showId, season: unit.season })
      }
    }

    let stored = 0
    for (const showId of movies) {
      stored += await this.refreshMovieDuration(showId)
    }
    for (const { showId, season } of seasons.values()) {
      stored += await this.refreshSeasonDurations(showId, season)
    }
    return stored
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async durationsStale(show: ShowRecord): Promise<boolean> {
    const timestamps = await getDurationTimestamps(this.pool, [show.id])
    if (timestamps.size === 0) {
      return true
    }
    if (!isSeriesType(show.type)) {
      return this.isStale(timestamps.get(durationKey(show.id, null, null)))
    }
    return [...timestamps.values()].some((updatedAt) => this.isStale(updatedAt))
  }

  private async load(relativePath: string): Promise<{ title: string; source: string }> {
    const source = await this.controller.fetchSource(this.session, this.session.url(relativePath))
    const title = await this.session.requireDriver().pageTitle()
    if (this.options.fetchDelayMs && this.options.fetchDelayMs > 0) {
      await this.sleep(this.options.fetchDelayMs)
    }
    return { title, source }
  }

  private async recordFailure(showId: number, kind: RefreshKind, reason: string): Promise<void> {
    this.log.warn({ showId, kind, reason }, "Refresh failed")
    if (await getShow(this.pool, showId)) {
      await recordRefreshFailure(this.pool, showId, kind, reason)
    }
  }

  /**
   * Session-level and abort errors go to the caller; anything else is
   * recorded against the show.
   */
  private async handleError(error: unknown, showId: number, kind: RefreshKind): Promise<void> {
    if (classifyError(error) !== "retryable") {
      throw error
    }
    await this.recordFailure(showId, kind, getErrorMessage(error))
  }
}
