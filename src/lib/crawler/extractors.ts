/**
 * Pure extraction functions for every page the engine reads.
 *
 * Each takes a parsed document (or raw source for inline scripts) and returns
 * plain records. Malformed item blocks are reported in `failures` and never
 * abort the rest of the page.
 */

import { z } from "zod"
import {
  LOGIN_PAGE_TITLE,
  PRO_ACCOUNT_REQUIRED_TEXT,
  SHOW_STATUS_MAPPING,
  SHOW_TYPE_MAPPING,
  isCategoryKey,
  type CategoryKey,
  type ShowType,
} from "../constants.js"
import { parseHistoryDate } from "../date-utils.js"
import { getErrorMessage } from "../errors.js"
import {
  extractInt,
  normalizeWhitespace,
  parseDocument,
  precedingSibling,
  textLines,
  textOf,
} from "./html.js"

export type HistoryMode = "episodes" | "movies"

const ITEM_VIEW_PATTERN = /\/item\/view\/(\d+)/
const EPISODE_LINK_PATTERN = /\/item\/view\/(\d+)\/s(\d+)e(\d+)/
const SEASON_EPISODE_PATTERN = /Сезон (\d+)\. Эпизод (\d+)/
const PAGE_PARAM_PATTERN = /page=(\d+)/
const ONCLICK_URL_PATTERN = /['"]([^'"]+)['"]/
const TYPE_LINK_PATTERN = new RegExp(`/(${Object.keys(SHOW_TYPE_MAPPING).join("|")})`)

// ============================================================================
// Listing pages
// ============================================================================

/**
 * Total pages from the pagination control. Listings without one have a single page.
 */
export function parseTotalPages(doc: Document): number {
  const href = doc.querySelector("ul.pagination li.last a")?.getAttribute("href")
  const match = href ? PAGE_PARAM_PATTERN.exec(href) : null
  return match ? parseInt(match[1], 10) : 1
}

export function requiresProAccount(doc: Document): boolean {
  return (doc.body?.textContent ?? "").includes(PRO_ACCOUNT_REQUIRED_TEXT)
}

export interface HistoryItem {
  showId: number
  title: string
  originalTitle: string
  /** YYYY-MM-DD */
  viewDate: string
  season: number
  episode: number
  type: ShowType
}

export interface HistoryPage {
  items: HistoryItem[]
  /** Date of every block whose header parsed, including blocks later skipped */
  blockDates: string[]
  failures: string[]
}

/**
 * Extract watched units from one history page.
 *
 * Episodes mode reads "Сезон S. Эпизод E" from the badge; season 0 entries are
 * skipped and blocks without a badge are movies. Movies mode stores 0/0.
 */
export function parseHistoryPage(doc: Document, mode: HistoryMode): HistoryPage {
  const page: HistoryPage = { items: [], blockDates: [], failures: [] }

  for (const block of Array.from(doc.querySelectorAll(".item-list .col-md-3"))) {
    try {
      const header = precedingSibling(block, "h4")
      if (!header) {
        throw new Error("no date header before item block")
      }
      const viewDate = parseHistoryDate(textOf(header), textOf(header.querySelector("small")))
      if (!viewDate) {
        throw new Error(`unparseable date header "${textOf(header)}"`)
      }
      page.blockDates.push(viewDate)

      const link = block.querySelector(".item-title a")
      const title = textOf(link)
      const idMatch = ITEM_VIEW_PATTERN.exec(link?.getAttribute("href") ?? "")
      if (!idMatch) {
        throw new Error("item link has no show id")
      }

      const originalTitle = textOf(block.querySelector(".item-author a")) || title

      let season = 0
      let episode = 0
      let type: ShowType = mode === "movies" ? "Movie" : "Series"

      if (mode === "episodes") {
        const badge = block.querySelector(".topleft-2x .label-success")
        if (badge) {
          const seMatch = SEASON_EPISODE_PATTERN.exec(textOf(badge))
          if (seMatch) {
            season = parseInt(seMatch[1], 10)
            episode = parseInt(seMatch[2], 10)
            if (season === 0) {
              continue
            }
          }
        } else {
          type = "Movie"
        }
      }

      page.items.push({
        showId: parseInt(idMatch[1], 10),
        title,
        originalTitle,
        viewDate,
        season,
        episode,
        type,
      })
    } catch (error) {
      page.failures.push(getErrorMessage(error))
    }
  }

  return page
}

export interface CatalogEntry {
  id: number
  title: string
  originalTitle: string
  type: ShowType
}

export function parseCatalogPage(
  doc: Document,
  category: CategoryKey
): { entries: CatalogEntry[]; failures: string[] } {
  const entries: CatalogEntry[] = []
  const failures: string[] = []

  for (const block of Array.from(doc.querySelectorAll(".row#items .col-xs-4"))) {
    const href = block.querySelector(".item-poster a")?.getAttribute("href") ?? ""
    const idMatch = ITEM_VIEW_PATTERN.exec(href)
    if (!idMatch) {
      failures.push(`catalog block without item link (${href || "no href"})`)
      continue
    }

    const title = textOf(block.querySelector(".item-title a"))
    entries.push({
      id: parseInt(idMatch[1], 10),
      title,
      originalTitle: textOf(block.querySelector(".item-author a")) || title,
      type: SHOW_TYPE_MAPPING[category],
    })
  }

  return { entries, failures }
}

export interface NewEpisodeEntry {
  showId: number
  title: string
  originalTitle: string
  season: number
  episode: number
  href: string
}

/**
 * Rows of the "new episodes" table. The link comes from the row's onclick
 * handler, or from its first anchor.
 */
export function parseNewEpisodesPage(doc: Document): NewEpisodeEntry[] {
  const entries: NewEpisodeEntry[] = []

  for (const row of Array.from(doc.querySelectorAll("table.table tbody tr"))) {
    let href: string | null = null

    const onclick = row.getAttribute("onclick")
    if (onclick && onclick.includes("document.location")) {
      href = ONCLICK_URL_PATTERN.exec(onclick)?.[1] ?? null
    }
    if (!href) {
      href = row.querySelector("a")?.getAttribute("href") ?? null
    }
    if (!href) {
      continue
    }

    const match = EPISODE_LINK_PATTERN.exec(href)
    if (!match) {
      continue
    }

    const showId = parseInt(match[1], 10)
    const cell = row.querySelector("td:nth-child(2)")
    const bold = cell?.querySelector("b")

    let title = `Show ${showId}`
    let originalTitle = title
    if (cell && bold) {
      title = textOf(bold)
      originalTitle = normalizeWhitespace(textOf(cell).replace(title, "")) || title
    }

    entries.push({
      showId,
      title,
      originalTitle,
      season: parseInt(match[2], 10),
      episode: parseInt(match[3], 10),
      href,
    })
  }

  return entries
}

// ============================================================================
// Show page
// ============================================================================

export interface ExternalRating {
  url: string
  rating: number
  votes: number | null
}

export interface ShowDetails {
  year: number | null
  type: ShowType | null
  status: string | null
  kinopoisk: ExternalRating | null
  imdb: ExternalRating | null
  countries: string[]
  genres: string[]
  directors: string[]
  actors: string[]
}

function findRowValue(table: Element, label: string): Element | null {
  for (const row of Array.from(table.querySelectorAll("tr"))) {
    const cells = Array.from(row.querySelectorAll("td"))
    if (cells.some((cell) => (cell.textContent ?? "").includes(label))) {
      return row.querySelector("td:nth-child(2)")
    }
  }
  return null
}

function followingSmall(element: Element): Element | null {
  let current = element.nextElementSibling
  while (current) {
    if (current.tagName.toUpperCase() === "SMALL") {
      return current
    }
    current = current.nextElementSibling
  }
  return null
}

function readRating(link: Element | null): ExternalRating | null {
  const url = link?.getAttribute("href")
  if (!link || !url) {
    return null
  }
  const text = textOf(link)
  const rating = Number(text)
  if (text === "" || !Number.isFinite(rating)) {
    return null
  }
  const votes = followingSmall(link)
  return { url, rating, votes: votes ? extractInt(textOf(votes)) : null }
}

function linkTexts(cell: Element | null): string[] {
  if (!cell) {
    return []
  }
  return Array.from(cell.querySelectorAll("a"))
    .map((a) => textOf(a))
    .filter((name) => name.length > 0)
}

/**
 * Extended detail from the info table on a show page. Null when the table is missing.
 */
export function parseShowDetails(doc: Document): ShowDetails | null {
  const table = doc.querySelector("table.table-striped")
  if (!table) {
    return null
  }

  const details: ShowDetails = {
    year: null,
    type: null,
    status: null,
    kinopoisk: null,
    imdb: null,
    countries: [],
    genres: [],
    directors: [],
    actors: [],
  }

  const yearCell = findRowValue(table, "Год выхода")
  if (yearCell) {
    details.year = extractInt(textOf(yearCell))
    const typeKey = TYPE_LINK_PATTERN.exec(yearCell.querySelector("a")?.getAttribute("href") ?? "")
    if (typeKey && isCategoryKey(typeKey[1])) {
      details.type = SHOW_TYPE_MAPPING[typeKey[1]]
    }
  }

  const statusCell = findRowValue(table, "Статус")
  if (statusCell) {
    const raw = textOf(statusCell)
    details.status = SHOW_STATUS_MAPPING[raw] ?? raw
  }

  const ratingCell = findRowValue(table, "Рейтинг")
  if (ratingCell) {
    const kinopoisk = readRating(ratingCell.querySelector("a[href*='kinopoisk.ru']"))
    if (kinopoisk && kinopoisk.url.includes("/film/") && !kinopoisk.url.endsWith("/film/")) {
      details.kinopoisk = kinopoisk
    }
    details.imdb = readRating(ratingCell.querySelector("a[href*='imdb.com']"))
  }

  details.countries = linkTexts(findRowValue(table, "Страна"))
  details.genres = linkTexts(findRowValue(table, "Жанр"))
  details.directors = [
    ...linkTexts(findRowValue(table, "Создатель")),
    ...linkTexts(findRowValue(table, "Режиссёр")),
  ]
  details.actors = linkTexts(findRowValue(table, "В ролях"))

  return details
}

export type ItemPageStatus =
  | { status: "not-found" }
  | { status: "valid"; title: string }
  | { status: "invalid" }

/**
 * Decide whether an item page shows a real title. Used when probing IDs that
 * never appeared in a listing.
 */
export function inspectItemPage(pageTitle: string, source: string): ItemPageStatus {
  if (pageTitle.includes("Not Found") || pageTitle.includes("404")) {
    return { status: "not-found" }
  }

  const h3 = parseDocument(source).querySelector("h3")
  if (h3) {
    const heading = textLines(h3)[0] ?? ""
    return heading && heading !== LOGIN_PAGE_TITLE
      ? { status: "valid", title: heading }
      : { status: "invalid" }
  }

  return source.includes("window.PLAYER_ITEM_ID")
    ? { status: "valid", title: "" }
    : { status: "invalid" }
}

// ============================================================================
// Player scripts
// ============================================================================

const PLAYLIST_PATTERN = /window\.PLAYER_PLAYLIST\s*=\s*(\[[\s\S]*?\]);/
const SEASONS_PATTERN = /window\.PLAYER_SEASONS\s*=\s*(\[[\s\S]*?\]);/

const playlistEntrySchema = z.object({
  season: z.number().int().nullish(),
  episode: z.number().int().nullish(),
  duration: z.number().nonnegative().nullish(),
})

const seasonEntrySchema = z.object({
  season: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]),
})

export type PlaylistEntry = z.infer<typeof playlistEntrySchema>

function readInlineArray(source: string, pattern: RegExp): unknown[] | null {
  const match = pattern.exec(source)
  if (!match) {
    return null
  }
  try {
    const parsed: unknown = JSON.parse(match[1])
    return Array.isArray(parsed) ? parsed : null
  } catch {
    return null
  }
}

/**
 * Entries of the player's inline playlist. Null when the script is absent or
 * not valid JSON; entries that do not fit the expected shape are dropped.
 */
export function parsePlaylist(source: string): PlaylistEntry[] | null {
  const raw = readInlineArray(source, PLAYLIST_PATTERN)
  if (!raw) {
    return null
  }
  const entries: PlaylistEntry[] = []
  for (const item of raw) {
    const result = playlistEntrySchema.safeParse(item)
    if (result.success) {
      entries.push(result.data)
    }
  }
  return entries
}

/**
 * Season numbers listed by the player, ascending. Null when the script is absent.
 */
export function parseSeasons(source: string): number[] | null {
  const raw = readInlineArray(source, SEASONS_PATTERN)
  if (!raw) {
    return null
  }
  const seasons = new Set<number>()
  for (const item of raw) {
    const result = seasonEntrySchema.safeParse(item)
    if (result.success) {
      seasons.add(result.data.season)
    }
  }
  return [...seasons].sort((a, b) => a - b)
}
