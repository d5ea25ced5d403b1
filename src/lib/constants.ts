/**
 * Site vocabulary: listing categories, type and status labels, month names.
 */

// ============================================================================
// Show types
// ============================================================================

export const SHOW_TYPE_MAPPING = {
  serial: "Series",
  movie: "Movie",
  concert: "Concert",
  documovie: "Documentary Movie",
  docuserial: "Documentary Series",
  tvshow: "TV Show",
  sport: "Sports Program",
  "3d": "3D Movie",
} as const

export type CategoryKey = keyof typeof SHOW_TYPE_MAPPING
export type ShowType = (typeof SHOW_TYPE_MAPPING)[CategoryKey]

export const CATEGORY_KEYS: readonly CategoryKey[] =
  Object.keys(SHOW_TYPE_MAPPING).filter(isCategoryKey)

/** Types whose durations are stored per season and episode */
export const SERIES_TYPES: ReadonlySet<string> = new Set<ShowType>([
  "Series",
  "Documentary Series",
  "TV Show",
])

export function isCategoryKey(value: string): value is CategoryKey {
  return Object.prototype.hasOwnProperty.call(SHOW_TYPE_MAPPING, value)
}

export function isSeriesType(type: string | null | undefined): boolean {
  return type != null && SERIES_TYPES.has(type)
}

/** Catalog listings walked by the full scan, in order */
export const CATALOG_CATEGORIES = [
  "movie",
  "serial",
  "concert",
  "documovie",
  "docuserial",
  "tvshow",
] as const satisfies readonly CategoryKey[]

export type CatalogCategory = (typeof CATALOG_CATEGORIES)[number]

/** Series listings on the new-episodes page */
export const NEW_EPISODE_CATEGORIES = [
  "serial",
  "docuserial",
  "tvshow",
] as const satisfies readonly CategoryKey[]

// ============================================================================
// Statuses
// ============================================================================

export const SHOW_STATUS_MAPPING: Readonly<Record<string, string>> = {
  окончен: "Finished",
  "в эфире": "Ongoing",
}

// ============================================================================
// Dates
// ============================================================================

export const MONTHS_MAP: Readonly<Record<string, number>> = {
  Январь: 1,
  January: 1,
  Февраль: 2,
  February: 2,
  Март: 3,
  March: 3,
  Апрель: 4,
  April: 4,
  Май: 5,
  May: 5,
  Июнь: 6,
  June: 6,
  Июль: 7,
  July: 7,
  Август: 8,
  August: 8,
  Сентябрь: 9,
  September: 9,
  Октябрь: 10,
  October: 10,
  Ноябрь: 11,
  November: 11,
  Декабрь: 12,
  December: 12,
}

// ============================================================================
// Page markers
// ============================================================================

export const PRO_ACCOUNT_REQUIRED_TEXT = "Для доступа к этой странице нужен PRO-аккаунт"
export const LOGIN_PAGE_TITLE = "Авторизация"
