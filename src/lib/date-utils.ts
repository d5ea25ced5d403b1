/**
 * Calendar-date helpers. Dates travel as "YYYY-MM-DD" strings so comparisons
 * are plain string comparisons and no timezone shifts creep in.
 */

import { MONTHS_MAP } from "./constants.js"

const HEADER_PATTERN = /^(\d{1,2})\s+([А-Яа-яЁёA-Za-z]+)/

/**
 * Build an ISO calendar date from its parts. Returns null for impossible dates.
 */
export function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`
}

/**
 * Parse a history date header such as "10 Май" with its year shown separately.
 */
export function parseHistoryDate(headerText: string, yearText: string): string | null {
  const match = HEADER_PATTERN.exec(headerText.trim())
  if (!match) {
    return null
  }

  const month = MONTHS_MAP[match[2]]
  const year = parseInt(yearText.trim(), 10)
  if (month === undefined || isNaN(year)) {
    return null
  }

  return toIsoDate(year, month, parseInt(match[1], 10))
}

/**
 * Subtract whole days from a timestamp.
 */
export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000)
}
