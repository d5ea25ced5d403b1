/**
 * Checkpoint & resume ledger.
 *
 * Listing scans record "category, page N processed" after every page and
 * resume at N+1 when they start again within the resume window. A completion
 * marker closes a pass, so the next run starts from the beginning.
 *
 * ID-range scans keep a single watermark instead, moved only after a run
 * attempted every ID in its range.
 */

import type { Pool } from "pg"
import {
  getExistingIdsInRange,
  getLatestCheckpoint,
  getMaxShowId,
  getWatermark,
  recordCheckpoint,
  setWatermark,
} from "../db/index.js"
import { createComponentLogger } from "../logger.js"

const log = createComponentLogger("ledger")

const COMPLETE_CATEGORY = "*"

export interface ResumePoint {
  category: string
  /** First page still to process */
  page: number
}

export interface CheckpointLedgerOptions {
  windowHours: number
  now?: () => Date
}

export class CheckpointLedger {
  private readonly now: () => Date

  constructor(
    private readonly pool: Pool,
    readonly scanType: string,
    private readonly options: CheckpointLedgerOptions
  ) {
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Where an interrupted pass left off. Null when there is no checkpoint in
   * the window or the last pass completed.
   */
  async findResumePoint(): Promise<ResumePoint | null> {
    const since = new Date(this.now().getTime() - this.options.windowHours * 60 * 60 * 1000)
    const latest = await getLatestCheckpoint(this.pool, this.scanType, since)

    if (!latest || latest.kind === "complete") {
      return null
    }

    log.info(
      { scanType: this.scanType, category: latest.category, page: latest.page },
      "Resuming from checkpoint"
    )
    return { category: latest.category, page: latest.page + 1 }
  }

  async recordProgress(category: string, page: number): Promise<void> {
    await recordCheckpoint(this.pool, this.scanType, category, page)
  }

  /**
   * Close a category. The next one is recorded at page 0 so a crash between
   * categories resumes at its first page instead of re-walking this one.
   */
  async finishCategory(category: string, next: string | null): Promise<void> {
    if (next === null) {
      await this.markComplete()
      return
    }
    log.debug({ scanType: this.scanType, category, next }, "Category finished")
    await recordCheckpoint(this.pool, this.scanType, next, 0)
  }

  async markComplete(): Promise<void> {
    await recordCheckpoint(this.pool, this.scanType, COMPLETE_CATEGORY, 0, "complete")
  }
}

// ============================================================================
// ID-range watermark
// ============================================================================

export interface GapRange {
  start: number
  end: number
  missing: number[]
}

/**
 * IDs in [start, end] that have no show row, ascending.
 */
export async function computeMissingIds(pool: Pool, start: number, end: number): Promise<number[]> {
  if (end < start) {
    return []
  }
  const existing = new Set(await getExistingIdsInRange(pool, start, end))
  const missing: number[] = []
  for (let id = start; id <= end; id++) {
    if (!existing.has(id)) {
      missing.push(id)
    }
  }
  return missing
}

export class GapWatermark {
  constructor(
    private readonly pool: Pool,
    readonly scanType: string = "gap"
  ) {}

  /**
   * Range from the watermark (inclusive) to the highest known ID. Null when
   * the store is empty or the watermark already reaches the top.
   */
  async pendingRange(): Promise<GapRange | null> {
    const end = await getMaxShowId(this.pool)
    if (end === null) {
      return null
    }

    const start = (await getWatermark(this.pool, this.scanType)) ?? 1
    if (start >= end) {
      return null
    }

    return { start, end, missing: await computeMissingIds(this.pool, start, end) }
  }

  async advance(to: number): Promise<void> {
    await setWatermark(this.pool, this.scanType, to)
    log.info({ scanType: this.scanType, watermark: to }, "Watermark advanced")
  }

  async current(): Promise<number | null> {
    return getWatermark(this.pool, this.scanType)
  }
}
