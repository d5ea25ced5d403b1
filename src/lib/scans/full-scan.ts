/**
 * Full catalog scan.
 *
 * Walks every catalog category page by page and inserts shows it has not seen.
 * Progress is checkpointed after each page; a run started within the resume
 * window continues where the previous one stopped.
 */

import {
  CATALOG_CATEGORIES,
  SHOW_TYPE_MAPPING,
  type CatalogCategory,
} from "../constants.js"
import { CheckpointLedger } from "../crawler/checkpoint-ledger.js"
import { parseCatalogPage } from "../crawler/extractors.js"
import { insertShowsIfAbsent } from "../db/index.js"
import { getErrorMessage } from "../errors.js"
import { classifyError } from "../fatal-error-classifier.js"
import { createComponentLogger } from "../logger.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createCrawler,
  withSession,
  withStoreBackup,
  type ScanContext,
  type ScanResult,
} from "./context.js"

const log = createComponentLogger("full-scan")

const CATALOG_PAGE_SIZE = 50

export interface FullScanOptions {
  /** Scan only this category */
  type?: CatalogCategory
}

export interface CategoryResult {
  category: CatalogCategory
  added: number
  processed: number
  pagesVisited: number
  /** Set when the category ended with an error */
  error?: string
}

export interface FullScanResult extends ScanResult {
  categories: CategoryResult[]
  /** Every category ran to its last page */
  completed: boolean
}

export function catalogPagePath(category: CatalogCategory, page: number): string {
  return `${category}?page=${page}&per-page=${CATALOG_PAGE_SIZE}`
}

export async function runFullScan(
  ctx: ScanContext,
  options: FullScanOptions = {}
): Promise<FullScanResult> {
  const categories: readonly CatalogCategory[] = options.type
    ? [options.type]
    : CATALOG_CATEGORIES
  const scanType = options.type ? `full:${options.type}` : "full"
  const ledger = new CheckpointLedger(ctx.pool, scanType, {
    windowHours: ctx.config.fullScanResumeWindowHours,
  })

  const result = await withStoreBackup(ctx, (changes) =>
    trackSyncRun(ctx.pool, scanType, async () => {
      const resume = await ledger.findResumePoint()
      const startIndex = resume ? categories.findIndex((c) => c === resume.category) : 0
      if (resume && startIndex < 0) {
        log.warn({ resume }, "Checkpoint names an unknown category, starting over")
      }
      const firstIndex = Math.max(0, startIndex)

      return withSession(ctx, "main", async (session) => {
        const crawler = createCrawler(ctx, session)
        const totals: FullScanResult = { processed: 0, added: 0, categories: [], completed: false }

        for (let index = firstIndex; index < categories.length; index++) {
          const category = categories[index]
          const next = categories[index + 1] ?? null
          const startPage =
            resume && startIndex === index ? Math.max(1, resume.page) : 1

          const categoryResult: CategoryResult = {
            category,
            added: 0,
            processed: 0,
            pagesVisited: 0,
          }
          totals.categories.push(categoryResult)

          let interrupted = false
          try {
            const crawl = await crawler.crawl({
              label: `catalog:${category}`,
              pageUrl: (page) => session.url(catalogPagePath(category, page)),
              startPage,
              delayMs: ctx.config.fullScanPageDelayMs,
              processPage: async (doc, page) => {
                const { entries, failures } = parseCatalogPage(doc, category)
                for (const failure of failures) {
                  log.warn({ category, page, failure }, "Catalog block skipped")
                }
                const created = await insertShowsIfAbsent(
                  ctx.pool,
                  entries.map((entry) => ({
                    id: entry.id,
                    title: entry.title,
                    originalTitle: entry.originalTitle,
                    type: entry.type,
                  }))
                )
                changes.record(created.length)
                return { added: created.length, processed: entries.length }
              },
              onPageDone: (page) => ledger.recordProgress(category, page),
            })

            categoryResult.added = crawl.itemsAdded
            categoryResult.processed = crawl.itemsProcessed
            categoryResult.pagesVisited = crawl.pagesVisited
            interrupted = crawl.interrupted
            log.info(
              { category, type: SHOW_TYPE_MAPPING[category], added: crawl.itemsAdded },
              "Category scanned"
            )
          } catch (error) {
            if (classifyError(error) !== "retryable") {
              throw error
            }
            categoryResult.error = getErrorMessage(error)
            log.error({ category, error: categoryResult.error }, "Category failed, moving on")
          }

          totals.added += categoryResult.added
          totals.processed += categoryResult.processed

          if (interrupted) {
            return totals
          }
          await ledger.finishCategory(category, next)
        }

        totals.completed = totals.categories.every((c) => c.error === undefined)
        return totals
      })
    })
  )

  log.info({ added: result.added, processed: result.processed }, "Full scan finished")
  return result
}
