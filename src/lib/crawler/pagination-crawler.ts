/**
 * Pagination crawler.
 *
 * Walks a paged listing in ascending page order through a session, handing
 * each parsed page to a caller-supplied processor. Page errors are logged and
 * the page is skipped; a dead session is restarted and the same page retried;
 * anything that exhausts the recovery budget ends the crawl with an error.
 */

import { AbortError, PageFetchError, getErrorMessage } from "../errors.js"
import { classifyError, isAbort, isSessionDead } from "../fatal-error-classifier.js"
import { createComponentLogger, type Logger } from "../logger.js"
import { sleep as defaultSleep, withRetry } from "../retry.js"
import type { ShutdownSignal } from "../shutdown.js"
import type { Session, SessionController } from "../browser/session-controller.js"
import { parseTotalPages } from "./extractors.js"
import { parseDocument } from "./html.js"

export interface PageOutcome {
  /** New records written for this page */
  added: number
  /** Items seen on this page */
  processed: number
  /** Finish after this page */
  stop?: boolean
}

export interface CrawlRequest {
  /** Label used in logs, e.g. "history:episodes" */
  label: string
  /** Absolute URL of a listing page */
  pageUrl: (page: number) => string
  startPage?: number
  delayMs: number
  processPage: (doc: Document, page: number) => Promise<PageOutcome>
  /** Runs after a page was processed without error */
  onPageDone?: (page: number) => Promise<void>
}

export interface CrawlResult {
  itemsAdded: number
  itemsProcessed: number
  pagesVisited: number
  totalPages: number
  stoppedEarly: boolean
  /** Stopped because shutdown was requested */
  interrupted: boolean
  failedPages: number[]
}

export interface PaginationCrawlerOptions {
  shutdown?: ShutdownSignal
  sleep?: (ms: number) => Promise<void>
  /** Session restarts allowed for a single page before the crawl aborts */
  maxSessionRecoveries?: number
}

export class PaginationCrawler {
  private readonly log: Logger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly maxSessionRecoveries: number

  constructor(
    private readonly controller: SessionController,
    private readonly session: Session,
    private readonly options: PaginationCrawlerOptions = {}
  ) {
    this.log = createComponentLogger("crawler", { sessionKind: session.kind })
    this.sleep = options.sleep ?? defaultSleep
    this.maxSessionRecoveries = options.maxSessionRecoveries ?? 2
  }

  async crawl(request: CrawlRequest): Promise<CrawlResult> {
    const startPage = Math.max(1, request.startPage ?? 1)
    const log = this.log.child({ listing: request.label })

    const result: CrawlResult = {
      itemsAdded: 0,
      itemsProcessed: 0,
      pagesVisited: 0,
      totalPages: 0,
      stoppedEarly: false,
      interrupted: false,
      failedPages: [],
    }

    let totalPages: number | null = null

    for (let page = startPage; totalPages === null || page <= totalPages; page++) {
      if (this.options.shutdown?.requested) {
        result.interrupted = true
        log.info({ page }, "Shutdown requested, stopping crawl")
        break
      }

      if (page > startPage && request.delayMs > 0) {
        await this.sleep(request.delayMs)
      }

      const url = request.pageUrl(page)
      let doc: Document
      try {
        doc = await this.fetchPage(url)
      } catch (error) {
        if (classifyError(error) !== "retryable") {
          throw this.asAbort(error, url)
        }
        if (totalPages === null) {
          throw new PageFetchError(
            `First page of ${request.label} could not be loaded: ${getErrorMessage(error)}`,
            url,
            page,
            { cause: error }
          )
        }
        log.warn({ page, url, error: getErrorMessage(error) }, "Page failed to load, skipping")
        result.failedPages.push(page)
        continue
      }

      result.pagesVisited++
      if (totalPages === null) {
        totalPages = Math.max(parseTotalPages(doc), startPage)
        result.totalPages = totalPages
        log.info({ startPage, totalPages }, "Crawling listing")
      }

      let outcome: PageOutcome
      try {
        outcome = await request.processPage(doc, page)
      } catch (error) {
        if (classifyError(error) !== "retryable") {
          throw this.asAbort(error, url)
        }
        log.error({ page, url, error: getErrorMessage(error) }, "Page processing failed, skipping")
        result.failedPages.push(page)
        continue
      }

      result.itemsAdded += outcome.added
      result.itemsProcessed += outcome.processed
      log.debug({ page, totalPages, added: outcome.added }, "Page processed")

      if (request.onPageDone) {
        await request.onPageDone(page)
      }

      if (outcome.stop) {
        result.stoppedEarly = true
        log.info({ page }, "Stop condition reached after page")
        break
      }
    }

    return result
  }

  /**
   * Load one page, restarting the session when it dies underneath.
   */
  private async fetchPage(url: string): Promise<Document> {
    return withRetry(
      async () => parseDocument(await this.controller.fetchSource(this.session, url)),
      {
        maxAttempts: this.maxSessionRecoveries + 1,
        backoff: { kind: "none" },
        shouldRetry: isSessionDead,
        onRetry: async (error) => {
          await this.controller.restart(this.session, getErrorMessage(error))
        },
        sleep: this.sleep,
      }
    )
  }

  private asAbort(error: unknown, url: string): Error {
    if (error instanceof Error && isAbort(error)) {
      return error
    }
    return new AbortError(`Session could not be recovered while loading ${url}`, { cause: error })
  }
}
