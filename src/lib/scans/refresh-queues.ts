/**
 * Refresh queues: show IDs collected elsewhere (admin actions, other scans)
 * in two Redis sets, drained in batches by a periodic job. Detail refreshes
 * run on the auxiliary identity, duration refreshes on the main one.
 */

import type { Session } from "../browser/session-controller.js"
import type { SessionKind } from "../browser/types.js"
import { getShow } from "../db/index.js"
import { getErrorMessage } from "../errors.js"
import { classifyError } from "../fatal-error-classifier.js"
import { createComponentLogger } from "../logger.js"
import { addToSet, popFromSet } from "../redis.js"
import { trackSyncRun } from "../sync-runs.js"
import {
  createRefresher,
  withStoreBackup,
  type ScanChanges,
  type ScanContext,
  type ScanResult,
} from "./context.js"

const log = createComponentLogger("refresh-queues")

export const REFRESH_QUEUES = {
  details: "queue:update_details",
  durations: "queue:update_durations",
} as const

export type RefreshQueueKind = keyof typeof REFRESH_QUEUES

const QUEUE_SESSIONS: Record<RefreshQueueKind, SessionKind> = {
  details: "auxiliary",
  durations: "main",
}

export const DEFAULT_QUEUE_BATCH_SIZE = 50

/**
 * Set operations the queues need. Backed by Redis in production.
 */
export interface QueueStore {
  add(key: string, members: string[]): Promise<number | null>
  pop(key: string, count: number): Promise<string[]>
}

export const redisQueueStore: QueueStore = {
  add: addToSet,
  pop: popFromSet,
}

export interface QueueBatchResult {
  kind: RefreshQueueKind
  taken: number
  processed: number
  /** IDs pushed back for a later run */
  requeued: number
  /** The batch ended early because the session died */
  stopped: boolean
}

export interface RefreshQueuesResult extends ScanResult {
  batches: QueueBatchResult[]
}

/**
 * Queue show IDs for a refresh. Returns how many were not already queued,
 * or null when Redis is unavailable.
 */
export function enqueueRefresh(
  kind: RefreshQueueKind,
  ids: number[],
  store: QueueStore = redisQueueStore
): Promise<number | null> {
  return store.add(REFRESH_QUEUES[kind], ids.map(String))
}

export async function processRefreshQueues(
  ctx: ScanContext,
  options: { store?: QueueStore; batchSize?: number } = {}
): Promise<RefreshQueuesResult> {
  const store = options.store ?? redisQueueStore
  const batchSize = options.batchSize ?? DEFAULT_QUEUE_BATCH_SIZE

  return withStoreBackup(ctx, (changes) =>
    trackSyncRun<RefreshQueuesResult>(ctx.pool, "refresh-queues", async () => {
      const totals: RefreshQueuesResult = { processed: 0, added: 0, batches: [] }

      for (const kind of ["details", "durations"] as const) {
        if (ctx.shutdown?.requested) {
          break
        }
        const batch = await processBatch(ctx, store, kind, batchSize, changes)
        if (batch) {
          totals.batches.push(batch)
          totals.processed += batch.processed
        }
      }

      return totals
    })
  )
}

async function processBatch(
  ctx: ScanContext,
  store: QueueStore,
  kind: RefreshQueueKind,
  batchSize: number,
  changes: ScanChanges
): Promise<QueueBatchResult | null> {
  const key = REFRESH_QUEUES[kind]
  const ids = parseQueuedIds(await store.pop(key, batchSize))
  if (ids.length === 0) {
    return null
  }

  const batchLog = log.child({ queue: key })
  batchLog.info({ count: ids.length }, "Processing queued shows")
  const batch: QueueBatchResult = {
    kind,
    taken: ids.length,
    processed: 0,
    requeued: 0,
    stopped: false,
  }

  let session: Session
  try {
    session = await ctx.controller.acquire(QUEUE_SESSIONS[kind])
  } catch (error) {
    batchLog.error({ error: getErrorMessage(error) }, "No session, returning IDs to the queue")
    await store.add(key, ids.map(String))
    batch.requeued = ids.length
    return batch
  }

  try {
    const refresher = createRefresher(ctx, session)

    for (const [index, showId] of ids.entries()) {
      try {
        if (kind === "details") {
          await refresher.refreshDetails(showId)
        } else {
          const show = await getShow(ctx.pool, showId)
          if (!show) {
            batchLog.warn({ showId }, "Queued show is not in the store, skipping")
            continue
          }
          await refresher.refreshDurations(show)
        }
        batch.processed++
        changes.record()
      } catch (error) {
        batchLog.error({ showId, error: getErrorMessage(error) }, "Queued show failed")
        if (classifyError(error) !== "retryable") {
          const rest = ids.slice(index)
          await store.add(key, rest.map(String))
          batch.requeued = rest.length
          batch.stopped = true
          batchLog.warn({ requeued: rest.length }, "Session lost, stopping batch")
          break
        }
      }
    }
  } finally {
    await ctx.controller.release(session)
  }

  batchLog.info({ processed: batch.processed, taken: batch.taken }, "Batch finished")
  return batch
}

function parseQueuedIds(members: string[]): number[] {
  const ids: number[] = []
  for (const member of members) {
    const id = parseInt(member, 10)
    if (Number.isInteger(id) && id > 0) {
      ids.push(id)
    } else {
      log.warn({ member }, "Dropping malformed queue entry")
    }
  }
  return ids
}
