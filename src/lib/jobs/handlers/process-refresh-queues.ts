/**
 * PROCESS_REFRESH_QUEUES Handler
 *
 * Drains a batch of each Redis refresh set. IDs land there from the gap scan
 * and from operators; see enqueueRefresh().
 */

import type { ScanContext } from "../../scans/context.js"
import {
  processRefreshQueues,
  type QueueStore,
  type RefreshQueuesResult,
} from "../../scans/refresh-queues.js"
import {
  JobType,
  processRefreshQueuesPayloadSchema,
  type ProcessRefreshQueuesPayload,
} from "../types.js"
import type { JobDependencies } from "./base.js"
import { ScanJobHandler } from "./scan-handler.js"

export class ProcessRefreshQueuesHandler extends ScanJobHandler<
  ProcessRefreshQueuesPayload,
  RefreshQueuesResult
> {
  readonly jobType = JobType.PROCESS_REFRESH_QUEUES
  protected readonly schema = processRefreshQueuesPayloadSchema

  constructor(
    deps: JobDependencies,
    private readonly store?: QueueStore
  ) {
    super(deps)
  }

  protected scan(
    ctx: ScanContext,
    payload: ProcessRefreshQueuesPayload
  ): Promise<RefreshQueuesResult> {
    return processRefreshQueues(ctx, { store: this.store, batchSize: payload.batchSize })
  }
}
