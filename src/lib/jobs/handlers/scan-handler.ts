/**
 * Shared base for jobs that drive a browser session.
 *
 * Every scan job takes the same lock, so a worker never runs two scans
 * against the site at once, whichever queue or process started them.
 */

import type { Job } from "bullmq"
import { createScanContext, type ScanContext, type ScanResult } from "../../scans/context.js"
import { QueueName, type JobResult } from "../types.js"
import { BaseJobHandler, type ExclusiveLock } from "./base.js"

export const BROWSER_LOCK: ExclusiveLock = {
  name: "browser-session",
  ttlMs: 12 * 60 * 60 * 1000,
}

export abstract class ScanJobHandler<
  TPayload,
  TResult extends ScanResult,
> extends BaseJobHandler<TPayload, TResult> {
  readonly queueName = QueueName.BROWSER
  readonly exclusiveLock = BROWSER_LOCK

  protected abstract scan(ctx: ScanContext, payload: TPayload): Promise<TResult>

  async process(job: Job<unknown>, payload: TPayload): Promise<JobResult<TResult>> {
    const log = this.createLogger(job)
    log.info("Starting scan")

    const data = await this.scan(this.scanContext(), payload)

    return {
      success: true,
      data,
      metadata: {
        processed: data.processed,
        added: data.added,
        interrupted: this.deps.shutdown?.requested ?? false,
      },
    }
  }

  protected scanContext(): ScanContext {
    const { pool, config, backup, shutdown } = this.deps
    return this.deps.scanContext?.() ?? createScanContext({ pool, config, backup, shutdown })
  }
}
