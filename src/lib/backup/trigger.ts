/**
 * In-process backup trigger.
 *
 * scheduleBackup() returns at once. Requests for a target that is already
 * waiting are dropped; targets run one at a time through the runner. A request
 * that arrives while its target is running queues one more run, so changes
 * made during a snapshot are not lost.
 */

import { getErrorMessage } from "../errors.js"
import { createComponentLogger } from "../logger.js"
import type { BackupRunner, BackupScheduler, BackupTarget } from "./types.js"

const log = createComponentLogger("backup-trigger")

export class BackupTrigger implements BackupScheduler {
  private readonly pending = new Set<BackupTarget>()
  private running: Promise<void> | null = null

  constructor(private readonly runner: BackupRunner) {}

  scheduleBackup(target: BackupTarget = "store"): void {
    if (this.pending.has(target)) {
      log.debug({ target }, "Backup already pending")
      return
    }

    this.pending.add(target)
    log.info({ target }, "Backup scheduled")

    this.kick()
  }

  get idle(): boolean {
    return this.running === null
  }

  /**
   * Wait until every scheduled backup has run. Used before process exit.
   */
  async drain(): Promise<void> {
    while (this.running) {
      await this.running
    }
  }

  private kick(): void {
    if (this.running) {
      return
    }
    this.running = this.processPending().finally(() => {
      this.running = null
      if (this.pending.size > 0) {
        this.kick()
      }
    })
  }

  private async processPending(): Promise<void> {
    for (;;) {
      const next = this.pending.values().next()
      if (next.done) {
        return
      }
      const target = next.value
      this.pending.delete(target)

      try {
        const ran = await this.runner.run(target)
        if (!ran) {
          log.info({ target }, "Backup skipped")
        }
      } catch (error) {
        log.error({ target, error: getErrorMessage(error) }, "Backup failed")
      }
    }
  }
}
