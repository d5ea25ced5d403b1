/**
 * Backup runner that holds a per-target distributed lock for the duration of
 * the upload, so two processes never snapshot the same target at once.
 */

import { randomUUID } from "crypto"
import fs from "fs/promises"
import path from "path"
import type { Pool } from "pg"
import { getLatestStoreChange } from "../db/store-changes.js"
import { createComponentLogger } from "../logger.js"
import type { LockProvider } from "../redis.js"
import type { BackupUploader } from "./command-uploader.js"
import type { BackupRunner, BackupTarget } from "./types.js"

const log = createComponentLogger("backup-runner")

export const BACKUP_LOCK_NAMES: Record<BackupTarget, string> = {
  store: "backup_lock",
  cookies: "cookies_backup_lock",
}

const STORE_MARKER_FILE = ".last-store-backup"

export interface LockedBackupRunnerOptions {
  storeLockTtlMs: number
  cookiesLockTtlMs: number
  /**
   * When set, a store backup is skipped if nothing was written since the
   * previous one. The time of the last backed-up change is kept in dataDir.
   */
  changeTracking?: { pool: Pool; dataDir: string }
}

export class LockedBackupRunner implements BackupRunner {
  constructor(
    private readonly uploader: BackupUploader,
    private readonly locks: LockProvider,
    private readonly options: LockedBackupRunnerOptions
  ) {}

  async run(target: BackupTarget): Promise<boolean> {
    const lockName = BACKUP_LOCK_NAMES[target]
    const lockValue = randomUUID()
    const ttlMs = target === "store" ? this.options.storeLockTtlMs : this.options.cookiesLockTtlMs

    const acquired = await this.locks.acquire(lockName, lockValue, ttlMs)
    if (!acquired) {
      log.info({ target, lockName }, "Backup lock held elsewhere, skipping")
      return false
    }

    try {
      const latestChange = target === "store" ? await this.latestUnsavedChange() : undefined
      if (latestChange === null) {
        log.info({ target }, "Store unchanged since last backup")
        return false
      }

      const uploaded = await this.uploader.upload(target)
      if (uploaded && latestChange) {
        await this.writeMarker(latestChange)
      }
      return uploaded
    } finally {
      await this.locks.release(lockName, lockValue)
    }
  }

  /**
   * The newest change not yet covered by a backup. Null when the store is
   * unchanged, undefined when change tracking is off or the store is empty.
   */
  private async latestUnsavedChange(): Promise<Date | null | undefined> {
    const tracking = this.options.changeTracking
    if (!tracking) {
      return undefined
    }

    const latest = await getLatestStoreChange(tracking.pool)
    if (!latest) {
      return undefined
    }

    const previous = await readMarker(tracking.dataDir)
    if (previous && latest.getTime() <= previous.getTime()) {
      return null
    }
    return latest
  }

  private async writeMarker(latest: Date): Promise<void> {
    const tracking = this.options.changeTracking
    if (!tracking) {
      return
    }
    await fs.mkdir(tracking.dataDir, { recursive: true })
    await fs.writeFile(path.join(tracking.dataDir, STORE_MARKER_FILE), latest.toISOString(), "utf-8")
  }
}

async function readMarker(dataDir: string): Promise<Date | null> {
  let content: string
  try {
    content = await fs.readFile(path.join(dataDir, STORE_MARKER_FILE), "utf-8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null
    }
    throw error
  }

  const parsed = new Date(content.trim())
  return isNaN(parsed.getTime()) ? null : parsed
}
