import type { Pool } from "pg"
import type { SyncConfig } from "../config.js"
import { redisLockProvider, type LockProvider } from "../redis.js"
import { CommandBackupUploader } from "./command-uploader.js"
import { LockedBackupRunner } from "./locked-runner.js"

/**
 * The runner that actually uploads: configured commands, Redis locks and
 * store change tracking under DATA_DIR.
 */
export function createLockedBackupRunner(
  config: SyncConfig,
  pool: Pool,
  locks: LockProvider = redisLockProvider
): LockedBackupRunner {
  const uploader = new CommandBackupUploader({
    storeCommand: config.backup.storeCommand,
    cookiesCommand: config.backup.cookiesCommand,
    cookiesDir: config.cookiesDir,
    dataDir: config.dataDir,
  })

  return new LockedBackupRunner(uploader, locks, {
    storeLockTtlMs: config.backup.storeLockTtlMs,
    cookiesLockTtlMs: config.backup.cookiesLockTtlMs,
    changeTracking: { pool, dataDir: config.dataDir },
  })
}
