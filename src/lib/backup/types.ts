/**
 * What gets snapshotted off-box: the relational store or the saved cookie files.
 */
export type BackupTarget = "store" | "cookies"

export const BACKUP_TARGETS: readonly BackupTarget[] = ["store", "cookies"]

/**
 * Fire-and-forget backup request. Repeated calls while one is pending coalesce.
 */
export interface BackupScheduler {
  scheduleBackup(target?: BackupTarget): void
}

/**
 * Performs one backup of a target. Resolves false when the run was skipped
 * (another process holds the lock, nothing configured).
 */
export interface BackupRunner {
  run(target: BackupTarget): Promise<boolean>
}
