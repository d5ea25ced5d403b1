/**
 * In-process stand-ins for the job layer: BullMQ jobs, Redis locks and the
 * handler dependency bag.
 */

import type { Job } from "bullmq"
import type { Pool } from "pg"
import type { BackupRunner, BackupTarget } from "../lib/backup/types.js"
import { DEFAULT_SYNC_CONFIG, type SyncConfig } from "../lib/config.js"
import type { JobDependencies } from "../lib/jobs/handlers/base.js"
import type { LockProvider } from "../lib/redis.js"
import { RecordingBackup } from "./harness.js"

export class MemoryLocks implements LockProvider {
  readonly held = new Map<string, string>()

  async acquire(name: string, value: string): Promise<boolean> {
    if (this.held.has(name)) {
      return false
    }
    this.held.set(name, value)
    return true
  }

  async release(name: string, value: string): Promise<boolean> {
    if (this.held.get(name) !== value) {
      return false
    }
    this.held.delete(name)
    return true
  }
}

export class RecordingBackupRunner implements BackupRunner {
  readonly runs: BackupTarget[] = []

  constructor(private readonly uploaded = true) {}

  async run(target: BackupTarget): Promise<boolean> {
    this.runs.push(target)
    return this.uploaded
  }
}

export interface FakeJobOptions {
  id?: string
  attemptsMade?: number
  attempts?: number
  priority?: number
}

/**
 * The fields of a BullMQ job the handlers and the worker read.
 */
export function fakeJob(name: string, data: unknown, options: FakeJobOptions = {}): Job<unknown> {
  const job = {
    id: options.id ?? "job-1",
    name,
    data,
    attemptsMade: options.attemptsMade ?? 0,
    opts: { attempts: options.attempts ?? 1, priority: options.priority },
    timestamp: Date.now(),
  }
  return job as unknown as Job<unknown>
}

export interface TestDependencies extends JobDependencies {
  locks: MemoryLocks
  backup: RecordingBackup
  backupRunner: RecordingBackupRunner
}

export function testDependencies(
  pool: Pool,
  overrides: Partial<SyncConfig> = {}
): TestDependencies {
  return {
    pool,
    config: { ...DEFAULT_SYNC_CONFIG, ...overrides },
    locks: new MemoryLocks(),
    backup: new RecordingBackup(),
    backupRunner: new RecordingBackupRunner(),
  }
}
