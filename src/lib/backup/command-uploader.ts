/**
 * Runs the configured shell command that uploads a snapshot off-box. The
 * upload itself (pg_dump, object storage client, ...) lives in that command.
 */

import { spawn } from "child_process"
import { createComponentLogger } from "../logger.js"
import type { BackupTarget } from "./types.js"

const log = createComponentLogger("backup-command")

export interface CommandResult {
  success: boolean
  error?: string
}

export type CommandRunner = (command: string, env: Record<string, string>) => Promise<CommandResult>

export interface BackupUploader {
  /** Resolves false when there is nothing to run for the target */
  upload(target: BackupTarget): Promise<boolean>
}

/**
 * Run a command through the shell, collecting stderr for the error message.
 */
export const runShellCommand: CommandRunner = (command, env) =>
  new Promise((resolve) => {
    const child = spawn(command, {
      shell: true,
      stdio: ["ignore", "inherit", "pipe"],
      env: { ...process.env, ...env },
    })

    let stderrOutput = ""

    child.stderr?.on("data", (data: Buffer) => {
      stderrOutput += data.toString()
    })

    child.on("close", (code) => {
      if (code === 0) {
        resolve({ success: true })
      } else {
        resolve({
          success: false,
          error: stderrOutput.trim() || `Process exited with code ${code}`,
        })
      }
    })

    child.on("error", (err) => {
      const stderrMessage = stderrOutput.trim()
      resolve({
        success: false,
        error: stderrMessage ? `${err.message}\n\nStderr before error:\n${stderrMessage}` : err.message,
      })
    })
  })

export interface CommandBackupUploaderOptions {
  storeCommand?: string
  cookiesCommand?: string
  /** Passed to the command as COOKIES_DIR */
  cookiesDir: string
  /** Passed to the command as DATA_DIR */
  dataDir: string
  run?: CommandRunner
}

export class CommandBackupUploader implements BackupUploader {
  private readonly run: CommandRunner

  constructor(private readonly options: CommandBackupUploaderOptions) {
    this.run = options.run ?? runShellCommand
  }

  async upload(target: BackupTarget): Promise<boolean> {
    const command = target === "store" ? this.options.storeCommand : this.options.cookiesCommand
    if (!command) {
      log.info({ target }, "No backup command configured")
      return false
    }

    const started = Date.now()
    const result = await this.run(command, {
      BACKUP_TARGET: target,
      COOKIES_DIR: this.options.cookiesDir,
      DATA_DIR: this.options.dataDir,
    })

    if (!result.success) {
      throw new Error(`Backup command for ${target} failed: ${result.error ?? "unknown error"}`)
    }

    log.info({ target, durationMs: Date.now() - started }, "Backup uploaded")
    return true
  }
}
