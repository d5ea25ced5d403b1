/**
 * Configuration loading for the sync engine.
 *
 * Reads site identities, browser settings and scan tunables from environment
 * variables. Values that fail to parse fall back to their defaults.
 */

import os from "os"
import path from "path"

import type { SessionKind } from "./browser/types.js"
import { ConfigurationError } from "./errors.js"

// Environment variable names
const ENV = {
  SITE_URL: "SITE_URL",
  SITE_AUX_URL: "SITE_AUX_URL",
  SITE_LOGIN: "SITE_LOGIN",
  SITE_PASSWORD: "SITE_PASSWORD",
  SITE_AUX_LOGIN: "SITE_AUX_LOGIN",
  SITE_AUX_PASSWORD: "SITE_AUX_PASSWORD",

  COOKIES_DIR: "COOKIES_DIR",
  DATA_DIR: "DATA_DIR",

  BROWSER_HEADLESS: "BROWSER_HEADLESS",
  BROWSER_EXECUTABLE_PATH: "BROWSER_EXECUTABLE_PATH",
  PAGE_LOAD_TIMEOUT_MS: "PAGE_LOAD_TIMEOUT_MS",

  OTP_WAIT_MS: "OTP_WAIT_MS",
  CODE_LIFETIME_MINUTES: "CODE_LIFETIME_MINUTES",
  CODE_REGEX: "CODE_REGEX",

  FULL_SCAN_RESUME_WINDOW_HOURS: "FULL_SCAN_RESUME_WINDOW_HOURS",
  FULL_SCAN_PAGE_DELAY_MS: "FULL_SCAN_PAGE_DELAY_MS",
  HISTORY_PAGE_DELAY_MS: "HISTORY_PAGE_DELAY_MS",
  CHALLENGE_COOLDOWN_MS: "CHALLENGE_COOLDOWN_MS",
  MAX_SESSION_RESTARTS: "MAX_SESSION_RESTARTS",
  STALENESS_DAYS: "STALENESS_DAYS",
  NEW_EPISODES_DELAY_MS: "NEW_EPISODES_DELAY_MS",
  UPDATE_DETAILS_DELAY_MS: "UPDATE_DETAILS_DELAY_MS",
  UPDATE_DURATIONS_DELAY_MS: "UPDATE_DURATIONS_DELAY_MS",
  GAP_SCAN_ATTEMPTS: "GAP_SCAN_ATTEMPTS",

  BACKUP_COMMAND: "BACKUP_COMMAND",
  COOKIES_BACKUP_COMMAND: "COOKIES_BACKUP_COMMAND",
} as const

export interface SiteIdentity {
  /** Always ends with "/" */
  baseUrl: string
  login?: string
  password?: string
}

export interface BrowserSettings {
  headless: boolean
  executablePath?: string
  pageLoadTimeoutMs: number
}

export interface BackupSettings {
  storeCommand?: string
  cookiesCommand?: string
  storeLockTtlMs: number
  cookiesLockTtlMs: number
}

export interface SyncConfig {
  identities: Record<SessionKind, SiteIdentity>
  cookiesDir: string
  dataDir: string
  browser: BrowserSettings
  otpWaitMs: number
  codeLifetimeMinutes: number
  codePattern: string
  fullScanResumeWindowHours: number
  fullScanPageDelayMs: number
  historyPageDelayMs: number
  challengeCooldownMs: number
  maxSessionRestarts: number
  stalenessDays: number
  newEpisodesDelayMs: number
  updateDetailsDelayMs: number
  updateDurationsDelayMs: number
  gapScanAttempts: number
  backup: BackupSettings
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  identities: {
    main: { baseUrl: "" },
    auxiliary: { baseUrl: "" },
  },
  cookiesDir: path.join(os.homedir(), ".catalog-sync", "cookies"),
  dataDir: path.join(process.cwd(), "data"),
  browser: {
    headless: true,
    pageLoadTimeoutMs: 60000,
  },
  otpWaitMs: 120000,
  codeLifetimeMinutes: 15,
  codePattern: "\\d{6}",
  fullScanResumeWindowHours: 24,
  fullScanPageDelayMs: 0,
  historyPageDelayMs: 2000,
  challengeCooldownMs: 10000,
  maxSessionRestarts: 3,
  stalenessDays: 90,
  newEpisodesDelayMs: 60000,
  updateDetailsDelayMs: 2000,
  updateDurationsDelayMs: 15000,
  gapScanAttempts: 3,
  backup: {
    storeLockTtlMs: 300000,
    cookiesLockTtlMs: 60000,
  },
}

/**
 * Expand ~ to home directory in a path.
 */
function expandHomePath(p: string): string {
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1))
  }
  return p
}

/**
 * Ensure a site URL ends with a slash so paths can be appended directly.
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim()
  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`
}

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10)
  return isNaN(parsed) || parsed < 0 ? fallback : parsed
}

function readOptional(name: string): string | undefined {
  const value = process.env[name]
  return value && value.trim().length > 0 ? value : undefined
}

/**
 * Load complete sync configuration from environment.
 * @throws ConfigurationError when SITE_URL is missing
 */
export function loadSyncConfig(): SyncConfig {
  const siteUrl = readOptional(ENV.SITE_URL)
  if (!siteUrl) {
    throw new ConfigurationError(`${ENV.SITE_URL} environment variable is not set`)
  }

  const mainUrl = normalizeBaseUrl(siteUrl)
  const auxUrl = normalizeBaseUrl(readOptional(ENV.SITE_AUX_URL) ?? siteUrl)
  const defaults = DEFAULT_SYNC_CONFIG

  return {
    identities: {
      main: {
        baseUrl: mainUrl,
        login: readOptional(ENV.SITE_LOGIN),
        password: readOptional(ENV.SITE_PASSWORD),
      },
      auxiliary: {
        baseUrl: auxUrl,
        login: readOptional(ENV.SITE_AUX_LOGIN),
        password: readOptional(ENV.SITE_AUX_PASSWORD),
      },
    },
    cookiesDir: expandHomePath(readOptional(ENV.COOKIES_DIR) ?? defaults.cookiesDir),
    dataDir: expandHomePath(readOptional(ENV.DATA_DIR) ?? defaults.dataDir),
    browser: {
      headless: process.env[ENV.BROWSER_HEADLESS] !== "false",
      executablePath: readOptional(ENV.BROWSER_EXECUTABLE_PATH),
      pageLoadTimeoutMs: readInt(ENV.PAGE_LOAD_TIMEOUT_MS, defaults.browser.pageLoadTimeoutMs),
    },
    otpWaitMs: readInt(ENV.OTP_WAIT_MS, defaults.otpWaitMs),
    codeLifetimeMinutes: readInt(ENV.CODE_LIFETIME_MINUTES, defaults.codeLifetimeMinutes),
    codePattern: readOptional(ENV.CODE_REGEX) ?? defaults.codePattern,
    fullScanResumeWindowHours: readInt(
      ENV.FULL_SCAN_RESUME_WINDOW_HOURS,
      defaults.fullScanResumeWindowHours
    ),
    fullScanPageDelayMs: readInt(ENV.FULL_SCAN_PAGE_DELAY_MS, defaults.fullScanPageDelayMs),
    historyPageDelayMs: readInt(ENV.HISTORY_PAGE_DELAY_MS, defaults.historyPageDelayMs),
    challengeCooldownMs: readInt(ENV.CHALLENGE_COOLDOWN_MS, defaults.challengeCooldownMs),
    maxSessionRestarts: readInt(ENV.MAX_SESSION_RESTARTS, defaults.maxSessionRestarts),
    stalenessDays: readInt(ENV.STALENESS_DAYS, defaults.stalenessDays),
    newEpisodesDelayMs: readInt(ENV.NEW_EPISODES_DELAY_MS, defaults.newEpisodesDelayMs),
    updateDetailsDelayMs: readInt(ENV.UPDATE_DETAILS_DELAY_MS, defaults.updateDetailsDelayMs),
    updateDurationsDelayMs: readInt(
      ENV.UPDATE_DURATIONS_DELAY_MS,
      defaults.updateDurationsDelayMs
    ),
    gapScanAttempts: Math.max(1, readInt(ENV.GAP_SCAN_ATTEMPTS, defaults.gapScanAttempts)),
    backup: {
      storeCommand: readOptional(ENV.BACKUP_COMMAND),
      cookiesCommand: readOptional(ENV.COOKIES_BACKUP_COMMAND),
      storeLockTtlMs: defaults.backup.storeLockTtlMs,
      cookiesLockTtlMs: defaults.backup.cookiesLockTtlMs,
    },
  }
}

// Singleton configuration instance
let configInstance: SyncConfig | null = null

/**
 * Get the sync configuration.
 * Loads from environment on first call, then returns cached instance.
 */
export function getSyncConfig(): SyncConfig {
  if (!configInstance) {
    configInstance = loadSyncConfig()
  }
  return configInstance
}

/**
 * Override the sync configuration.
 * Useful for testing or programmatic configuration.
 */
export function setSyncConfig(config: Partial<SyncConfig>): void {
  configInstance = {
    ...DEFAULT_SYNC_CONFIG,
    ...config,
  }
}

/**
 * Reset configuration to force reload from environment.
 */
export function resetSyncConfig(): void {
  configInstance = null
}

/**
 * Check if an identity has a username and password configured.
 */
export function hasCredentials(config: SyncConfig, kind: SessionKind): boolean {
  const identity = config.identities[kind]
  return !!(identity.login && identity.password)
}
