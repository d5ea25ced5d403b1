import pino from "pino"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.NODE_ENV === "test"

/**
 * Where a log line originated. Persisted with error logs so failures can be
 * grouped by entry point.
 */
export type LogSource = "script" | "job" | "worker" | "session" | "crawler" | "backup" | "other"

/**
 * Structured application logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
  // JSON in production and tests, pino-pretty for local runs
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
  base: {
    service: "catalog-sync",
    env: process.env.NODE_ENV || "development",
  },
  redact: {
    paths: ["password", "credentials.password", "cookies", "code", "token"],
    censor: "[REDACTED]",
  },
})

/**
 * Create a child logger bound to one component (crawler, session, scan...).
 */
export function createComponentLogger(
  component: string,
  bindings: Record<string, unknown> = {}
): Logger {
  return logger.child({ component, ...bindings })
}

/**
 * Log levels:
 * - fatal: System is unusable
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages
 * - debug: Debug-level messages
 * - trace: Most detailed tracing
 */
export type Logger = typeof logger
