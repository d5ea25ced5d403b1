/**
 * Cooperative cancellation flag checked by long-running loops between pages
 * and poll iterations. Nothing is interrupted mid-flight.
 */

import { logger } from "./logger.js"

export class ShutdownSignal {
  private reason: string | null = null

  get requested(): boolean {
    return this.reason !== null
  }

  get requestedBecause(): string | null {
    return this.reason
  }

  request(reason: string): void {
    if (this.reason === null) {
      this.reason = reason
      logger.info({ reason }, "Shutdown requested, finishing current step")
    }
  }

  /**
   * Set the flag on SIGINT/SIGTERM. Returns a function that removes the handlers.
   */
  installSignalHandlers(): () => void {
    const onSigint = () => this.request("SIGINT")
    const onSigterm = () => this.request("SIGTERM")
    process.on("SIGINT", onSigint)
    process.on("SIGTERM", onSigterm)

    return () => {
      process.off("SIGINT", onSigint)
      process.off("SIGTERM", onSigterm)
    }
  }
}
