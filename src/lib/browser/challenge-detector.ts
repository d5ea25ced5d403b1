/**
 * Anti-bot interstitial detection.
 *
 * A challenge page replaces the requested content entirely, so it is detected
 * from the page title and markup rather than from any expected element.
 */

const TITLE_MARKERS = ["Just a moment", "Один момент"] as const

const SOURCE_MARKERS = ["challenges.cloudflare.com", "/cdn-cgi/challenge-platform/"] as const

export interface ChallengeDetectionResult {
  detected: boolean
  /** The marker that matched */
  marker: string | null
}

export function detectChallenge(page: { title: string; source: string }): ChallengeDetectionResult {
  for (const marker of TITLE_MARKERS) {
    if (page.title.includes(marker)) {
      return { detected: true, marker }
    }
  }

  for (const marker of SOURCE_MARKERS) {
    if (page.source.includes(marker)) {
      return { detected: true, marker }
    }
  }

  return { detected: false, marker: null }
}
