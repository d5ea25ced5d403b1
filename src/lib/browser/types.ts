/**
 * Browser automation contract.
 *
 * Everything above this layer (session controller, crawler, refresher) talks to
 * the site through these interfaces, so a Playwright page, a remote WebDriver or
 * an in-memory fake can be swapped in without touching the scan logic.
 */

/**
 * Independent site identities. Each has its own credentials, base URL and
 * cookie file, so two workloads can run without sharing a login.
 */
export type SessionKind = "main" | "auxiliary"

export const SESSION_KINDS: readonly SessionKind[] = ["main", "auxiliary"]

/**
 * Cookie shape persisted to disk and exchanged with the driver.
 */
export interface StoredCookie {
  name: string
  value: string
  domain: string
  path: string
  expires: number
  httpOnly: boolean
  secure: boolean
  sameSite: "Strict" | "Lax" | "None"
}

/**
 * A located element on the current page.
 */
export interface PageElement {
  click(): Promise<void>
  /** Replace the element's value with `text` */
  sendKeys(text: string): Promise<void>
  text(): Promise<string>
  attribute(name: string): Promise<string | null>
}

export interface BrowserDriver {
  navigate(url: string): Promise<void>
  /**
   * Wait up to `timeoutMs` for an element matching `selector`.
   * Resolves null when nothing appears in time.
   */
  findElement(selector: string, timeoutMs?: number): Promise<PageElement | null>
  currentURL(): Promise<string>
  pageTitle(): Promise<string>
  pageSource(): Promise<string>
  getCookies(): Promise<StoredCookie[]>
  setCookies(cookies: StoredCookie[]): Promise<void>
  clearCookies(): Promise<void>
  close(): Promise<void>
}

/**
 * Creates a fresh driver for an identity. Called on acquire and on every restart.
 */
export interface DriverFactory {
  create(kind: SessionKind): Promise<BrowserDriver>
}
