/**
 * BrowserDriver over playwright-core.
 *
 * Each driver owns its own browser process and a single page. The browser
 * binary comes from the host (BROWSER_EXECUTABLE_PATH or the system Chrome
 * channel); nothing is downloaded.
 */

import type { Browser, BrowserContext, Cookie, ElementHandle, Page } from "playwright-core"

import type { BrowserSettings } from "../config.js"
import { createComponentLogger } from "../logger.js"
import type { BrowserDriver, DriverFactory, PageElement, SessionKind, StoredCookie } from "./types.js"

const DEFAULT_ELEMENT_TIMEOUT_MS = 5000

// Media and images are never needed for extraction
const BLOCKED_RESOURCE_TYPES = new Set(["image", "media", "font"])

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: ElementHandle) {}

  async click(): Promise<void> {
    await this.handle.click()
  }

  async sendKeys(text: string): Promise<void> {
    await this.handle.fill(text)
  }

  async text(): Promise<string> {
    return (await this.handle.textContent()) ?? ""
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name)
  }
}

function toStoredCookie(cookie: Cookie): StoredCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  }
}

export class PlaywrightDriver implements BrowserDriver {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" })
  }

  async findElement(
    selector: string,
    timeoutMs: number = DEFAULT_ELEMENT_TIMEOUT_MS
  ): Promise<PageElement | null> {
    try {
      const handle = await this.page.waitForSelector(selector, {
        state: "attached",
        timeout: timeoutMs,
      })
      return handle ? new PlaywrightElement(handle) : null
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        return null
      }
      throw error
    }
  }

  async currentURL(): Promise<string> {
    return this.page.url()
  }

  async pageTitle(): Promise<string> {
    return this.page.title()
  }

  async pageSource(): Promise<string> {
    return this.page.content()
  }

  async getCookies(): Promise<StoredCookie[]> {
    return (await this.context.cookies()).map(toStoredCookie)
  }

  async setCookies(cookies: StoredCookie[]): Promise<void> {
    await this.context.addCookies(cookies)
  }

  async clearCookies(): Promise<void> {
    await this.context.clearCookies()
  }

  async close(): Promise<void> {
    await this.context.close()
    await this.browser.close()
  }
}

export class PlaywrightDriverFactory implements DriverFactory {
  private readonly log = createComponentLogger("playwright")

  constructor(private readonly settings: BrowserSettings) {}

  async create(kind: SessionKind): Promise<BrowserDriver> {
    // Loaded lazily so commands that never open a browser do not pay for it
    const { chromium } = await import("playwright-core")

    this.log.info({ kind, headless: this.settings.headless }, "Launching browser")

    const browser = await chromium.launch({
      headless: this.settings.headless,
      executablePath: this.settings.executablePath,
      channel: this.settings.executablePath ? undefined : "chrome",
      args: ["--disable-dev-shm-usage", "--no-sandbox"],
    })

    try {
      const context = await browser.newContext({
        locale: "ru-RU",
        viewport: { width: 1280, height: 800 },
      })
      context.setDefaultNavigationTimeout(this.settings.pageLoadTimeoutMs)

      await context.route("**/*", (route) => {
        if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
          return route.abort()
        }
        return route.continue()
      })

      const page = await context.newPage()
      return new PlaywrightDriver(browser, context, page)
    } catch (error) {
      await browser.close()
      throw error
    }
  }
}
