/**
 * In-process stand-in for the site and a browser driving it.
 *
 * Pages are served from routes keyed by absolute URL. A route may hold a queue
 * of pages: each visit takes the next one and the last one repeats. The home
 * page and the login form are built in and honour the session cookie, so the
 * session controller's cookie, login and code paths run for real.
 */

import { parseDocument } from "../lib/crawler/html.js"
import type {
  BrowserDriver,
  DriverFactory,
  PageElement,
  SessionKind,
  StoredCookie,
} from "../lib/browser/types.js"
import { notFoundPageHtml } from "./fixtures.js"

export interface FakePage {
  title: string
  html: string
}

export type FakeRoute = FakePage | ((driver: FakeBrowserDriver) => FakePage)

const CLOSED_MESSAGE = "Target page, context or browser has been closed"

function titleOf(html: string): string {
  return parseDocument(html).title
}

export function page(html: string): FakePage {
  return { title: titleOf(html), html }
}

export class FakeSite {
  readonly navigations: string[] = []
  readonly acceptedCodes = new Set<string>()
  readonly submittedCodes: string[] = []
  requireCode = true
  credentials = { login: "test-user", password: "test-secret" }

  private readonly routes = new Map<string, FakeRoute[]>()
  private readonly failures = new Map<string, Error[]>()
  private readonly liveSessions = new Set<string>()
  private sessionCounter = 0

  constructor(readonly baseUrl: string = "https://site.test/") {}

  url(relativePath: string): string {
    return `${this.baseUrl}${relativePath.replace(/^\//, "")}`
  }

  get loginUrl(): string {
    return this.url("user/login")
  }

  /**
   * Serve `pages` on successive visits to `relativePath`; the last one repeats.
   */
  route(relativePath: string, ...pages: FakeRoute[]): this {
    this.routes.set(this.url(relativePath), pages)
    return this
  }

  /** Throw `error` on the next visit to `relativePath` */
  failOnce(relativePath: string, error: Error): this {
    const key = this.url(relativePath)
    this.failures.set(key, [...(this.failures.get(key) ?? []), error])
    return this
  }

  /** Cookie that the site accepts as signed in */
  issueSessionCookie(): StoredCookie {
    this.sessionCounter++
    const value = `session-${this.sessionCounter}`
    this.liveSessions.add(value)
    return {
      name: "sid",
      value,
      domain: new URL(this.baseUrl).hostname,
      path: "/",
      expires: -1,
      httpOnly: true,
      secure: true,
      sameSite: "Lax",
    }
  }

  revokeSessions(): void {
    this.liveSessions.clear()
  }

  isSignedIn(cookies: StoredCookie[]): boolean {
    return cookies.some((cookie) => cookie.name === "sid" && this.liveSessions.has(cookie.value))
  }

  /** Render `url` for `driver`; throws a queued failure first */
  serve(url: string, driver: FakeBrowserDriver): FakePage {
    this.navigations.push(url)

    const failure = this.failures.get(url)?.shift()
    if (failure) {
      throw failure
    }

    const queue = this.routes.get(url)
    if (queue && queue.length > 0) {
      const next = queue.length > 1 ? queue.shift() : queue[0]
      if (next) {
        return typeof next === "function" ? next(driver) : next
      }
    }

    if (url === this.baseUrl) {
      return this.homePage(driver)
    }
    if (url === this.loginUrl) {
      return this.loginPage(driver)
    }
    return page(notFoundPageHtml())
  }

  homePage(driver: FakeBrowserDriver): FakePage {
    const nav = this.isSignedIn(driver.cookieJar)
      ? `<a href="/user/logout">Выход</a>`
      : `<a href="/user/login">Вход</a>`
    return page(`<html><head><title>Главная</title></head><body>${nav}</body></html>`)
  }

  loginPage(driver: FakeBrowserDriver): FakePage {
    const code = driver.codePrompt ? `<input id="login-form-formcode">` : ""
    const credentials = driver.codePrompt
      ? ""
      : `<input id="login-form-login"><input id="login-form-password">`
    return page(
      `<html><head><title>Авторизация</title></head><body><h3>Авторизация</h3><form id="login-form">${credentials}${code}<button type="submit">Войти</button></form></body></html>`
    )
  }

  /** Handle a click on the login form's submit button */
  submitLogin(driver: FakeBrowserDriver): void {
    if (!driver.codePrompt) {
      const ok =
        driver.fields.get("#login-form-login") === this.credentials.login &&
        driver.fields.get("#login-form-password") === this.credentials.password
      if (!ok) {
        return
      }
      if (this.requireCode) {
        driver.codePrompt = true
        driver.show(this.loginUrl, this.loginPage(driver))
        return
      }
    } else {
      const code = driver.fields.get("#login-form-formcode") ?? ""
      this.submittedCodes.push(code)
      if (!this.acceptedCodes.has(code)) {
        return
      }
    }

    driver.codePrompt = false
    driver.cookieJar.push(this.issueSessionCookie())
    driver.show(this.baseUrl, this.homePage(driver))
  }
}

class FakeElement implements PageElement {
  constructor(
    private readonly driver: FakeBrowserDriver,
    private readonly selector: string,
    private readonly element: Element
  ) {}

  async click(): Promise<void> {
    this.driver.assertOpen()
    if (this.selector === '#login-form button[type="submit"]') {
      this.driver.site.submitLogin(this.driver)
    }
  }

  async sendKeys(text: string): Promise<void> {
    this.driver.assertOpen()
    this.driver.fields.set(this.selector, text)
  }

  async text(): Promise<string> {
    return this.element.textContent ?? ""
  }

  async attribute(name: string): Promise<string | null> {
    return this.element.getAttribute(name)
  }
}

export class FakeBrowserDriver implements BrowserDriver {
  readonly fields = new Map<string, string>()
  cookieJar: StoredCookie[] = []
  codePrompt = false
  closed = false

  private url = "about:blank"
  private current: FakePage = { title: "", html: "<html></html>" }

  constructor(
    readonly site: FakeSite,
    readonly kind: SessionKind
  ) {}

  assertOpen(): void {
    if (this.closed) {
      throw new Error(CLOSED_MESSAGE)
    }
  }

  show(url: string, rendered: FakePage): void {
    this.url = url
    this.current = rendered
  }

  async navigate(url: string): Promise<void> {
    this.assertOpen()
    this.show(url, this.site.serve(url, this))
  }

  async findElement(selector: string): Promise<PageElement | null> {
    this.assertOpen()
    const element = parseDocument(this.current.html).querySelector(selector)
    return element ? new FakeElement(this, selector, element) : null
  }

  async currentURL(): Promise<string> {
    this.assertOpen()
    return this.url
  }

  async pageTitle(): Promise<string> {
    this.assertOpen()
    return this.current.title
  }

  async pageSource(): Promise<string> {
    this.assertOpen()
    return this.current.html
  }

  async getCookies(): Promise<StoredCookie[]> {
    this.assertOpen()
    return [...this.cookieJar]
  }

  async setCookies(cookies: StoredCookie[]): Promise<void> {
    this.assertOpen()
    this.cookieJar.push(...cookies)
  }

  async clearCookies(): Promise<void> {
    this.assertOpen()
    this.cookieJar = []
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export class FakeDriverFactory implements DriverFactory {
  readonly created: FakeBrowserDriver[] = []
  private readonly pendingFailures: Error[] = []

  constructor(readonly site: FakeSite) {}

  failNext(error: Error): void {
    this.pendingFailures.push(error)
  }

  async create(kind: SessionKind): Promise<BrowserDriver> {
    const failure = this.pendingFailures.shift()
    if (failure) {
      throw failure
    }
    const driver = new FakeBrowserDriver(this.site, kind)
    this.created.push(driver)
    return driver
  }

  get latest(): FakeBrowserDriver | undefined {
    return this.created[this.created.length - 1]
  }
}
