/**
 * Login flow for the site.
 *
 * Username and password go into the login form; the site then always asks for
 * a one-time code, which the code bridge supplies. The login counts as done
 * once the browser has left the login page.
 */

import type { SiteIdentity } from "../config.js"
import type { CodeBridge } from "../two-factor/code-bridge.js"
import { ConfigurationError, LoginTimeoutError } from "../errors.js"
import { createComponentLogger, type Logger } from "../logger.js"
import { sleep as defaultSleep } from "../retry.js"
import type { BrowserDriver, SessionKind } from "./types.js"

// Selectors
export const LOGIN_SELECTORS = {
  login: "#login-form-login",
  password: "#login-form-password",
  submit: '#login-form button[type="submit"]',
  code: "#login-form-formcode",
  loggedIn: "a[href*='/user/logout']",
} as const

// Timeouts
const FORM_TIMEOUT_MS = 30000
const CODE_PROMPT_TIMEOUT_MS = 15000
const LOGGED_IN_PROBE_TIMEOUT_MS = 5000
const KEY_SETTLE_MS = 1000
const CODE_SUBMIT_WAIT_MS = 3000

export interface LoginHandlerOptions {
  otpWaitMs: number
  sleep?: (ms: number) => Promise<void>
}

export class SiteLoginHandler {
  private readonly log: Logger
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    private readonly kind: SessionKind,
    private readonly identity: SiteIdentity,
    private readonly codeBridge: CodeBridge,
    private readonly options: LoginHandlerOptions
  ) {
    this.log = createComponentLogger("login", { sessionKind: kind })
    this.sleep = options.sleep ?? defaultSleep
  }

  get loginUrl(): string {
    return `${this.identity.baseUrl}user/login`
  }

  hasCredentials(): boolean {
    return !!(this.identity.login && this.identity.password)
  }

  /**
   * Probe for an element only rendered to signed-in users.
   */
  async isAuthenticated(driver: BrowserDriver): Promise<boolean> {
    const probe = await driver.findElement(LOGIN_SELECTORS.loggedIn, LOGGED_IN_PROBE_TIMEOUT_MS)
    return probe !== null
  }

  async isOnLoginPage(driver: BrowserDriver): Promise<boolean> {
    return (await driver.currentURL()).includes(this.loginUrl)
  }

  /**
   * Run the full login. Resolves once the session is authenticated.
   *
   * @throws ConfigurationError when the identity has no credentials
   * @throws LoginTimeoutError when a form step or the code wait times out
   */
  async login(driver: BrowserDriver): Promise<void> {
    const { login, password } = this.identity
    if (!login || !password) {
      throw new ConfigurationError(`No credentials configured for the ${this.kind} identity`)
    }

    this.log.info("Logging in")
    await driver.navigate(this.loginUrl)

    const loginInput = await driver.findElement(LOGIN_SELECTORS.login, FORM_TIMEOUT_MS)
    const passwordInput = await driver.findElement(LOGIN_SELECTORS.password, FORM_TIMEOUT_MS)
    const submit = await driver.findElement(LOGIN_SELECTORS.submit, FORM_TIMEOUT_MS)
    if (!loginInput || !passwordInput || !submit) {
      throw new LoginTimeoutError("Login form did not appear", FORM_TIMEOUT_MS)
    }

    await loginInput.sendKeys(login)
    await passwordInput.sendKeys(password)
    await this.sleep(KEY_SETTLE_MS)
    await submit.click()

    const codeInput = await driver.findElement(LOGIN_SELECTORS.code, CODE_PROMPT_TIMEOUT_MS)
    if (!codeInput) {
      if (!(await this.isOnLoginPage(driver)) && (await this.isAuthenticated(driver))) {
        this.log.info("Logged in without a code prompt")
        return
      }
      throw new LoginTimeoutError("Code prompt did not appear after submit", CODE_PROMPT_TIMEOUT_MS)
    }

    this.log.info("Code required, waiting for one to arrive")

    await this.codeBridge.awaitCode({
      deadline: this.codeBridge.now() + this.options.otpWaitMs,
      alreadyUsed: new Set<number>(),
      isSatisfied: async () => !(await this.isOnLoginPage(driver)),
      submit: async (code) => {
        await codeInput.sendKeys(code.code)
        await this.sleep(KEY_SETTLE_MS)
        const codeSubmit = await driver.findElement(LOGIN_SELECTORS.submit, FORM_TIMEOUT_MS)
        if (!codeSubmit) {
          return !(await this.isOnLoginPage(driver))
        }
        await codeSubmit.click()
        await this.sleep(CODE_SUBMIT_WAIT_MS)
        return !(await this.isOnLoginPage(driver))
      },
    })

    this.log.info("Login successful")
  }
}
