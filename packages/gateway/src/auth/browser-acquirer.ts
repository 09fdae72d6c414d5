import type { BrowserContext, Page } from 'playwright-core'
import type { AuthenticationFailure } from '../utils/errors'
import type { RetryPolicy } from '../utils/retry'
import type { Credential, CredentialAcquirer, LoginCredentials } from './types'
import { chromium } from 'playwright-core'
import { z } from 'zod'
import { UILogger } from '../utils/cli/ui'
import { AuthenticationError, errorMessage } from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'
import { poll, TOKEN_POLL_POLICY } from '../utils/retry'
import { MIN_TOKEN_LENGTH } from './credential-store'
import { createCredential } from './jwt'

export const LOGIN_URL = 'https://chat.qwen.ai/auth?action=signin'
export const HOME_URL = 'https://chat.qwen.ai'

export const EMAIL_SELECTORS = [
  'input[type="email"]',
  'input[name="email"]',
  'input[placeholder*="email" i]',
  'input[name="username"]',
  'input[type="text"]',
] as const

export const PASSWORD_SELECTORS = [
  'input[type="password"]',
  'input[name="password"]',
] as const

export const SUBMIT_SELECTORS = [
  'button[type="submit"]',
  'button:has-text("Log in")',
  'button:has-text("Sign in")',
  'button:has-text("Continue")',
] as const

// localStorage keys the web app has used for its session token, most recent first
export const TOKEN_STORAGE_KEYS = ['web_api_token', 'token', 'access_token'] as const

export interface LoginTimeouts {
  navigationMs: number
  formMs: number
  postLoginMs: number
  tokenPoll: RetryPolicy
}

export const DEFAULT_LOGIN_TIMEOUTS: LoginTimeouts = {
  navigationMs: 30000,
  formMs: 10000,
  postLoginMs: 20000,
  tokenPoll: TOKEN_POLL_POLICY,
}

export interface BrowserCookie {
  name: string
  value: string
}

/**
 * The handful of page operations the login flow needs. Every call is bounded by the
 * timeout it receives.
 */
export interface LoginPage {
  goto: (url: string, timeoutMs: number) => Promise<void>
  /** First selector from `selectors` with a visible match, in list order */
  findFirst: (selectors: readonly string[], timeoutMs: number) => Promise<string | undefined>
  fill: (selector: string, value: string) => Promise<void>
  click: (selector: string, timeoutMs: number) => Promise<void>
  waitForUrl: (predicate: (url: URL) => boolean, timeoutMs: number) => Promise<void>
  readStorage: (kind: 'local' | 'session') => Promise<Record<string, string>>
  cookies: () => Promise<BrowserCookie[]>
}

export interface LoginSession {
  page: LoginPage
  close: () => Promise<void>
}

export type BrowserLauncher = () => Promise<LoginSession>

export interface BrowserAcquirerOptions {
  launcher?: BrowserLauncher
  timeouts?: Partial<LoginTimeouts>
  minTokenLength?: number
  sleep?: (ms: number) => Promise<void>
  verbose?: boolean
}

export interface PlaywrightLaunchOptions {
  headless?: boolean
  executablePath?: string
  channel?: string
  proxy?: string
}

const storageSchema = z.record(z.string())

function looksLikeJwt(value: string): boolean {
  return value.split('.').length === 3
}

/**
 * Pick the session token out of what the browser holds, trying well-known keys first
 */
export function findToken(
  local: Record<string, string>,
  session: Record<string, string>,
  cookies: BrowserCookie[],
  minLength: number = MIN_TOKEN_LENGTH,
): string | undefined {
  const usable = (value: string | undefined): value is string => value !== undefined && value.length >= minLength

  for (const key of TOKEN_STORAGE_KEYS) {
    const value = local[key]
    if (usable(value)) {
      return value
    }
  }

  const fromLocal = Object.values(local).find(value => usable(value) && looksLikeJwt(value))
  if (fromLocal) {
    return fromLocal
  }

  const cookie = cookies.find(c => c.name.toLowerCase().includes('token') && usable(c.value))
  if (cookie) {
    return cookie.value
  }

  return Object.values(session).find(value => usable(value) && looksLikeJwt(value))
}

/**
 * Launch Chromium through playwright-core. No browser is bundled: it uses the binary
 * at `executablePath`, or an installed channel such as `chrome`.
 */
export function createPlaywrightLauncher(options: PlaywrightLaunchOptions = {}): BrowserLauncher {
  return async () => {
    const browser = await chromium.launch({
      headless: options.headless ?? true,
      executablePath: options.executablePath,
      channel: options.executablePath ? undefined : (options.channel ?? 'chrome'),
      proxy: options.proxy ? { server: options.proxy } : undefined,
    })
    let context: BrowserContext
    let page: Page
    try {
      context = await browser.newContext()
      page = await context.newPage()
    }
    catch (error) {
      await browser.close().catch((closeError: unknown) => {
        fileLogger.logError('BROWSER_LOGIN', closeError, { phase: 'close' })
      })
      throw error
    }

    const loginPage: LoginPage = {
      async goto(url, timeoutMs) {
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs })
      },
      async findFirst(selectors, timeoutMs) {
        try {
          await page.locator(selectors.join(', ')).first().waitFor({ state: 'visible', timeout: timeoutMs })
        }
        catch {
          return undefined
        }
        for (const selector of selectors) {
          if (await page.locator(selector).first().isVisible()) {
            return selector
          }
        }
        return undefined
      },
      async fill(selector, value) {
        await page.locator(selector).first().fill(value)
      },
      async click(selector, timeoutMs) {
        await page.locator(selector).first().click({ timeout: timeoutMs })
      },
      async waitForUrl(predicate, timeoutMs) {
        await page.waitForURL(predicate, { timeout: timeoutMs })
      },
      async readStorage(kind) {
        const raw = await page.evaluate<unknown>(`(() => {
          const store = ${kind === 'local' ? 'window.localStorage' : 'window.sessionStorage'};
          const out = {};
          for (let i = 0; i < store.length; i++) {
            const key = store.key(i);
            if (key !== null) out[key] = store.getItem(key) ?? '';
          }
          return out;
        })()`)
        const parsed = storageSchema.safeParse(raw)
        return parsed.success ? parsed.data : {}
      },
      async cookies() {
        const all = await context.cookies()
        return all.map(c => ({ name: c.name, value: c.value }))
      },
    }

    return {
      page: loginPage,
      close: () => browser.close(),
    }
  }
}

/**
 * Logs into the upstream web app with a headless browser and lifts the session token
 * out of local storage. Sessions run one at a time.
 */
export class BrowserCredentialAcquirer implements CredentialAcquirer {
  private queue: Promise<unknown> = Promise.resolve()
  private readonly launcher: BrowserLauncher
  private readonly timeouts: LoginTimeouts
  private readonly minTokenLength: number
  private readonly sleep?: (ms: number) => Promise<void>
  private readonly ui: UILogger

  constructor(options: BrowserAcquirerOptions = {}) {
    this.launcher = options.launcher ?? createPlaywrightLauncher()
    this.timeouts = { ...DEFAULT_LOGIN_TIMEOUTS, ...options.timeouts }
    this.minTokenLength = options.minTokenLength ?? MIN_TOKEN_LENGTH
    this.sleep = options.sleep
    this.ui = new UILogger(options.verbose)
  }

  acquire(login: LoginCredentials): Promise<Credential> {
    const run = this.queue.then(() => this.login(login))
    this.queue = run.catch(() => undefined)
    return run
  }

  private async login({ email, password }: LoginCredentials): Promise<Credential> {
    if (!email || !password) {
      throw new AuthenticationError('missing_credentials', 'Browser login needs both an email and a password')
    }

    let session: LoginSession
    try {
      session = await this.launcher()
    }
    catch (error) {
      throw new AuthenticationError('browser_unavailable', `Could not launch browser: ${errorMessage(error)}`, { cause: error })
    }

    try {
      const token = await this.runFlow(session.page, email, password)
      return createCredential(token, 'extracted')
    }
    catch (error) {
      if (error instanceof AuthenticationError) {
        throw error
      }
      throw new AuthenticationError('browser_unavailable', `Browser login failed: ${errorMessage(error)}`, { cause: error })
    }
    finally {
      await session.close().catch((error: unknown) => {
        fileLogger.logError('BROWSER_LOGIN', error, { phase: 'close' })
      })
    }
  }

  private async runFlow(page: LoginPage, email: string, password: string): Promise<string> {
    const { navigationMs, formMs, postLoginMs } = this.timeouts

    this.ui.verbose('🌐 Opening upstream sign-in page...')
    await this.step('navigation_timeout', `Sign-in page did not load within ${navigationMs}ms`, () => page.goto(LOGIN_URL, navigationMs))

    const emailSelector = await page.findFirst(EMAIL_SELECTORS, formMs)
    if (!emailSelector) {
      throw new AuthenticationError('form_not_found', 'Email field not found on the sign-in page')
    }
    await this.step('form_not_found', 'Could not fill the email field', () => page.fill(emailSelector, email))

    const passwordSelector = await page.findFirst(PASSWORD_SELECTORS, formMs)
    if (!passwordSelector) {
      throw new AuthenticationError('form_not_found', 'Password field not found on the sign-in page')
    }
    await this.step('form_not_found', 'Could not fill the password field', () => page.fill(passwordSelector, password))

    const submitSelector = await page.findFirst(SUBMIT_SELECTORS, formMs)
    if (!submitSelector) {
      throw new AuthenticationError('form_not_found', 'Submit button not found on the sign-in page')
    }
    fileLogger.debug('BROWSER_LOGIN', 'Submitting sign-in form', { emailSelector, passwordSelector, submitSelector })
    await this.step('login_timeout', `Submit button could not be clicked within ${formMs}ms`, () => page.click(submitSelector, formMs))

    this.ui.verbose('⏳ Waiting for sign-in to complete...')
    await this.step(
      'login_timeout',
      `Still on the sign-in page after ${postLoginMs}ms`,
      () => page.waitForUrl(url => !url.href.includes('auth?action=signin'), postLoginMs),
    )

    await this.step('navigation_timeout', `Home page did not load within ${navigationMs}ms`, () => page.goto(HOME_URL, navigationMs))

    // Storage reads can fail while the page is still navigating; the next attempt retries them
    const token = await poll(async (attempt) => {
      try {
        const [local, session, cookies] = await Promise.all([
          page.readStorage('local'),
          page.readStorage('session'),
          page.cookies(),
        ])
        return findToken(local, session, cookies, this.minTokenLength)
      }
      catch (error) {
        this.ui.verbose(`Could not read browser storage (attempt ${attempt}): ${errorMessage(error)}`)
        fileLogger.logError('BROWSER_LOGIN', error, { phase: 'token_poll', attempt })
        return undefined
      }
    }, this.timeouts.tokenPoll, this.sleep ? { sleep: this.sleep } : {})

    if (!token) {
      throw new AuthenticationError(
        'token_not_found',
        `No session token appeared in browser storage after ${this.timeouts.tokenPoll.maxAttempts} attempts`,
      )
    }

    this.ui.verbose(`✅ Session token extracted (${token.length} chars)`)
    return token
  }

  private async step(reason: AuthenticationFailure, message: string, action: () => Promise<void>): Promise<void> {
    try {
      await action()
    }
    catch (error) {
      throw new AuthenticationError(reason, message, { cause: error })
    }
  }
}
