import type { BrowserCookie, LoginPage, LoginSession } from '../../src/auth/browser-acquirer'
import { describe, expect, it, vi } from 'vitest'
import {
  BrowserCredentialAcquirer,
  findToken,
  HOME_URL,
  LOGIN_URL,
} from '../../src/auth/browser-acquirer'
import { AuthenticationError } from '../../src/utils/errors'
import { makeJwt, nowSeconds } from '../helpers/tokens'

interface FakePageOptions {
  visible?: string[]
  gotoFails?: string
  staysOnLogin?: boolean
  local?: Array<Record<string, string>>
  session?: Record<string, string>
  cookies?: BrowserCookie[]
  clickError?: Error
  findError?: Error
  failedStorageReads?: number
}

class FakeLoginPage implements LoginPage {
  readonly filled: Record<string, string> = {}
  readonly clicked: string[] = []
  readonly visited: string[] = []
  storageReads = 0

  constructor(private readonly options: FakePageOptions = {}) {}

  async goto(url: string): Promise<void> {
    if (this.options.gotoFails === url) {
      throw new Error('Timeout 30000ms exceeded')
    }
    this.visited.push(url)
  }

  async findFirst(selectors: readonly string[]): Promise<string | undefined> {
    if (this.options.findError) {
      throw this.options.findError
    }
    const visible = this.options.visible ?? ['input[type="email"]', 'input[type="password"]', 'button[type="submit"]']
    return selectors.find(selector => visible.includes(selector))
  }

  async fill(selector: string, value: string): Promise<void> {
    this.filled[selector] = value
  }

  async click(selector: string): Promise<void> {
    if (this.options.clickError) {
      throw this.options.clickError
    }
    this.clicked.push(selector)
  }

  async waitForUrl(predicate: (url: URL) => boolean): Promise<void> {
    const url = new URL(this.options.staysOnLogin ? LOGIN_URL : `${HOME_URL}/c/new-chat`)
    if (!predicate(url)) {
      throw new Error('Timeout 20000ms exceeded')
    }
  }

  async readStorage(kind: 'local' | 'session'): Promise<Record<string, string>> {
    if (kind === 'session') {
      return this.options.session ?? {}
    }
    if (this.storageReads < (this.options.failedStorageReads ?? 0)) {
      this.storageReads++
      throw new Error('Execution context was destroyed, most likely because of a navigation')
    }
    const snapshots = this.options.local ?? [{}]
    const snapshot = snapshots[Math.min(this.storageReads, snapshots.length - 1)] ?? {}
    this.storageReads++
    return snapshot
  }

  async cookies(): Promise<BrowserCookie[]> {
    return this.options.cookies ?? []
  }
}

function createAcquirer(page: FakeLoginPage, close = vi.fn(async () => {})): BrowserCredentialAcquirer {
  const session: LoginSession = { page, close }
  return new BrowserCredentialAcquirer({
    launcher: async () => session,
    sleep: async () => {},
    timeouts: { tokenPoll: { maxAttempts: 3, initialDelayMs: 1, backoffFactor: 1 } },
  })
}

const login = { email: 'user@example.com', password: 'test-secret' }

async function expectFailure(promise: Promise<unknown>, reason: AuthenticationError['reason']): Promise<void> {
  const error: unknown = await promise.catch((e: unknown) => e)
  expect(error).toBeInstanceOf(AuthenticationError)
  if (error instanceof AuthenticationError) {
    expect(error.reason).toBe(reason)
  }
}

describe('browserCredentialAcquirer', () => {
  it('should log in and extract the token from local storage', async () => {
    const exp = nowSeconds() + 3600
    const token = makeJwt(exp)
    const page = new FakeLoginPage({ local: [{ web_api_token: token }] })
    const close = vi.fn(async () => {})

    const credential = await createAcquirer(page, close).acquire(login)

    expect(credential.token).toBe(token)
    expect(credential.source).toBe('extracted')
    expect(credential.expiresAt).toBe(exp * 1000)
    expect(page.visited).toEqual([LOGIN_URL, HOME_URL])
    expect(page.filled).toEqual({
      'input[type="email"]': 'user@example.com',
      'input[type="password"]': 'test-secret',
    })
    expect(page.clicked).toEqual(['button[type="submit"]'])
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('should use fallback selectors when the primary ones are missing', async () => {
    const page = new FakeLoginPage({
      visible: ['input[name="username"]', 'input[name="password"]', 'button:has-text("Continue")'],
      local: [{ token: makeJwt() }],
    })

    await createAcquirer(page).acquire(login)

    expect(Object.keys(page.filled)).toEqual(['input[name="username"]', 'input[name="password"]'])
    expect(page.clicked).toEqual(['button:has-text("Continue")'])
  })

  it('should keep polling until the token appears', async () => {
    const token = makeJwt()
    const page = new FakeLoginPage({ local: [{}, {}, { access_token: token }] })

    const credential = await createAcquirer(page).acquire(login)

    expect(credential.token).toBe(token)
    expect(page.storageReads).toBe(3)
  })

  it('should retry the token poll when reading storage fails mid-navigation', async () => {
    const token = makeJwt()
    const page = new FakeLoginPage({ failedStorageReads: 1, local: [{ web_api_token: token }] })

    const credential = await createAcquirer(page).acquire(login)

    expect(credential.token).toBe(token)
    expect(page.storageReads).toBe(2)
  })

  it('should fail with login_timeout when the submit click times out', async () => {
    const close = vi.fn(async () => {})
    const page = new FakeLoginPage({ clickError: new Error('locator.click: Timeout 10000ms exceeded') })

    await expectFailure(createAcquirer(page, close).acquire(login), 'login_timeout')
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('should report any other browser failure as browser_unavailable', async () => {
    const page = new FakeLoginPage({ findError: new Error('Target page, context or browser has been closed') })
    const error: unknown = await createAcquirer(page).acquire(login).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AuthenticationError)
    if (error instanceof AuthenticationError) {
      expect(error.reason).toBe('browser_unavailable')
      expect(error.statusCode).toBe(503)
      expect(error.message).toBe('Browser login failed: Target page, context or browser has been closed')
    }
  })

  it('should fail with missing_credentials when the password is absent', async () => {
    const page = new FakeLoginPage()
    await expectFailure(createAcquirer(page).acquire({ email: 'user@example.com' }), 'missing_credentials')
    expect(page.visited).toEqual([])
  })

  it('should fail with navigation_timeout when the sign-in page does not load', async () => {
    const close = vi.fn(async () => {})
    await expectFailure(createAcquirer(new FakeLoginPage({ gotoFails: LOGIN_URL }), close).acquire(login), 'navigation_timeout')
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('should fail with form_not_found when no email field matches', async () => {
    const page = new FakeLoginPage({ visible: ['input[type="password"]'] })
    await expectFailure(createAcquirer(page).acquire(login), 'form_not_found')
  })

  it('should fail with login_timeout when the page stays on sign-in', async () => {
    const page = new FakeLoginPage({ staysOnLogin: true })
    await expectFailure(createAcquirer(page).acquire(login), 'login_timeout')
  })

  it('should fail with token_not_found after the bounded poll', async () => {
    const page = new FakeLoginPage({ local: [{ unrelated: 'value' }] })
    await expectFailure(createAcquirer(page).acquire(login), 'token_not_found')
    expect(page.storageReads).toBe(3)
  })

  it('should fail with browser_unavailable when the launcher throws', async () => {
    const acquirer = new BrowserCredentialAcquirer({
      launcher: async () => {
        throw new Error('Executable doesn\'t exist')
      },
    })
    await expectFailure(acquirer.acquire(login), 'browser_unavailable')
  })

  it('should run browser sessions one at a time', async () => {
    let active = 0
    let maxActive = 0
    const launcher = async (): Promise<LoginSession> => {
      active++
      maxActive = Math.max(maxActive, active)
      return {
        page: new FakeLoginPage({ local: [{ web_api_token: makeJwt() }] }),
        close: async () => {
          active--
        },
      }
    }
    const acquirer = new BrowserCredentialAcquirer({ launcher, sleep: async () => {} })

    await Promise.all([acquirer.acquire(login), acquirer.acquire(login), acquirer.acquire(login)])
    expect(maxActive).toBe(1)
  })
})

describe('findToken', () => {
  const jwt = makeJwt()

  it('should prefer the well-known keys in order', () => {
    const other = makeJwt(undefined, 'other-user')
    expect(findToken({ token: other, web_api_token: jwt }, {}, [])).toBe(jwt)
  })

  it('should fall back to any JWT-shaped local storage value', () => {
    expect(findToken({ 'app:session': jwt }, {}, [])).toBe(jwt)
  })

  it('should fall back to token cookies and then session storage', () => {
    expect(findToken({}, {}, [{ name: 'auth_token', value: jwt }])).toBe(jwt)
    expect(findToken({}, { s: jwt }, [])).toBe(jwt)
  })

  it('should ignore values shorter than the minimum length', () => {
    expect(findToken({ web_api_token: 'abc.def.ghi' }, {}, [])).toBeUndefined()
  })
})
