import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadSettings, requireCredentialSource } from '../../src/config/settings'
import { ConfigurationError } from '../../src/utils/errors'

describe('settings', () => {
  let dir: string
  let configFile: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qwen-gateway-settings-'))
    configFile = path.join(dir, 'config.json')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should apply defaults', () => {
    const settings = loadSettings({ env: {}, configFile })

    expect(settings).toMatchObject({
      host: '0.0.0.0',
      port: 7050,
      upstreamBaseUrl: 'https://qwen.aikit.club/v1',
      defaultModel: 'qwen3-max',
      refreshMarginSeconds: 300,
      upstreamTimeoutMs: 60000,
      upstreamMaxAttempts: 3,
      headless: true,
      verbose: false,
      debug: false,
    })
    expect(settings.token).toBeUndefined()
  })

  it('should let the environment override the config file and flags override both', () => {
    fs.writeFileSync(configFile, JSON.stringify({ port: 8000, host: '127.0.0.1', defaultModel: 'qwen3-coder-plus' }))

    const settings = loadSettings({
      configFile,
      env: { PORT: '9000', QWEN_EMAIL: 'user@example.com', QWEN_PASSWORD: 'test-secret' },
      flags: { port: '9100', email: undefined },
    })

    expect(settings.port).toBe(9100)
    expect(settings.host).toBe('127.0.0.1')
    expect(settings.defaultModel).toBe('qwen3-coder-plus')
    expect(settings.email).toBe('user@example.com')
    expect(settings.password).toBe('test-secret')
  })

  it('should ignore empty environment values', () => {
    const settings = loadSettings({ env: { PORT: '', QWEN_BEARER_TOKEN: '  ' }, configFile })

    expect(settings.port).toBe(7050)
    expect(settings.token).toBeUndefined()
  })

  it('should read booleans from strings', () => {
    expect(loadSettings({ env: { QWEN_HEADLESS: 'false' }, configFile }).headless).toBe(false)
    expect(loadSettings({ env: { QWEN_HEADLESS: 'true' }, configFile }).headless).toBe(true)
  })

  it('should reject invalid values', () => {
    expect(() => loadSettings({ env: { PORT: 'not-a-port' }, configFile })).toThrow(ConfigurationError)
    expect(() => loadSettings({ env: { QWEN_API_BASE: 'nope' }, configFile })).toThrow(/upstreamBaseUrl/)
  })

  it('should reject a config file that is not JSON', () => {
    fs.writeFileSync(configFile, '{ broken')

    expect(() => loadSettings({ env: {}, configFile })).toThrow(ConfigurationError)
  })

  it('should require a token or a login', () => {
    const isUsable = (token: string | undefined): boolean => Boolean(token && token.length >= 100)

    expect(() => requireCredentialSource(loadSettings({ env: {}, configFile }), isUsable)).toThrow(ConfigurationError)
    expect(() => requireCredentialSource(loadSettings({ env: { QWEN_BEARER_TOKEN: 'short' }, configFile }), isUsable))
      .toThrow(/does not look like a session token/)
    expect(() => requireCredentialSource(loadSettings({ env: { QWEN_BEARER_TOKEN: 'a'.repeat(120) }, configFile }), isUsable))
      .not
      .toThrow()
    expect(() => requireCredentialSource(
      loadSettings({ env: { QWEN_EMAIL: 'user@example.com', QWEN_PASSWORD: 'test-secret' }, configFile }),
      isUsable,
    )).not.toThrow()
  })
})
