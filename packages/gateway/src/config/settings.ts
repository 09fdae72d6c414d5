import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'
import { z } from 'zod'
import { DEFAULT_CREDENTIAL_FILE } from '../auth/credential-store'
import { DEFAULT_UPSTREAM_BASE_URL } from '../core/upstream-client'
import { DEFAULT_MODEL } from '../models/resolver'
import { ConfigurationError } from '../utils/errors'

export const CONFIG_DIR = path.join(os.homedir(), '.qwen-gateway')
export const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')

const FALSY = ['false', '0', 'no', 'off']

const booleanish = z.preprocess(
  value => typeof value === 'string' ? !FALSY.includes(value.trim().toLowerCase()) : value,
  z.boolean(),
)

export const settingsSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(7050),
  token: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  upstreamBaseUrl: z.string().url().default(DEFAULT_UPSTREAM_BASE_URL),
  defaultModel: z.string().min(1).default(DEFAULT_MODEL),
  refreshMarginSeconds: z.coerce.number().int().min(0).default(300),
  upstreamTimeoutMs: z.coerce.number().int().positive().default(60000),
  upstreamMaxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  credentialFile: z.string().min(1).default(DEFAULT_CREDENTIAL_FILE),
  proxy: z.string().url().optional(),
  browserPath: z.string().min(1).optional(),
  headless: booleanish.default(true),
  verbose: booleanish.default(false),
  debug: booleanish.default(false),
})

export type Settings = z.infer<typeof settingsSchema>
export type SettingsInput = z.input<typeof settingsSchema>

/**
 * Environment variable for each setting that can be taken from the environment
 */
export const ENV_KEYS = {
  host: 'HOST',
  port: 'PORT',
  token: 'QWEN_BEARER_TOKEN',
  email: 'QWEN_EMAIL',
  password: 'QWEN_PASSWORD',
  upstreamBaseUrl: 'QWEN_API_BASE',
  defaultModel: 'DEFAULT_MODEL',
  refreshMarginSeconds: 'REFRESH_MARGIN_SECONDS',
  upstreamTimeoutMs: 'UPSTREAM_TIMEOUT_MS',
  upstreamMaxAttempts: 'UPSTREAM_MAX_ATTEMPTS',
  credentialFile: 'QWEN_CREDENTIAL_FILE',
  proxy: 'HTTPS_PROXY',
  browserPath: 'QWEN_BROWSER_PATH',
  headless: 'QWEN_HEADLESS',
} as const satisfies Partial<Record<keyof Settings, string>>

export interface LoadSettingsOptions {
  flags?: Partial<Record<keyof Settings, unknown>>
  env?: NodeJS.ProcessEnv
  configFile?: string
}

const fileSchema = z.record(z.unknown())

function readConfigFile(configFile: string): Record<string, unknown> {
  if (!fs.existsSync(configFile)) {
    return {}
  }

  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(configFile, 'utf-8'))
  }
  catch (error) {
    throw new ConfigurationError(`Could not parse ${configFile}: ${error instanceof Error ? error.message : 'Unknown error'}`)
  }

  const parsed = fileSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigurationError(`${configFile} must contain a JSON object`)
  }
  return parsed.data
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {}
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim()
    if (value) {
      values[key] = value
    }
  }
  return values
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
}

/**
 * Merge defaults, the config file, the environment and command-line flags, later sources winning
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const configFile = options.configFile ?? CONFIG_FILE
  const merged = {
    ...readConfigFile(configFile),
    ...fromEnv(options.env ?? process.env),
    ...definedOnly(options.flags ?? {}),
  }

  const parsed = settingsSchema.safeParse(merged)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

/**
 * Serving needs either a usable static token or a login to acquire one with
 */
export function requireCredentialSource(settings: Settings, isUsableToken: (token: string | undefined) => boolean): void {
  const hasLogin = Boolean(settings.email && settings.password)
  if (hasLogin || isUsableToken(settings.token)) {
    return
  }
  if (settings.token) {
    throw new ConfigurationError(`${ENV_KEYS.token} does not look like a session token and no ${ENV_KEYS.email}/${ENV_KEYS.password} are set`)
  }
  throw new ConfigurationError(`Set ${ENV_KEYS.token}, or both ${ENV_KEYS.email} and ${ENV_KEYS.password}`)
}
