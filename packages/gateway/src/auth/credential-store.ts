import type { Credential } from './types'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import process from 'node:process'
import { z } from 'zod'
import { fileLogger } from '../utils/logging/file-logger'

export const DEFAULT_CREDENTIAL_FILE = path.join(os.homedir(), '.qwen-gateway', 'credential.json')
export const MIN_TOKEN_LENGTH = 100

const PLACEHOLDER_TOKENS = new Set([
  'your_token_here',
  'your-token-here',
  'your_bearer_token',
  'changeme',
  'change_me',
  'token',
  'none',
  'null',
])

const credentialSchema = z.object({
  token: z.string().min(1),
  acquiredAt: z.number(),
  expiresAt: z.number().optional(),
  source: z.enum(['extracted', 'manual', 'preconfigured']),
})

export interface CredentialStoreOptions {
  filePath?: string
  minTokenLength?: number
  now?: () => number
}

export interface CredentialStatus {
  present: boolean
  valid: boolean
  source?: Credential['source']
  acquiredAt?: number
  expiresAt?: number
  filePath: string
}

/**
 * Holder of the single current credential. Reads are plain slot reads; persistence
 * happens on a serialized write chain so concurrent `set` calls never interleave on disk.
 */
export class CredentialStore {
  private current: Credential | null = null
  private writeChain: Promise<void> = Promise.resolve()
  private readonly filePath: string
  private readonly minTokenLength: number
  private readonly now: () => number

  constructor(options: CredentialStoreOptions = {}) {
    this.filePath = options.filePath ?? DEFAULT_CREDENTIAL_FILE
    this.minTokenLength = options.minTokenLength ?? MIN_TOKEN_LENGTH
    this.now = options.now ?? Date.now
  }

  /**
   * Load the persisted record into the slot. A missing or malformed file leaves the slot empty.
   */
  async load(): Promise<Credential | null> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8')
    }
    catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    }
    catch {
      fileLogger.warn('CREDENTIAL_STORE', `Ignoring malformed credential file ${this.filePath}`)
      return null
    }

    const parsed = credentialSchema.safeParse(json)
    if (!parsed.success) {
      fileLogger.warn('CREDENTIAL_STORE', `Ignoring credential file with unexpected shape ${this.filePath}`, parsed.error.issues)
      return null
    }

    this.current = parsed.data
    return this.current
  }

  get(): Credential | null {
    return this.current
  }

  /**
   * Replace the credential. The slot changes immediately; the returned promise settles
   * once the record is on disk.
   */
  set(credential: Credential): Promise<void> {
    this.current = credential
    return this.enqueue(() => this.persist(credential))
  }

  invalidate(): Promise<void> {
    this.current = null
    return this.enqueue(() => this.remove())
  }

  /**
   * Drop the in-memory credential only if it still holds `token`
   */
  invalidateIfCurrent(token: string): boolean {
    if (this.current?.token !== token) {
      return false
    }
    this.current = null
    return true
  }

  isValid(marginSeconds: number = 0): boolean {
    const credential = this.current
    if (!credential || !this.isUsableToken(credential.token)) {
      return false
    }
    if (credential.expiresAt === undefined) {
      return true
    }
    return this.now() + marginSeconds * 1000 < credential.expiresAt
  }

  isExpired(credential: Credential): boolean {
    return credential.expiresAt !== undefined && credential.expiresAt <= this.now()
  }

  isUsableToken(token: string | undefined): token is string {
    if (!token) {
      return false
    }
    const trimmed = token.trim()
    if (PLACEHOLDER_TOKENS.has(trimmed.toLowerCase()) || /^<.*>$/.test(trimmed)) {
      return false
    }
    return trimmed.length >= this.minTokenLength
  }

  status(marginSeconds: number = 0): CredentialStatus {
    const credential = this.current
    return {
      present: credential !== null,
      valid: this.isValid(marginSeconds),
      source: credential?.source,
      acquiredAt: credential?.acquiredAt,
      expiresAt: credential?.expiresAt,
      filePath: this.filePath,
    }
  }

  getFilePath(): string {
    return this.filePath
  }

  /**
   * Resolves once every queued write has completed
   */
  flush(): Promise<void> {
    return this.writeChain
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(operation)
    // Keep the chain alive for later writes; the caller still sees the rejection
    this.writeChain = next.catch((error: unknown) => {
      fileLogger.logError('CREDENTIAL_STORE', error, { filePath: this.filePath })
    })
    return next
  }

  private async persist(credential: Credential): Promise<void> {
    const dir = path.dirname(this.filePath)
    await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 })

    const tmpFile = `${this.filePath}.${process.pid}.tmp`
    await fs.promises.writeFile(tmpFile, JSON.stringify(credential, null, 2), { encoding: 'utf-8', mode: 0o600 })
    await fs.promises.rename(tmpFile, this.filePath)
    // a stale tmp file from an earlier run keeps its old mode
    await fs.promises.chmod(this.filePath, 0o600)

    fileLogger.info('CREDENTIAL_STORE', `Persisted ${credential.source} credential`, {
      filePath: this.filePath,
      expiresAt: credential.expiresAt,
    })
  }

  private async remove(): Promise<void> {
    try {
      await fs.promises.unlink(this.filePath)
    }
    catch (error) {
      if (!isNotFound(error)) {
        throw error
      }
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
