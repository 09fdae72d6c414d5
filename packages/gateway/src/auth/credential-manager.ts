import type { CredentialStatus, CredentialStore } from './credential-store'
import type { Credential, CredentialAcquirer, LoginCredentials } from './types'
import { UILogger } from '../utils/cli/ui'
import { AuthenticationError, errorMessage } from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'

export interface CredentialManagerOptions {
  store: CredentialStore
  acquirer: CredentialAcquirer
  login: LoginCredentials
  /** Refresh this many seconds before a known expiry */
  refreshMarginSeconds?: number
  verbose?: boolean
}

/**
 * Coordinates refreshes so that at most one acquisition runs at a time. Every caller
 * arriving while one is in flight waits on the same promise and sees the same outcome.
 */
export class CredentialManager {
  private inflight: Promise<Credential> | null = null
  private refreshCount = 0
  private readonly store: CredentialStore
  private readonly acquirer: CredentialAcquirer
  private readonly login: LoginCredentials
  private readonly marginSeconds: number
  private readonly ui: UILogger

  constructor(options: CredentialManagerOptions) {
    this.store = options.store
    this.acquirer = options.acquirer
    this.login = options.login
    this.marginSeconds = options.refreshMarginSeconds ?? 300
    this.ui = new UILogger(options.verbose)
  }

  /**
   * Return a credential that is valid for at least the refresh margin, refreshing if needed
   */
  async ensureValid(): Promise<Credential> {
    const current = this.store.get()
    if (current && this.store.isValid(this.marginSeconds)) {
      return current
    }
    return this.refresh()
  }

  /**
   * Start a refresh, or join the one already running
   */
  refresh(): Promise<Credential> {
    if (!this.inflight) {
      this.inflight = this.runRefresh().finally(() => {
        this.inflight = null
      })
    }
    return this.inflight
  }

  /**
   * Called after the upstream rejected `rejectedToken`. If another caller already
   * replaced it, the replacement is returned without a new acquisition.
   */
  async invalidateAndRefresh(rejectedToken: string): Promise<Credential> {
    if (this.inflight) {
      return this.inflight
    }

    const current = this.store.get()
    if (current && current.token !== rejectedToken && this.store.isValid(this.marginSeconds)) {
      return current
    }

    this.store.invalidateIfCurrent(rejectedToken)
    fileLogger.warn('CREDENTIAL', 'Upstream rejected the current credential, refreshing')
    return this.refresh()
  }

  isRefreshing(): boolean {
    return this.inflight !== null
  }

  getRefreshCount(): number {
    return this.refreshCount
  }

  /**
   * Slot state judged against the refresh margin. Reads memory only.
   */
  status(): CredentialStatus {
    return this.store.status(this.marginSeconds)
  }

  private async runRefresh(): Promise<Credential> {
    this.refreshCount++
    const startedAt = Date.now()
    this.ui.verbose('🔑 Acquiring a fresh upstream credential...')
    fileLogger.info('CREDENTIAL', 'Refresh started', { attempt: this.refreshCount })

    let credential: Credential
    try {
      credential = this.accept(await this.acquirer.acquire(this.login))
    }
    catch (error) {
      fileLogger.logError('CREDENTIAL', error, { phase: 'acquire' })
      this.ui.error(`❌ Credential refresh failed: ${errorMessage(error)}`)
      throw error
    }

    try {
      await this.store.set(credential)
    }
    catch (error) {
      // The slot already holds the new credential; only the on-disk copy is stale
      this.ui.warning(`⚠️ Could not persist credential: ${errorMessage(error)}`)
    }

    this.ui.verbose(`✅ Credential refreshed in ${Date.now() - startedAt}ms`)
    fileLogger.info('CREDENTIAL', 'Refresh finished', {
      source: credential.source,
      expiresAt: credential.expiresAt,
      durationMs: Date.now() - startedAt,
    })
    return credential
  }

  private accept(credential: Credential): Credential {
    if (!this.store.isUsableToken(credential.token)) {
      throw new AuthenticationError('token_not_found', 'Acquired credential is not a usable session token')
    }
    if (this.store.isExpired(credential)) {
      throw new AuthenticationError('token_expired', 'Acquired credential has already expired')
    }
    return credential
  }
}
