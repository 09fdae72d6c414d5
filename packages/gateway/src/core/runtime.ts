import type { CredentialAcquirer } from '../auth/types'
import type { Settings } from '../config/settings'
import { BrowserCredentialAcquirer, createPlaywrightLauncher } from '../auth/browser-acquirer'
import { CredentialManager } from '../auth/credential-manager'
import { CredentialStore } from '../auth/credential-store'
import { createCredential } from '../auth/jwt'
import { StaticCredentialAcquirer } from '../auth/static-acquirer'
import { requireCredentialSource } from '../config/settings'
import { ModelResolver } from '../models/resolver'
import { UPSTREAM_RETRY_POLICY } from '../utils/retry'
import { GatewayServer } from './gateway'
import { UpstreamClient } from './upstream-client'

export interface Runtime {
  settings: Settings
  store: CredentialStore
  manager: CredentialManager
  client: UpstreamClient
  resolver: ModelResolver
  gateway: GatewayServer
}

export function createAcquirer(settings: Settings): CredentialAcquirer {
  if (settings.email && settings.password) {
    return new BrowserCredentialAcquirer({
      launcher: createPlaywrightLauncher({
        headless: settings.headless,
        executablePath: settings.browserPath,
        proxy: settings.proxy,
      }),
      verbose: settings.verbose,
    })
  }
  return new StaticCredentialAcquirer(settings.token, 'preconfigured')
}

/**
 * Wire every component from settings. The store is loaded; nothing is listening yet.
 * A stored credential alone is not a credential source: it cannot be renewed.
 */
export async function createRuntime(settings: Settings, version: string, acquirer: CredentialAcquirer = createAcquirer(settings)): Promise<Runtime> {
  const store = new CredentialStore({ filePath: settings.credentialFile })
  requireCredentialSource(settings, token => store.isUsableToken(token))
  await store.load()

  // A valid stored credential wins; otherwise seed the slot with the configured token
  if (!store.isValid(settings.refreshMarginSeconds) && store.isUsableToken(settings.token)) {
    const seeded = createCredential(settings.token, 'preconfigured')
    if (seeded.expiresAt === undefined || seeded.expiresAt > Date.now()) {
      await store.set(seeded)
    }
  }

  const manager = new CredentialManager({
    store,
    acquirer,
    login: { email: settings.email, password: settings.password },
    refreshMarginSeconds: settings.refreshMarginSeconds,
    verbose: settings.verbose,
  })

  const client = new UpstreamClient({
    credentials: manager,
    baseUrl: settings.upstreamBaseUrl,
    timeoutMs: settings.upstreamTimeoutMs,
    retryPolicy: { ...UPSTREAM_RETRY_POLICY, maxAttempts: settings.upstreamMaxAttempts },
    proxyUrl: settings.proxy,
    verbose: settings.verbose,
  })

  const resolver = new ModelResolver(settings.defaultModel)

  const gateway = new GatewayServer({
    credentials: manager,
    client,
    resolver,
    version,
    verbose: settings.verbose,
    debug: settings.debug,
  })

  return { settings, store, manager, client, resolver, gateway }
}
