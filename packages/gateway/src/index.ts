export { BrowserCredentialAcquirer, createPlaywrightLauncher, findToken } from './auth/browser-acquirer'
export type { BrowserLauncher, LoginPage, LoginSession } from './auth/browser-acquirer'
export { CredentialManager } from './auth/credential-manager'
export { CredentialStore } from './auth/credential-store'
export { createCredential, decodeJwtExpiry } from './auth/jwt'
export { StaticCredentialAcquirer } from './auth/static-acquirer'
export type { Credential, CredentialAcquirer, LoginCredentials } from './auth/types'
export { loadSettings, requireCredentialSource } from './config/settings'
export type { Settings } from './config/settings'
export { GatewayServer } from './core/gateway'
export { createRuntime } from './core/runtime'
export { UpstreamClient } from './core/upstream-client'
export { ModelResolver } from './models/resolver'
export * from './types/openai'
export * from './utils/errors'
