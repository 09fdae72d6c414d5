import type { Settings } from '../config/settings'
import process from 'node:process'
import { loadSettings } from '../config/settings'
import { createRuntime } from '../core/runtime'
import { UILogger } from '../utils/cli/ui'
import { errorMessage } from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'

export interface GatewayCommandOptions {
  host?: string
  port?: string
  token?: string
  email?: string
  password?: string
  upstream?: string
  defaultModel?: string
  refreshMargin?: string
  timeout?: string
  maxAttempts?: string
  credentialFile?: string
  proxy?: string
  browserPath?: string
  headed?: boolean
  config?: string
  verbose?: boolean
  debug?: boolean
}

/**
 * Translate command-line flags into settings keys; unset flags stay undefined
 */
export function settingsFromOptions(options: GatewayCommandOptions): Settings {
  return loadSettings({
    configFile: options.config,
    flags: {
      host: options.host,
      port: options.port,
      token: options.token,
      email: options.email,
      password: options.password,
      upstreamBaseUrl: options.upstream,
      defaultModel: options.defaultModel,
      refreshMarginSeconds: options.refreshMargin,
      upstreamTimeoutMs: options.timeout,
      upstreamMaxAttempts: options.maxAttempts,
      credentialFile: options.credentialFile,
      proxy: options.proxy,
      browserPath: options.browserPath,
      headless: options.headed ? false : undefined,
      verbose: options.verbose || options.debug || undefined,
      debug: options.debug,
    },
  })
}

export async function handleServeCommand(options: GatewayCommandOptions, version: string): Promise<void> {
  const ui = new UILogger(options.verbose || options.debug)

  try {
    const settings = settingsFromOptions(options)

    if (settings.debug) {
      fileLogger.enable()
      ui.info(`📝 Debug log: ${fileLogger.getLogFilePath()}`)
    }

    const runtime = await createRuntime(settings, version)

    ui.displayWelcome(version)
    ui.displayBoxedSettings(settings)

    await runtime.gateway.start(settings.port, settings.host)

    // Log in ahead of the first request when nothing usable is stored
    if (!runtime.store.isValid(settings.refreshMarginSeconds)) {
      runtime.manager.refresh().then(
        credential => ui.success(`🔑 Upstream credential ready (${credential.source})`),
        (error: unknown) => ui.warning(`⚠️ Initial credential refresh failed, will retry on first request: ${errorMessage(error)}`),
      )
    }

    const handleShutdown = (): void => {
      void (async () => {
        ui.info('\nShutting down gateway...')
        await runtime.gateway.stop()
        await runtime.store.flush()
        fileLogger.disable()
        process.exit(0)
      })()
    }

    process.on('SIGINT', handleShutdown)
    process.on('SIGTERM', handleShutdown)
  }
  catch (error) {
    ui.error(`Failed to start gateway: ${errorMessage(error)}`)
    fileLogger.logError('STARTUP', error)
    process.exit(1)
  }
}
