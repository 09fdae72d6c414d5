import type { GatewayCommandOptions } from './serve'
import process from 'node:process'
import dayjs from 'dayjs'
import relativeTime from 'dayjs/plugin/relativeTime'
import inquirer from 'inquirer'
import { CredentialStore } from '../auth/credential-store'
import { createAcquirer } from '../core/runtime'
import { UILogger } from '../utils/cli/ui'
import { AuthenticationError, errorMessage } from '../utils/errors'
import { fileLogger } from '../utils/logging/file-logger'
import { settingsFromOptions } from './serve'

dayjs.extend(relativeTime)

// eslint-disable-next-line ts/consistent-type-definitions
type LoginAnswers = {
  email?: string
  password?: string
}

/**
 * Run a browser login now and store the result
 */
export async function handleLoginCommand(options: GatewayCommandOptions): Promise<void> {
  const ui = new UILogger(options.verbose)

  try {
    const settings = settingsFromOptions(options)
    if (settings.debug) {
      fileLogger.enable()
    }

    const answers = await inquirer.prompt<LoginAnswers>([
      {
        type: 'input',
        name: 'email',
        message: 'Qwen account email:',
        when: () => !settings.email,
        validate: (input: string) => input.trim() ? true : 'Email is required',
      },
      {
        type: 'password',
        name: 'password',
        message: 'Password:',
        mask: '*',
        when: () => !settings.password,
        validate: (input: string) => input ? true : 'Password is required',
      },
    ])

    const email = settings.email ?? answers.email?.trim()
    const password = settings.password ?? answers.password
    const acquirer = createAcquirer({ ...settings, email, password })

    ui.info('🌐 Signing in with a headless browser...')
    const credential = await acquirer.acquire({ email, password })

    const store = new CredentialStore({ filePath: settings.credentialFile })
    await store.set(credential)

    ui.success(`✅ Credential stored at ${store.getFilePath()}`)
    if (credential.expiresAt !== undefined) {
      ui.info(`Expires ${dayjs(credential.expiresAt).format('YYYY-MM-DD HH:mm')} (${dayjs(credential.expiresAt).fromNow()})`)
    }
  }
  catch (error) {
    const reason = error instanceof AuthenticationError ? ` [${error.reason}]` : ''
    ui.error(`❌ Login failed${reason}: ${errorMessage(error)}`)
    process.exit(1)
  }
}

export async function handleStatusCommand(options: GatewayCommandOptions): Promise<void> {
  const ui = new UILogger(options.verbose)
  const settings = settingsFromOptions(options)
  const store = new CredentialStore({ filePath: settings.credentialFile })
  await store.load()

  const status = store.status(settings.refreshMarginSeconds)
  if (!status.present) {
    ui.warning(`No stored credential (${status.filePath})`)
    ui.displayGrey('Run "qwen-gateway login" to create one')
    return
  }

  const state = status.valid ? ui.success : ui.error
  state(status.valid ? '● Credential valid' : '● Credential expired or unusable')
  ui.info(`  └─ Source: ${status.source}`)
  if (status.acquiredAt !== undefined) {
    ui.info(`  └─ Acquired: ${dayjs(status.acquiredAt).format('YYYY-MM-DD HH:mm')} (${dayjs(status.acquiredAt).fromNow()})`)
  }
  ui.info(status.expiresAt !== undefined
    ? `  └─ Expires: ${dayjs(status.expiresAt).format('YYYY-MM-DD HH:mm')} (${dayjs(status.expiresAt).fromNow()})`
    : '  └─ Expires: unknown')
  ui.displayGrey(`  └─ File: ${status.filePath}`)
}

export async function handleLogoutCommand(options: GatewayCommandOptions): Promise<void> {
  const ui = new UILogger(options.verbose)
  const settings = settingsFromOptions(options)
  const store = new CredentialStore({ filePath: settings.credentialFile })
  await store.invalidate()
  ui.success(`🗑️  Removed stored credential (${store.getFilePath()})`)
}
