import type { Settings } from '../../config/settings'
import boxen from 'boxen'
import chalk from 'chalk'

// Keep basic colors even when stdout is piped into a log collector
chalk.level = 1

const log = console.log

export class UILogger {
  constructor(private isVerbose: boolean = false) {}

  displayWelcome(version: string): void {
    log()
    log(chalk.cyan.bold(`🚀 Qwen Gateway v${version}`))
    log(chalk.gray('OpenAI-compatible chat completions on top of chat.qwen.ai'))
    log()
  }

  displaySuccess(message: string): void {
    log(chalk.green(message))
  }

  displayError(message: string): void {
    log(chalk.red(message))
  }

  displayWarning(message: string): void {
    log(chalk.yellow(message))
  }

  displayInfo(message: string): void {
    log(chalk.blue(message))
  }

  displayGrey(message: string): void {
    log(chalk.gray(message))
  }

  displayVerbose(message: string): void {
    if (this.isVerbose) {
      log(chalk.gray(`[Verbose] ${message}`))
    }
  }

  // Method aliases for convenience
  success = this.displaySuccess.bind(this)
  error = this.displayError.bind(this)
  warning = this.displayWarning.bind(this)
  info = this.displayInfo.bind(this)
  verbose = this.displayVerbose.bind(this)

  displayBoxedSettings(settings: Settings): void {
    const details = [
      `${chalk.bold('Listen:')} ${chalk.cyan(`http://${settings.host}:${settings.port}`)}`,
      `${chalk.bold('Upstream:')} ${chalk.white(settings.upstreamBaseUrl)}`,
      `${chalk.bold('Default Model:')} ${chalk.white(settings.defaultModel)}`,
      `${chalk.bold('Credential:')} ${chalk.white(describeCredentialSource(settings))}`,
    ]

    if (settings.proxy) {
      details.push(`${chalk.bold('HTTPS Proxy:')} ${chalk.white(settings.proxy)}`)
    }

    log(boxen(details.join('\n'), {
      title: 'Gateway Settings',
      titleAlignment: 'center',
      padding: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }))
    log()
  }
}

function describeCredentialSource(settings: Settings): string {
  if (settings.email && settings.password) {
    return settings.token ? `static token, browser login as ${settings.email}` : `browser login as ${settings.email}`
  }
  return 'static token'
}
