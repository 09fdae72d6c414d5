#!/usr/bin/env node
import type { GatewayCommandOptions } from '../commands/serve'
import process from 'node:process'
import { Command } from 'commander'
import { name, version } from '../../package.json'
import { UILogger } from '../utils/cli/ui'

const program = new Command()

function withSettingsOptions(command: Command): Command {
  return command
    .option('--config <file>', 'Read settings from this JSON file (default: ~/.qwen-gateway/config.json)')
    .option('--token <token>', 'Static upstream session token')
    .option('--email <email>', 'Account email used for browser login')
    .option('--password <password>', 'Account password used for browser login')
    .option('--credential-file <file>', 'Where the session credential is stored')
    .option('--browser-path <path>', 'Chromium/Chrome executable used for login')
    .option('--headed', 'Show the browser window during login')
    .option('--proxy <url>', 'Set HTTPS proxy for outbound requests')
    .option('--verbose', 'Enable verbose output')
    .option('--debug', 'Enable debug mode (writes a log file)')
}

program
  .name(name)
  .version(version, '-v, --version', 'Display version number')
  .description('OpenAI-compatible chat completion gateway for chat.qwen.ai')

withSettingsOptions(
  program
    .command('serve', { isDefault: true })
    .description('Start the gateway server')
    .option('--host <host>', 'Interface to bind (default: 0.0.0.0)')
    .option('-p, --port <number>', 'Port to listen on (default: 7050)')
    .option('--upstream <url>', 'Upstream chat-completion base URL')
    .option('--default-model <model>', 'Model used when a request names an unknown one')
    .option('--refresh-margin <seconds>', 'Refresh this long before the credential expires')
    .option('--timeout <ms>', 'Upstream request timeout')
    .option('--max-attempts <n>', 'Upstream attempts for transient failures'),
).action(async (options: GatewayCommandOptions) =>
  (await import('../commands/serve')).handleServeCommand(options, version),
)

withSettingsOptions(
  program
    .command('login')
    .description('Sign in with a headless browser and store the session credential'),
).action(async (options: GatewayCommandOptions) =>
  (await import('../commands/credential')).handleLoginCommand(options),
)

withSettingsOptions(
  program
    .command('status')
    .description('Show the stored session credential'),
).action(async (options: GatewayCommandOptions) =>
  (await import('../commands/credential')).handleStatusCommand(options),
)

withSettingsOptions(
  program
    .command('logout')
    .description('Delete the stored session credential'),
).action(async (options: GatewayCommandOptions) =>
  (await import('../commands/credential')).handleLogoutCommand(options),
)

program.parseAsync().catch((error: unknown) => {
  const ui = new UILogger()
  ui.displayError(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`)
  process.exit(1)
})
