import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import dayjs from 'dayjs'

export interface LogEntry {
  timestamp: string
  level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'
  category: string
  message: string
  data?: string
}

const SENSITIVE_KEYS = ['authorization', 'cookie', 'set-cookie', 'token', 'password', 'x-api-key']

export class FileLogger {
  private logDir: string
  private logFile: string
  private enabled: boolean = false
  private maxContentLength: number = 2000

  constructor(logFileName?: string, logDir?: string) {
    this.logDir = logDir ?? join(homedir(), '.qwen-gateway', 'logs')
    const timestamp = dayjs().format('YYYY-MM-DDTHH-mm-ss')
    this.logFile = join(this.logDir, logFileName ?? `qwen-gateway-${timestamp}.log`)
  }

  enable(): void {
    this.enabled = true
    this.ensureLogDirectory()
    this.initializeLogFile()
    this.log('INFO', 'SYSTEM', '🚀 Gateway debug session started')
  }

  disable(): void {
    if (this.enabled) {
      this.log('INFO', 'SYSTEM', '🛑 Debug logging disabled')
    }
    this.enabled = false
  }

  isEnabled(): boolean {
    return this.enabled
  }

  private ensureLogDirectory(): void {
    if (!existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true, mode: 0o700 })
    }
  }

  private initializeLogFile(): void {
    const header = `
=== Qwen Gateway Debug Log ===
Session started: ${dayjs().format('YYYY-MM-DD HH:mm:ss')}
Log file: ${this.logFile}
==============================

`
    try {
      writeFileSync(this.logFile, header, { encoding: 'utf-8', mode: 0o600 })
    }
    catch (error) {
      console.error('Failed to initialize log file:', error)
    }
  }

  truncateContent(content: unknown): string {
    if (content === undefined || content === null || content === '')
      return ''

    const str = typeof content === 'string' ? content : JSON.stringify(this.redact(content), null, 2)

    if (str.length > this.maxContentLength) {
      return `${str.substring(0, this.maxContentLength)}\n... [TRUNCATED - content too long]`
    }

    return str
  }

  /**
   * Replace secret-bearing fields at any depth with a marker
   */
  redact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map(item => this.redact(item))
    }
    if (value !== null && typeof value === 'object') {
      const sanitized: Record<string, unknown> = {}
      for (const [key, inner] of Object.entries(value)) {
        sanitized[key] = SENSITIVE_KEYS.includes(key.toLowerCase()) && inner ? '[REDACTED]' : this.redact(inner)
      }
      return sanitized
    }
    return value
  }

  private log(level: LogEntry['level'], category: string, message: string, data?: unknown): void {
    if (!this.enabled) {
      return
    }

    const entry: LogEntry = {
      timestamp: dayjs().format('YYYY-MM-DD HH:mm:ss.SSS'),
      level,
      category,
      message,
      data: data !== undefined ? this.truncateContent(data) : undefined,
    }

    try {
      appendFileSync(this.logFile, `${this.formatLogEntry(entry)}\n`, 'utf-8')
    }
    catch (error) {
      console.error('Failed to write to log file:', error)
    }
  }

  formatLogEntry(entry: LogEntry): string {
    const levelEmoji = {
      DEBUG: '🔍',
      INFO: 'ℹ️',
      WARN: '⚠️',
      ERROR: '❌',
    }

    let formatted = `${levelEmoji[entry.level]} [${entry.timestamp}] ${entry.category}: ${entry.message}`

    if (entry.data) {
      const indentedData = entry.data.split('\n').map(line => `    ${line}`).join('\n')
      formatted += `\n${indentedData}`
    }

    formatted += `\n${'-'.repeat(80)}`

    return formatted
  }

  debug(category: string, message: string, data?: unknown): void {
    this.log('DEBUG', category, message, data)
  }

  info(category: string, message: string, data?: unknown): void {
    this.log('INFO', category, message, data)
  }

  warn(category: string, message: string, data?: unknown): void {
    this.log('WARN', category, message, data)
  }

  error(category: string, message: string, data?: unknown): void {
    this.log('ERROR', category, message, data)
  }

  logRequest(method: string, url: string, headers: Record<string, unknown>, body?: unknown): void {
    this.info('REQUEST', `${method} ${url}`, {
      headers,
      body,
    })
  }

  logResponse(statusCode: number, durationMs: number, body?: unknown): void {
    const level = statusCode >= 400 ? 'WARN' : 'INFO'
    this.log(level, 'RESPONSE', `${statusCode} in ${durationMs}ms`, body)
  }

  logError(category: string, error: unknown, context?: unknown): void {
    const message = error instanceof Error ? error.message : String(error)
    const stack = error instanceof Error ? error.stack : undefined

    this.error(category, message, {
      stack,
      context,
    })
  }

  getLogFilePath(): string {
    return this.logFile
  }
}

// Global instance
export const fileLogger = new FileLogger()
