import type { LoggingConfig } from './types'
import * as process from 'node:process'

/**
 * Log level type
 */
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * ANSI color codes for terminal output
 */
const ANSI_COLORS = {
  reset: '\u001B[0m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  cyan: '\u001B[36m',
} as const

interface LogStream {
  write: (chunk: string) => unknown
  isTTY?: boolean
}

export interface LoggerOptions {
  verbose?: boolean
  scope?: string
  logging?: LoggingConfig
  stdout?: LogStream
  stderr?: LogStream
}

/**
 * Scoped logger. Info goes to stdout, warnings and errors to stderr, and
 * debug output only appears when verbose.
 */
export class Logger {
  private verbose: boolean
  private scopeName?: string
  private logging: LoggingConfig
  private useColors: boolean
  private stdout: LogStream
  private stderr: LogStream

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false
    this.scopeName = options.scope
    this.logging = options.logging ?? {}
    this.stdout = options.stdout ?? process.stdout
    this.stderr = options.stderr ?? process.stderr
    this.useColors = Boolean(this.stdout.isTTY) && !process.env.NO_COLOR
  }

  /**
   * Create a new logger instance with a scope
   */
  withScope(scope: string): Logger {
    return new Logger({
      verbose: this.verbose,
      scope,
      logging: this.logging,
      stdout: this.stdout,
      stderr: this.stderr,
    })
  }

  private format(level: LogLevel, message: string): string {
    let formatted = ''

    if (this.logging.timestamps) {
      formatted += `${this.colorize(new Date().toISOString(), 'dim')} `
    }

    formatted += `${this.getLevelString(level)} `

    if (this.scopeName) {
      formatted += `${this.colorize(`[${this.scopeName}]`, 'dim')} `
    }

    return formatted + message
  }

  private getLevelString(level: LogLevel): string {
    const prefixes = {
      debug: this.logging.prefixes?.debug ?? 'DEBUG',
      info: this.logging.prefixes?.info ?? 'INFO',
      warn: this.logging.prefixes?.warn ?? 'WARN',
      error: this.logging.prefixes?.error ?? 'ERROR',
    }

    const levelStr = prefixes[level]

    if (!this.useColors) {
      return `[${levelStr}]`
    }

    const colors = {
      debug: ANSI_COLORS.cyan,
      info: ANSI_COLORS.blue,
      warn: ANSI_COLORS.yellow,
      error: ANSI_COLORS.red,
    }

    return `${colors[level]}[${levelStr}]${ANSI_COLORS.reset}`
  }

  private colorize(text: string, style: keyof typeof ANSI_COLORS | 'none' = 'none'): string {
    if (!this.useColors || style === 'none') {
      return text
    }
    return `${ANSI_COLORS[style]}${text}${ANSI_COLORS.reset}`
  }

  private line(level: LogLevel, message: string, args: unknown[]): string {
    const formatted = this.format(level, message)
    return `${formatted}${args.length ? ` ${args.map(describe).join(' ')}` : ''}\n`
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose)
      return
    this.stderr.write(this.line('debug', message, args))
  }

  info(message: string, ...args: unknown[]): void {
    this.stdout.write(this.line('info', message, args))
  }

  warn(message: string, ...args: unknown[]): void {
    this.stderr.write(this.line('warn', message, args))
  }

  error(message: string, ...args: unknown[]): void {
    this.stderr.write(this.line('error', message, args))
  }
}

function describe(value: unknown): string {
  if (value instanceof Error)
    return value.message
  return String(value)
}
