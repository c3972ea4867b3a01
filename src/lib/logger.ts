/**
 * Leveled logger
 *
 * Lines go to stderr so stdout stays reserved for data:
 *
 *   2026-10-18 03:00:00 declarr:1234 [INFO] <sonarr> (sonarr-hd) Fetching remote state
 */

import { LOG_LEVELS, type LogLevel } from '../types.js'
import { InvalidConfigError } from './errors.js'

export const LOG_LEVEL_ENV = 'DECLARR_LOG_LEVEL'
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4
}

export type LogSink = (line: string) => void

export interface LogContext {
  plugin?: string
  instance?: string
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  now?: () => Date
  pid?: number
  name?: string
}

const stderrSink: LogSink = line => {
  process.stderr.write(line + '\n')
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Parse a log level name (case-insensitive)
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase()
  if (normalized === 'warning') return 'warn'
  if (isLogLevel(normalized)) return normalized
  throw new InvalidConfigError(`unknown log level "${value}"`, {
    location: 'log level',
    issues: [`expected one of: ${LOG_LEVELS.join(', ')}`]
  })
}

/**
 * Resolve the effective level: explicit flag, then environment, then default
 */
export function resolveLogLevel(flag?: string, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (flag) return parseLogLevel(flag)
  const fromEnv = env[LOG_LEVEL_ENV]
  if (fromEnv) return parseLogLevel(fromEnv)
  return DEFAULT_LOG_LEVEL
}

/** State shared between a logger and its children */
export interface LoggerCore {
  level: LogLevel
  sink: LogSink
  now: () => Date
  pid: number
  name: string
}

export class Logger {
  private readonly core: LoggerCore
  readonly context: LogContext

  constructor(options: LoggerOptions = {}, context: LogContext = {}, core?: LoggerCore) {
    this.core = core ?? {
      level: options.level ?? DEFAULT_LOG_LEVEL,
      sink: options.sink ?? stderrSink,
      now: options.now ?? (() => new Date()),
      pid: options.pid ?? process.pid,
      name: options.name ?? 'declarr'
    }
    this.context = context
  }

  get level(): LogLevel {
    return this.core.level
  }

  /**
   * Change the threshold. Children share it with their parent.
   */
  setLevel(level: LogLevel): void {
    this.core.level = level
  }

  /**
   * Logger carrying extra plugin/instance context
   */
  child(context: LogContext): Logger {
    return new Logger({}, { ...this.context, ...context }, this.core)
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.core.level]
  }

  trace(message: string): void {
    this.write('trace', message)
  }

  debug(message: string): void {
    this.write('debug', message)
  }

  info(message: string): void {
    this.write('info', message)
  }

  warn(message: string): void {
    this.write('warn', message)
  }

  error(message: string): void {
    this.write('error', message)
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return

    const parts = [
      formatTimestamp(this.core.now()),
      `${this.core.name}:${this.core.pid}`,
      `[${level.toUpperCase()}]`
    ]
    if (this.context.plugin) parts.push(`<${this.context.plugin}>`)
    if (this.context.instance) parts.push(`(${this.context.instance})`)
    const prefix = parts.join(' ')

    for (const line of message.split('\n')) {
      this.core.sink(`${prefix} ${line}`)
    }
  }
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return new Logger({ sink: () => {} })
}
