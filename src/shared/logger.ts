import { appendFileSync } from 'fs'
import { formatWithOptions } from 'util'

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

const priority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

export type LoggerOptions = {
  level?: LogLevel
  /**
   * When set, lines are appended to this file instead of the console.
   * The terminal UI owns stdout, so interactive sessions log here.
   */
  filePath?: string | null
  /** Drop everything. Used while the UI is drawing and no file is configured. */
  silent?: boolean
}

const settings: Required<LoggerOptions> = {
  level: 'info',
  filePath: null,
  silent: false
}

export function configureLogger(options: LoggerOptions): void {
  if (options.level !== undefined) settings.level = options.level
  if (options.filePath !== undefined) settings.filePath = options.filePath
  if (options.silent !== undefined) settings.silent = options.silent
}

export function isLogLevel(value: string): value is LogLevel {
  return value in priority
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

function emit(level: LogLevel, message: unknown, args: unknown[]): void {
  if (priority[level] < priority[settings.level]) return

  if (settings.filePath) {
    const line = formatWithOptions({ colors: false }, message, ...args)
    appendFileSync(
      settings.filePath,
      `${new Date().toISOString()} [${styles[level].label}] ${line}\n`
    )
    return
  }

  if (settings.silent) return

  const parts = format(level, message, args)
  switch (level) {
    case 'info':
      console.info(...parts)
      break
    case 'warn':
      console.warn(...parts)
      break
    case 'error':
      console.error(...parts)
      break
    case 'debug':
      console.debug(...parts)
      break
  }
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    emit('info', message, args)
  },
  warn: (message: unknown, ...args: unknown[]) => {
    emit('warn', message, args)
  },
  error: (message: unknown, ...args: unknown[]) => {
    emit('error', message, args)
  },
  debug: (message: unknown, ...args: unknown[]) => {
    emit('debug', message, args)
  }
}
