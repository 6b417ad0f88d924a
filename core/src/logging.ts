/**
 * @file core/src/logging.ts
 * @description
 * Scoped console logging for the ledger core and backend.
 * Each line carries a timestamp, the time since the previous line and the scope.
 */

import defaultConfig, { type LogLevel, type LoggingConfig } from './logging.config.js'

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

let lastLogTime = performance.now()

const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value

// Objects are printed as JSON; bigints as their decimal string
export const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'bigint') return val.toString()
  if (val instanceof Error) return `${val.name}: ${val.message}`
  if (typeof val === 'object' && val !== null) {
    try {
      return JSON.stringify(val, bigintReplacer, 2)
    } catch {
      return '[unserializable object]'
    }
  }
  return val
}

/**
 * Create a logger tagged with `scope`. Settings not given fall back to
 * `logging.config.ts`.
 */
export const createLogger = (scope: string = 'unknown', config: Partial<LoggingConfig> = {}): Logger => {
  const settings: LoggingConfig = { ...defaultConfig, ...config }

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!settings.enabled) return
    if (levelOrder[level] < levelOrder[settings.level]) return

    const now = performance.now()
    const elapsed = (now - lastLogTime) / 1000
    lastLogTime = now

    const timestamp = new Date().toISOString()
    const line = `${settings.prefix} [${timestamp}] [${elapsed.toFixed(3)}s] [${scope}] [${level}]`
    const sink = level === 'error'
      ? console.error
      : level === 'warn' ? console.warn : console.log

    sink(line, message, ...args.map(safeFormat))
  }

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args)
  }
}
