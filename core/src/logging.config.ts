// core/src/logging.config.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggingConfig {
  // turn console logging on or off
  enabled: boolean
  // lowest level that is printed
  level: LogLevel
  // prefix to make ledger logs easy to spot
  prefix: string
}

const loggingConfig: LoggingConfig = {
  enabled: true,
  level: 'info',
  prefix: '[ledger]'
}

export default loggingConfig
