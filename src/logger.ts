import { pino } from 'pino'

export interface Logger {
  info(obj: object, msg?: string): void
  warn(obj: object, msg?: string): void
  error(obj: object, msg?: string): void
}

const noopFn = () => {}

const noopLogger: Logger = {
  info: noopFn,
  warn: noopFn,
  error: noopFn
}

export function createNoopLogger(): Logger {
  return noopLogger
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const APP_NAME = 'reminder-dialog-bot'

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/** Falls back to info for anything pino would reject. */
export function resolveLogLevel(value?: string): LogLevel {
  return value !== undefined && isLogLevel(value) ? value : 'info'
}

export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({
    name,
    level,
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['*.token', '*.accessToken', '*.subscriptionKey', '*.authoringKey', '*.secret', '*.password'],
      censor: '[REDACTED]'
    }
  })
}
