/**
 * Structured logger for server-side logging
 * Writes one JSON line per entry; LOG_LEVEL sets the threshold
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogContext = Record<string, unknown>

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isThresholdName(value: string): value is LogLevel | 'silent' {
  return Object.hasOwn(LEVEL_RANK, value)
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase()
  if (configured && isThresholdName(configured)) {
    return LEVEL_RANK[configured]
  }
  return LEVEL_RANK.info
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }
  return value
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_RANK[level] < threshold()) return

  const logEntry: LogContext = {
    timestamp: new Date().toISOString(),
    level,
    message,
  }
  for (const [key, value] of Object.entries(context ?? {})) {
    logEntry[key] = serializeError(value)
  }

  const output = JSON.stringify(logEntry)

  switch (level) {
    case 'error':
      console.error(output)
      break
    case 'warn':
      console.warn(output)
      break
    case 'debug':
      console.debug(output)
      break
    case 'info':
    default:
      console.log(output)
  }
}

export const logger = {
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext) => log('error', message, context),
  debug: (message: string, context?: LogContext) => log('debug', message, context),
}

export type Logger = typeof logger
