import { config, type LogLevel } from '../config'

/**
 * Structured context attached to a log line
 */
export interface LogContext {
  requestId?: string
  userId?: number
  path?: string
  method?: string
  metadata?: Record<string, unknown>
  error?: { message: string; stack?: string; code?: string } | string
  [key: string]: unknown
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(bindings: LogContext): Logger
}

export interface LoggerOptions {
  service: string
  level?: LogLevel
  bindings?: LogContext
  /**
   * Line sink, defaults to stdout/stderr
   */
  write?: (level: LogLevel, line: string) => void
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const defaultWrite = (level: LogLevel, line: string) => {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(line + '\n')
  } else {
    process.stdout.write(line + '\n')
  }
}

/**
 * Create a JSON line logger for a service
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_WEIGHT[options.level ?? config.logging.level]
  const write = options.write ?? defaultWrite
  const bindings = options.bindings ?? {}

  const log = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_WEIGHT[level] < threshold) {
      return
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      service: options.service,
      message,
      ...bindings,
      ...context,
    }

    write(level, JSON.stringify(entry))
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: childBindings =>
      createLogger({ ...options, bindings: { ...bindings, ...childBindings } }),
  }
}

/**
 * Normalize a thrown value into the `error` field of a log context
 */
export function toLogError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack }
  }
  return { message: String(error) }
}
