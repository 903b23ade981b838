/**
 * Shared types, configuration, logging and utilities for the issue tracker
 */

export * from './types'
export { config, validateConfig, isDevelopment } from './config'
export type { AppConfig, LogLevel } from './config'
export { createLogger, toLogError } from './logger'
export type { Logger, LogContext, LoggerOptions } from './logger'
export * from './utils/errors'
export * from './utils/auth'
export * from './utils/validation'
export * from './utils/pagination'
