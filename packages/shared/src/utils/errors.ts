import { BaseError } from '../types/errors'

/**
 * Extract a readable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return String(error)
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError
}

/**
 * SQLSTATE for unique violations, as surfaced by `pg`
 */
export const PG_UNIQUE_VIOLATION = '23505'

export function getPgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}
