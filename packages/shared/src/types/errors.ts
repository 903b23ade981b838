/**
 * Error taxonomy shared by services and the HTTP layer.
 * Each error carries the status code and `type` it is reported with.
 */

export type ErrorType =
  | 'authentication_error'
  | 'validation_error'
  | 'permission_error'
  | 'not_found'
  | 'method_not_allowed'
  | 'conflict'
  | 'internal_error'

export type FieldErrors = Record<string, string[]>

export type ErrorStatusCode = 400 | 401 | 403 | 404 | 405 | 409 | 500

export class BaseError extends Error {
  constructor(
    message: string,
    public readonly statusCode: ErrorStatusCode,
    public readonly type: ErrorType
  ) {
    super(message)
    this.name = this.constructor.name
  }
}

export class AuthenticationError extends BaseError {
  constructor(message = 'Authentication credentials were not provided.') {
    super(message, 401, 'authentication_error')
  }
}

export class ValidationError extends BaseError {
  constructor(
    message: string,
    public readonly fields: FieldErrors = {}
  ) {
    super(message, 400, 'validation_error')
  }

  /**
   * Single-field validation failure
   */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, { [field]: [message] })
  }
}

export class ForbiddenError extends BaseError {
  constructor(message = 'You do not have permission to perform this action.') {
    super(message, 403, 'permission_error')
  }
}

export class NotFoundError extends BaseError {
  constructor(message = 'Not found.') {
    super(message, 404, 'not_found')
  }
}

export class MethodNotAllowedError extends BaseError {
  constructor(method: string) {
    super(`Method "${method}" not allowed.`, 405, 'method_not_allowed')
  }
}

export class ConflictError extends BaseError {
  constructor(message: string) {
    super(message, 409, 'conflict')
  }
}
