import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { secureHeaders } from 'hono/secure-headers'
import {
  isBaseError,
  isDevelopment,
  NotFoundError,
  toLogError,
  ValidationError,
  type ApiEnv,
  type BaseError,
} from '@issuetrack/shared'
import type { Queryable } from '@issuetrack/shared/database/queries'
import type { Services } from './services'
import { getRequestLogger, loggingMiddleware } from './middleware/logger'
import { requestIdMiddleware } from './middleware/request-id'
import { requireAuth } from './middleware/auth'
import { createAuthRoutes } from './routes/auth'
import { createHealthRoutes } from './routes/health'
import { createProjectRoutes } from './routes/projects'
import { createProjectMemberRoutes } from './routes/project-members'
import { createIssueRoutes } from './routes/issues'
import { createCommentRoutes } from './routes/comments'

export interface ApiAppOptions {
  services: Services
  pageSize: number
  pool?: Queryable
  version?: string
}

function errorBody(error: BaseError, requestId: string) {
  return {
    error: {
      type: error.type,
      message: error.message,
      request_id: requestId,
      ...(error instanceof ValidationError && Object.keys(error.fields).length > 0
        ? { fields: error.fields }
        : {}),
    },
  }
}

/**
 * Create and configure the API application
 */
export function createApiApp({ services, pageSize, pool, version }: ApiAppOptions) {
  const app = new Hono<ApiEnv>()

  // Centralized error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') || 'unknown'

    if (isBaseError(err)) {
      return c.json(errorBody(err, requestId), err.statusCode)
    }

    getRequestLogger(c).error('Unhandled error', {
      error: toLogError(err),
      path: c.req.path,
      method: c.req.method,
    })

    // Don't expose internal errors to clients
    const message = isDevelopment() ? err.message : 'Internal server error'

    return c.json({ error: { type: 'internal_error', message, request_id: requestId } }, 500)
  })

  app.notFound(c => {
    const error = new NotFoundError()
    return c.json(errorBody(error, c.get('requestId') || 'unknown'), 404)
  })

  // Global middleware
  app.use('*', cors())
  app.use('*', secureHeaders())
  app.use('*', requestIdMiddleware()) // Generate request ID first
  app.use('*', loggingMiddleware()) // Then use it for logging

  app.route('/health', createHealthRoutes({ pool, version }))
  app.route('/', createAuthRoutes(services))

  // Everything under /projects requires a bearer token
  const authenticate = requireAuth(services.tokens)
  app.use('/projects', authenticate)
  app.use('/projects/*', authenticate)

  const deps = { services, pageSize }
  app.route('/projects', createProjectRoutes(deps))
  app.route('/projects', createProjectMemberRoutes(deps))
  app.route('/projects', createIssueRoutes(deps))
  app.route('/projects', createCommentRoutes(deps))

  return app
}
