import type { Context, MiddlewareHandler } from 'hono'
import { createLogger, type ApiEnv, type Logger } from '@issuetrack/shared'

export const logger = createLogger({ service: 'api' })

/**
 * Logger bound to the current request id
 */
export function getRequestLogger(c: Context<ApiEnv>): Logger {
  return logger.child({ requestId: c.get('requestId') })
}

/**
 * Log every request once it has completed, with status and duration
 */
export function loggingMiddleware(): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const start = Date.now()

    await next()

    const status = c.res.status
    const context = {
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      userId: c.get('principal')?.id,
      metadata: {
        status,
        durationMs: Date.now() - start,
      },
    }

    if (status >= 500) {
      logger.error('Request failed', context)
    } else if (status >= 400) {
      logger.warn('Request rejected', context)
    } else {
      logger.info('Request completed', context)
    }
  }
}
