import { randomUUID } from 'crypto'
import type { MiddlewareHandler } from 'hono'
import type { ApiEnv } from '@issuetrack/shared'

const REQUEST_ID_HEADER = 'X-Request-Id'
const MAX_INBOUND_ID_LENGTH = 128

/**
 * Reuse the caller's request id when it looks sane, otherwise mint one
 */
export function requestIdMiddleware(): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const inbound = c.req.header(REQUEST_ID_HEADER)?.trim()
    const requestId =
      inbound && inbound.length <= MAX_INBOUND_ID_LENGTH && /^[\w.:-]+$/.test(inbound)
        ? inbound
        : randomUUID()

    c.set('requestId', requestId)
    c.header(REQUEST_ID_HEADER, requestId)

    await next()
  }
}
