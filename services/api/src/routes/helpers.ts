import type { Context, Handler } from 'hono'
import {
  MethodNotAllowedError,
  NotFoundError,
  paginationSchema,
  pathIdSchema,
  toPageRequest,
  ValidationError,
  type ApiEnv,
  type PageRequest,
} from '@issuetrack/shared'

/**
 * Parse the JSON body; malformed JSON is a client error, not a 500
 */
export async function readJson(c: Context<ApiEnv>): Promise<unknown> {
  try {
    const body: unknown = await c.req.json()
    return body
  } catch {
    throw new ValidationError('JSON parse error - request body is not valid JSON.')
  }
}

/**
 * Path ids that are not positive integers match no resource
 */
export function parseIdParam(value: string | undefined): number {
  const parsed = pathIdSchema.safeParse(value)
  if (!parsed.success) {
    throw new NotFoundError()
  }
  return parsed.data
}

export function getPageRequest(c: Context<ApiEnv>, pageSize: number): PageRequest {
  const parsed = paginationSchema.safeParse({ page: c.req.query('page') })
  if (!parsed.success) {
    throw new NotFoundError('Invalid page.')
  }
  return toPageRequest(parsed.data.page, pageSize)
}

/**
 * Handler for routes that exist but never accept the method (partial
 * updates, issue detail reads)
 */
export const methodNotAllowed: Handler<ApiEnv> = c => {
  throw new MethodNotAllowedError(c.req.method)
}
