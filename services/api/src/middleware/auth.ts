import type { Context, MiddlewareHandler } from 'hono'
import { AuthenticationError, type ApiEnv, type Principal } from '@issuetrack/shared'
import type { TokenService } from '../services/TokenService'

/**
 * Bearer token authentication.
 * Sets the principal on the context or rejects the request with 401.
 * Safe to register on overlapping paths: an already authenticated request passes through.
 */
export function requireAuth(tokenService: TokenService): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    if (c.get('principal')) {
      return next()
    }

    const authorization = c.req.header('Authorization')
    if (!authorization) {
      throw new AuthenticationError()
    }

    const match = authorization.match(/^Bearer\s+(.+)$/i)
    if (!match) {
      throw new AuthenticationError('Invalid Authorization header format. Expected: Bearer <token>')
    }

    const principal = await tokenService.authenticate(match[1])
    c.set('principal', principal)

    await next()
  }
}

/**
 * The authenticated principal of a protected route
 */
export function getPrincipal(c: Context<ApiEnv>): Principal {
  const principal = c.get('principal')
  if (!principal) {
    throw new AuthenticationError()
  }
  return principal
}
