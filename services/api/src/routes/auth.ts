import { Hono } from 'hono'
import type { ApiEnv } from '@issuetrack/shared'
import type { Services } from '../services'
import { serializeUser } from '../serializers'
import { readJson } from './helpers'

/**
 * Public identity routes: signup and the token lifecycle
 */
export function createAuthRoutes(services: Services) {
  const auth = new Hono<ApiEnv>()

  // POST /signup - Create an account
  auth.post('/signup', async c => {
    const user = await services.users.signup(await readJson(c))
    return c.json(serializeUser(user), 201)
  })

  // POST /login - Exchange credentials for an access/refresh pair
  auth.post('/login', async c => {
    const tokens = await services.tokens.login(await readJson(c))
    return c.json(tokens)
  })

  // POST /refresh - Exchange a refresh token for a new access token
  auth.post('/refresh', async c => {
    const tokens = await services.tokens.refresh(await readJson(c))
    return c.json(tokens)
  })

  // POST /verify - Check a token
  auth.post('/verify', async c => {
    return c.json(services.tokens.verify(await readJson(c)))
  })

  return auth
}
