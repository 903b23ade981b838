/**
 * Hono application type definitions
 */

import type { Principal } from './users'

export interface ApiVariables {
  requestId: string
  // Set by the authentication middleware on protected routes only
  principal?: Principal
}

export interface ApiEnv {
  Variables: ApiVariables
}
