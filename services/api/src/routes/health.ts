import { Hono } from 'hono'
import { getErrorMessage, type ApiEnv } from '@issuetrack/shared'
import type { Queryable } from '@issuetrack/shared/database/queries'

interface HealthRoutesOptions {
  pool?: Queryable
  version?: string
}

export function createHealthRoutes({ pool, version }: HealthRoutesOptions) {
  const health = new Hono<ApiEnv>()

  health.get('/', async c => {
    const body: Record<string, unknown> = {
      status: 'healthy',
      service: 'issuetrack-api',
      version: version || 'unknown',
      timestamp: new Date().toISOString(),
    }

    if (pool) {
      try {
        await pool.query('SELECT 1')
        body.database = 'connected'
      } catch (error) {
        body.status = 'unhealthy'
        body.database = 'disconnected'
        body.error = getErrorMessage(error)
      }
    }

    return c.json(body, body.status === 'healthy' ? 200 : 503)
  })

  return health
}
