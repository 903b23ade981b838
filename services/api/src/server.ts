/**
 * API Service - Composition Root
 */

import { serve } from '@hono/node-server'
import { config, toLogError, validateConfig } from '@issuetrack/shared'
import { createApiApp } from './app'
import { container } from './container'
import { logger } from './middleware/logger'

async function startServer() {
  validateConfig()

  logger.info('Starting API service', {
    metadata: {
      version: process.env.npm_package_version || 'unknown',
      environment: config.server.env,
      pageSize: config.pagination.pageSize,
    },
  })

  const app = createApiApp({
    services: container.getServices(),
    pageSize: config.pagination.pageSize,
    pool: container.getDbPool(),
    version: process.env.npm_package_version,
  })

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  })

  logger.info('API service started', {
    metadata: {
      port: config.server.port,
      host: config.server.host,
    },
  })

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down API service...')

    server.close()
    await container.cleanup()

    logger.info('API service shut down successfully')
    process.exit(0)
  }

  const onSignal = () => {
    shutdown().catch(err => {
      logger.error('Shutdown failed', { error: toLogError(err) })
      process.exit(1)
    })
  }

  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
  process.on('SIGQUIT', onSignal)
}

// Error handling for uncaught errors
process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { error: toLogError(reason) })
})

startServer().catch(err => {
  logger.error('Failed to start server', { error: toLogError(err) })
  process.exit(1)
})
