import { Pool } from 'pg'
import { config } from '@issuetrack/shared'
import { createRepositories, type Repositories } from './repositories/create-repositories'
import { createServices, type Services } from './services'
import { logger } from './middleware/logger'

/**
 * Dependency injection container for the API service
 */
class Container {
  private pool?: Pool
  private repositories?: Repositories
  private services?: Services

  getDbPool(): Pool {
    if (!this.pool) {
      if (!config.database.url) {
        throw new Error('DATABASE_URL is required to create the database pool')
      }

      this.pool = new Pool({
        connectionString: config.database.url,
        max: config.database.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      })

      this.pool.on('error', err => {
        logger.error('Unexpected database pool error', {
          error: { message: err.message, stack: err.stack },
        })
      })

      logger.info('Database pool created', {
        metadata: { max: config.database.poolMax },
      })
    }
    return this.pool
  }

  getRepositories(): Repositories {
    if (!this.repositories) {
      this.repositories = createRepositories(this.getDbPool())
    }
    return this.repositories
  }

  getServices(): Services {
    if (!this.services) {
      if (!config.auth.jwtSecret) {
        throw new Error('JWT_SECRET is required to issue tokens')
      }

      this.services = createServices(this.getRepositories(), {
        secret: config.auth.jwtSecret,
        accessTokenTtl: config.auth.accessTokenTtl,
        refreshTokenTtl: config.auth.refreshTokenTtl,
        bcryptRounds: config.auth.bcryptRounds,
      })
    }
    return this.services
  }

  async cleanup(): Promise<void> {
    this.services = undefined
    this.repositories = undefined

    if (this.pool) {
      await this.pool.end()
      this.pool = undefined
    }
  }
}

export const container = new Container()
