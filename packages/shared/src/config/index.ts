import { config as loadEnv } from 'dotenv'

loadEnv()

const env = (key: string, fallback?: string): string | undefined => {
  const value = process.env[key]
  return value !== undefined && value.trim() !== '' ? value : fallback
}

const intEnv = (key: string, fallback: number): number => {
  const raw = env(key)
  if (raw === undefined) {
    return fallback
  }
  const parsed = parseInt(raw, 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const parseLogLevel = (raw: string | undefined): LogLevel =>
  LOG_LEVELS.find(level => level === raw) ?? 'info'

/**
 * Application configuration, read once from the environment (.env supported)
 */
export const config = {
  server: {
    port: intEnv('PORT', 3000),
    host: env('HOST', '0.0.0.0') ?? '0.0.0.0',
    env: env('NODE_ENV', 'development') ?? 'development',
  },
  database: {
    url: env('DATABASE_URL'),
    poolMax: intEnv('DATABASE_POOL_MAX', 20),
  },
  auth: {
    jwtSecret: env('JWT_SECRET'),
    // seconds
    accessTokenTtl: intEnv('ACCESS_TOKEN_TTL', 5 * 60),
    refreshTokenTtl: intEnv('REFRESH_TOKEN_TTL', 24 * 60 * 60),
    bcryptRounds: intEnv('BCRYPT_ROUNDS', 10),
  },
  pagination: {
    pageSize: intEnv('PAGE_SIZE', 10),
  },
  logging: {
    level: parseLogLevel(env('LOG_LEVEL')),
  },
}

export type AppConfig = typeof config

/**
 * Fail fast on settings the API cannot run without
 */
export function validateConfig(cfg: AppConfig = config): void {
  const problems: string[] = []

  if (!cfg.database.url) {
    problems.push('DATABASE_URL is required')
  }
  if (!cfg.auth.jwtSecret) {
    problems.push('JWT_SECRET is required')
  }
  if (cfg.pagination.pageSize < 1) {
    problems.push('PAGE_SIZE must be a positive integer')
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }
}

export const isDevelopment = () => config.server.env === 'development'
