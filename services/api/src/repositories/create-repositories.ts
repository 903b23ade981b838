import type { Pool } from 'pg'
import type { IUserRepository } from './IUserRepository'
import type { IProjectRepository } from './IProjectRepository'
import type { IContributorRepository } from './IContributorRepository'
import type { IIssueRepository } from './IIssueRepository'
import type { ICommentRepository } from './ICommentRepository'
import { DatabaseUserRepository } from './DatabaseUserRepository'
import { DatabaseProjectRepository } from './DatabaseProjectRepository'
import { DatabaseContributorRepository } from './DatabaseContributorRepository'
import { DatabaseIssueRepository } from './DatabaseIssueRepository'
import { DatabaseCommentRepository } from './DatabaseCommentRepository'
import { logger } from '../middleware/logger'

export interface Repositories {
  users: IUserRepository
  projects: IProjectRepository
  contributors: IContributorRepository
  issues: IIssueRepository
  comments: ICommentRepository
}

/**
 * Factory function to create the PostgreSQL-backed repositories.
 *
 * @param dbPool - PostgreSQL connection pool (required)
 * @returns Repository implementations
 */
export function createRepositories(dbPool: Pool): Repositories {
  if (!dbPool) {
    throw new Error('Database pool is required to create repositories')
  }

  logger.info('Creating repositories', {
    metadata: {
      mode: 'database',
    },
  })

  return {
    users: new DatabaseUserRepository(dbPool),
    projects: new DatabaseProjectRepository(dbPool),
    contributors: new DatabaseContributorRepository(dbPool),
    issues: new DatabaseIssueRepository(dbPool),
    comments: new DatabaseCommentRepository(dbPool),
  }
}
