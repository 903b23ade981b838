import type { Pool } from 'pg'
import {
  ConflictError,
  getPgErrorCode,
  PG_UNIQUE_VIOLATION,
  type Contributor,
  type ContributorPermission,
  type LimitOffset,
  type PageSlice,
} from '@issuetrack/shared'
import {
  addContributor,
  ensureOwnerContributor,
  getContributorById,
  isProjectMember,
  isProjectOwner,
  listContributors,
  removeContributor,
} from '@issuetrack/shared/database/queries'
import type { IContributorRepository } from './IContributorRepository'

/**
 * PostgreSQL implementation of IContributorRepository.
 * The (project_id, user_id) unique constraint is the source of truth for
 * duplicate memberships.
 */
export class DatabaseContributorRepository implements IContributorRepository {
  constructor(private readonly db: Pool) {}

  async add(
    projectId: number,
    userId: number,
    permission: ContributorPermission,
    role: string
  ): Promise<Contributor> {
    try {
      return await addContributor(this.db, projectId, userId, permission, role)
    } catch (error) {
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new ConflictError('This user is already a contributor of the project.')
      }
      throw error
    }
  }

  ensureOwner(projectId: number, userId: number): Promise<boolean> {
    return ensureOwnerContributor(this.db, projectId, userId)
  }

  findById(projectId: number, contributorId: number): Promise<Contributor | null> {
    return getContributorById(this.db, projectId, contributorId)
  }

  list(projectId: number, page: LimitOffset): Promise<PageSlice<Contributor>> {
    return listContributors(this.db, projectId, page)
  }

  remove(projectId: number, contributorId: number): Promise<boolean> {
    return removeContributor(this.db, projectId, contributorId)
  }

  isOwner(projectId: number, userId: number): Promise<boolean> {
    return isProjectOwner(this.db, projectId, userId)
  }

  isMember(projectId: number, userId: number): Promise<boolean> {
    return isProjectMember(this.db, projectId, userId)
  }
}
