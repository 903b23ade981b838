import {
  assertPageInRange,
  contributorSchema,
  parseWith,
  toLimitOffset,
  ValidationError,
  type Contributor,
  type PageRequest,
  type PageSlice,
  type Principal,
} from '@issuetrack/shared'
import type { IContributorRepository } from '../repositories/IContributorRepository'
import type { IUserRepository } from '../repositories/IUserRepository'
import type { AuthorizationService } from './AuthorizationService'
import { logger } from '../middleware/logger'

/**
 * Membership ledger. Every operation is reserved to project owners.
 */
export class ContributorService {
  constructor(
    private readonly repos: { contributors: IContributorRepository; users: IUserRepository },
    private readonly authz: AuthorizationService
  ) {}

  async listMembers(
    principal: Principal,
    projectId: number,
    page: PageRequest
  ): Promise<PageSlice<Contributor>> {
    await this.authz.authorizeContributorManagement(principal, projectId)

    const slice = await this.repos.contributors.list(projectId, toLimitOffset(page))
    assertPageInRange(page, slice.count)
    return slice
  }

  /**
   * Invite a user into the project.
   * @throws ValidationError for an unknown permission or user
   * @throws ConflictError when the user is already a contributor
   */
  async addMember(principal: Principal, projectId: number, input: unknown): Promise<Contributor> {
    await this.authz.authorizeContributorManagement(principal, projectId)

    const data = parseWith(contributorSchema, input)

    const user = await this.repos.users.findById(data.user_id)
    if (!user) {
      throw ValidationError.forField(
        'user_id',
        `Invalid pk "${data.user_id}" - object does not exist.`
      )
    }

    const contributor = await this.repos.contributors.add(
      projectId,
      data.user_id,
      data.permission,
      data.role
    )

    logger.info('Contributor added', {
      userId: principal.id,
      metadata: { projectId, contributorUserId: data.user_id, permission: data.permission },
    })
    return contributor
  }

  async removeMember(principal: Principal, projectId: number, contributorId: number): Promise<void> {
    const contributor = await this.authz.authorizeContributorRemoval(
      principal,
      projectId,
      contributorId
    )
    await this.repos.contributors.remove(projectId, contributor.id)

    logger.info('Contributor removed', {
      userId: principal.id,
      metadata: { projectId, contributorId, contributorUserId: contributor.user_id },
    })
  }
}
