import {
  assertPageInRange,
  parseWith,
  projectSchema,
  toLimitOffset,
  type PageRequest,
  type PageSlice,
  type Principal,
  type Project,
} from '@issuetrack/shared'
import type { IProjectRepository } from '../repositories/IProjectRepository'
import type { IContributorRepository } from '../repositories/IContributorRepository'
import type { AuthorizationService } from './AuthorizationService'
import { logger } from '../middleware/logger'

/**
 * Project registry: the author of a project is always its first owner
 */
export class ProjectService {
  constructor(
    private readonly repos: { projects: IProjectRepository; contributors: IContributorRepository },
    private readonly authz: AuthorizationService
  ) {}

  /**
   * Create a project owned by the principal.
   * The project row and the author's OWNER membership are written atomically.
   */
  async createProject(principal: Principal, input: unknown): Promise<Project> {
    const data = parseWith(projectSchema, input)
    const project = await this.repos.projects.createWithOwner(data, principal.id)

    logger.info('Project created', {
      userId: principal.id,
      metadata: { projectId: project.id, type: project.type },
    })
    return project
  }

  /**
   * Make sure the principal holds the OWNER membership of the project.
   * Idempotent: repeated calls leave exactly one row.
   * @returns true when the membership had to be created
   */
  async ensureOwnerMembership(project: Project, principal: Principal): Promise<boolean> {
    return this.repos.contributors.ensureOwner(project.id, principal.id)
  }

  /**
   * Projects the principal is a contributor of, newest first
   */
  async listProjects(principal: Principal, page: PageRequest): Promise<PageSlice<Project>> {
    const slice = await this.repos.projects.listForUser(principal.id, toLimitOffset(page))
    assertPageInRange(page, slice.count)
    return slice
  }

  async getProject(principal: Principal, projectId: number): Promise<Project> {
    return this.authz.authorizeProjectView(principal, projectId)
  }

  /**
   * Full replace of title, description and type (author only)
   */
  async updateProject(principal: Principal, projectId: number, input: unknown): Promise<Project> {
    await this.authz.authorizeProjectMutation(principal, projectId)
    const data = parseWith(projectSchema, input)
    return this.repos.projects.update(projectId, data)
  }

  /**
   * Delete a project with everything nested in it (author only)
   */
  async deleteProject(principal: Principal, projectId: number): Promise<void> {
    await this.authz.authorizeProjectMutation(principal, projectId)
    await this.repos.projects.delete(projectId)

    logger.info('Project deleted', { userId: principal.id, metadata: { projectId } })
  }
}
