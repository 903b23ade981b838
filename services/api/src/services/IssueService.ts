import {
  assertPageInRange,
  issueSchema,
  parseWith,
  toLimitOffset,
  ValidationError,
  type Issue,
  type PageRequest,
  type PageSlice,
  type Principal,
} from '@issuetrack/shared'
import type { IIssueRepository } from '../repositories/IIssueRepository'
import type { IContributorRepository } from '../repositories/IContributorRepository'
import type { AuthorizationService } from './AuthorizationService'

/**
 * Issue tracker: any contributor may open issues, only authors change them
 */
export class IssueService {
  constructor(
    private readonly repos: { issues: IIssueRepository; contributors: IContributorRepository },
    private readonly authz: AuthorizationService
  ) {}

  async listIssues(
    principal: Principal,
    projectId: number,
    page: PageRequest
  ): Promise<PageSlice<Issue>> {
    await this.authz.authorizeIssueCollection(principal, projectId, 'list')

    const slice = await this.repos.issues.list(projectId, toLimitOffset(page))
    assertPageInRange(page, slice.count)
    return slice
  }

  /**
   * Open an issue. The author is always the principal; any author field in
   * the payload is ignored. Without an assignee the author is assigned.
   */
  async createIssue(principal: Principal, projectId: number, input: unknown): Promise<Issue> {
    await this.authz.authorizeIssueCollection(principal, projectId, 'create')

    const { assignee_user_id, ...fields } = parseWith(issueSchema, input)
    const assignee = await this.resolveAssignee(projectId, assignee_user_id, principal.id)

    return this.repos.issues.create({
      ...fields,
      project_id: projectId,
      author_user_id: principal.id,
      assignee_user_id: assignee,
    })
  }

  /**
   * Full replace of an issue's fields (author only)
   */
  async updateIssue(
    principal: Principal,
    projectId: number,
    issueId: number,
    input: unknown
  ): Promise<Issue> {
    const issue = await this.authz.authorizeIssueMutation(principal, projectId, issueId, 'update')

    const { assignee_user_id, ...fields } = parseWith(issueSchema, input)
    const assignee = await this.resolveAssignee(projectId, assignee_user_id, principal.id)

    return this.repos.issues.update(issue.id, { ...fields, assignee_user_id: assignee })
  }

  async deleteIssue(principal: Principal, projectId: number, issueId: number): Promise<void> {
    const issue = await this.authz.authorizeIssueMutation(principal, projectId, issueId, 'delete')
    await this.repos.issues.delete(issue.id)
  }

  /**
   * An explicit assignee must already be a contributor of the project
   */
  private async resolveAssignee(
    projectId: number,
    requested: number | null | undefined,
    fallback: number
  ): Promise<number> {
    if (requested === null || requested === undefined) {
      return fallback
    }

    const isMember = await this.repos.contributors.isMember(projectId, requested)
    if (!isMember) {
      throw ValidationError.forField(
        'assignee_user_id',
        'The assignee must be a contributor of this project.'
      )
    }
    return requested
  }
}
