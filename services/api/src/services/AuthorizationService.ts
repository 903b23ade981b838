import {
  ForbiddenError,
  NotFoundError,
  type BaseError,
  type Comment,
  type Contributor,
  type Issue,
  type Principal,
  type Project,
} from '@issuetrack/shared'
import type { IProjectRepository } from '../repositories/IProjectRepository'
import type { IContributorRepository } from '../repositories/IContributorRepository'
import type { IIssueRepository } from '../repositories/IIssueRepository'
import type { ICommentRepository } from '../repositories/ICommentRepository'

export type IssueAction = 'list' | 'create' | 'update' | 'delete'
export type CommentAction = 'list' | 'create' | 'retrieve' | 'update' | 'delete'

/**
 * A single access predicate.
 * `existence` checks fail with 404, `permission` checks with 403.
 */
export interface AccessCheck {
  kind: 'existence' | 'permission'
  test: () => boolean | Promise<boolean>
  deny: () => BaseError
}

export const existenceCheck = (
  test: AccessCheck['test'],
  message = 'Not found.'
): AccessCheck => ({
  kind: 'existence',
  test,
  deny: () => new NotFoundError(message),
})

export const permissionCheck = (test: AccessCheck['test'], message?: string): AccessCheck => ({
  kind: 'permission',
  test,
  deny: () => new ForbiddenError(message),
})

/**
 * Evaluate checks in order, existence checks before permission checks,
 * stopping at the first failure.
 */
export async function enforce(checks: readonly AccessCheck[]): Promise<void> {
  const ordered = [
    ...checks.filter(check => check.kind === 'existence'),
    ...checks.filter(check => check.kind === 'permission'),
  ]

  for (const check of ordered) {
    if (!(await check.test())) {
      throw check.deny()
    }
  }
}

interface AuthorizationRepositories {
  projects: IProjectRepository
  contributors: IContributorRepository
  issues: IIssueRepository
  comments: ICommentRepository
}

/**
 * Decides who may view, create, modify or delete each resource.
 *
 * Two tiers: project membership grants read access to everything nested in a
 * project, authorship grants write access to one's own issues and comments.
 * Project structure (metadata, membership) stays with the author/owners.
 *
 * The `can*` methods answer a single question. The `authorize*` methods
 * resolve the path resources, then run the relevant checks so that a missing
 * resource is always reported before a missing permission, and return the
 * resolved resources.
 */
export class AuthorizationService {
  constructor(private readonly repos: AuthorizationRepositories) {}

  async canViewProject(principal: Principal, project: Project): Promise<boolean> {
    return this.repos.contributors.isMember(project.id, principal.id)
  }

  canMutateProject(principal: Principal, project: Project): boolean {
    return project.author_user_id !== null && project.author_user_id === principal.id
  }

  /**
   * @throws NotFoundError when the project does not exist
   */
  async canListOrCreateContributor(principal: Principal, projectId: number): Promise<boolean> {
    await this.findProject(projectId)
    return this.repos.contributors.isOwner(projectId, principal.id)
  }

  /**
   * Owners may remove any contributor of their project, except the OWNER row
   * of the project author.
   */
  async canDeleteContributor(
    principal: Principal,
    projectId: number,
    contributor: Contributor
  ): Promise<boolean> {
    if (contributor.project_id !== projectId) {
      return false
    }
    const project = await this.findProject(projectId)
    if (contributor.permission === 'OWNER' && contributor.user_id === project.author_user_id) {
      return false
    }
    return this.repos.contributors.isOwner(projectId, principal.id)
  }

  async canAccessIssue(
    principal: Principal,
    projectId: number,
    action: IssueAction,
    issue?: Issue
  ): Promise<boolean> {
    if (action === 'list' || action === 'create') {
      return this.repos.contributors.isMember(projectId, principal.id)
    }

    if (!issue || issue.author_user_id !== principal.id) {
      return false
    }
    return this.repos.contributors.isMember(issue.project_id, principal.id)
  }

  async canAccessComment(
    principal: Principal,
    issue: Issue,
    action: CommentAction,
    comment?: Comment
  ): Promise<boolean> {
    if (action === 'list' || action === 'create' || action === 'retrieve') {
      return this.repos.contributors.isMember(issue.project_id, principal.id)
    }

    return comment !== undefined && comment.author_user_id === principal.id
  }

  /**
   * Projects are invisible to non-members: both a missing project and one the
   * principal does not belong to are reported as not found.
   */
  async authorizeProjectView(principal: Principal, projectId: number): Promise<Project> {
    const project = await this.findProject(projectId)
    await enforce([existenceCheck(() => this.canViewProject(principal, project))])
    return project
  }

  async authorizeProjectMutation(principal: Principal, projectId: number): Promise<Project> {
    const project = await this.findProject(projectId)
    await enforce([
      existenceCheck(() => this.canViewProject(principal, project)),
      permissionCheck(
        () => this.canMutateProject(principal, project),
        'Only the project author can modify this project.'
      ),
    ])
    return project
  }

  async authorizeContributorManagement(principal: Principal, projectId: number): Promise<void> {
    await enforce([
      permissionCheck(
        () => this.canListOrCreateContributor(principal, projectId),
        'Only project owners can manage contributors.'
      ),
    ])
  }

  async authorizeContributorRemoval(
    principal: Principal,
    projectId: number,
    contributorId: number
  ): Promise<Contributor> {
    await this.findProject(projectId)
    const contributor = await this.repos.contributors.findById(projectId, contributorId)
    if (!contributor) {
      throw new NotFoundError('Contributor not found.')
    }

    await enforce([
      permissionCheck(
        () => this.repos.contributors.isOwner(projectId, principal.id),
        'Only project owners can manage contributors.'
      ),
      permissionCheck(
        () => this.canDeleteContributor(principal, projectId, contributor),
        "The project author's ownership cannot be removed."
      ),
    ])
    return contributor
  }

  async authorizeIssueCollection(
    principal: Principal,
    projectId: number,
    action: 'list' | 'create'
  ): Promise<Project> {
    const project = await this.findProject(projectId)
    await enforce([
      permissionCheck(
        () => this.canAccessIssue(principal, projectId, action),
        'You are not a contributor of this project.'
      ),
    ])
    return project
  }

  async authorizeIssueMutation(
    principal: Principal,
    projectId: number,
    issueId: number,
    action: 'update' | 'delete'
  ): Promise<Issue> {
    await this.findProject(projectId)
    const issue = await this.findIssue(projectId, issueId)
    await enforce([
      permissionCheck(
        () => this.repos.contributors.isMember(projectId, principal.id),
        'You are not a contributor of this project.'
      ),
      permissionCheck(
        () => this.canAccessIssue(principal, projectId, action, issue),
        'Only the issue author can modify this issue.'
      ),
    ])
    return issue
  }

  async authorizeCommentCollection(
    principal: Principal,
    projectId: number,
    issueId: number,
    action: 'list' | 'create'
  ): Promise<Issue> {
    await this.findProject(projectId)
    const issue = await this.findIssue(projectId, issueId)
    await enforce([
      permissionCheck(
        () => this.canAccessComment(principal, issue, action),
        'You are not a contributor of this project.'
      ),
    ])
    return issue
  }

  async authorizeCommentAccess(
    principal: Principal,
    projectId: number,
    issueId: number,
    commentId: number,
    action: 'retrieve' | 'update' | 'delete'
  ): Promise<Comment> {
    await this.findProject(projectId)
    const issue = await this.findIssue(projectId, issueId)
    const comment = await this.repos.comments.findById(issueId, commentId)
    if (!comment) {
      throw new NotFoundError('Comment not found.')
    }

    await enforce([
      permissionCheck(
        () => this.canAccessComment(principal, issue, action, comment),
        action === 'retrieve'
          ? 'You are not a contributor of this project.'
          : 'Only the comment author can modify this comment.'
      ),
    ])
    return comment
  }

  private async findProject(projectId: number): Promise<Project> {
    const project = await this.repos.projects.findById(projectId)
    if (!project) {
      throw new NotFoundError('Project not found.')
    }
    return project
  }

  private async findIssue(projectId: number, issueId: number): Promise<Issue> {
    const issue = await this.repos.issues.findById(projectId, issueId)
    if (!issue) {
      throw new NotFoundError('Issue not found.')
    }
    return issue
  }
}
