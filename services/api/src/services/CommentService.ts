import {
  assertPageInRange,
  commentSchema,
  parseWith,
  toLimitOffset,
  type Comment,
  type PageRequest,
  type PageSlice,
  type Principal,
} from '@issuetrack/shared'
import type { ICommentRepository } from '../repositories/ICommentRepository'
import type { AuthorizationService } from './AuthorizationService'

export class CommentService {
  constructor(
    private readonly repos: { comments: ICommentRepository },
    private readonly authz: AuthorizationService
  ) {}

  async listComments(
    principal: Principal,
    projectId: number,
    issueId: number,
    page: PageRequest
  ): Promise<PageSlice<Comment>> {
    const issue = await this.authz.authorizeCommentCollection(principal, projectId, issueId, 'list')

    const slice = await this.repos.comments.list(issue.id, toLimitOffset(page))
    assertPageInRange(page, slice.count)
    return slice
  }

  async getComment(
    principal: Principal,
    projectId: number,
    issueId: number,
    commentId: number
  ): Promise<Comment> {
    return this.authz.authorizeCommentAccess(principal, projectId, issueId, commentId, 'retrieve')
  }

  async createComment(
    principal: Principal,
    projectId: number,
    issueId: number,
    input: unknown
  ): Promise<Comment> {
    const issue = await this.authz.authorizeCommentCollection(
      principal,
      projectId,
      issueId,
      'create'
    )
    const { description } = parseWith(commentSchema, input)
    return this.repos.comments.create(issue.id, principal.id, description)
  }

  async updateComment(
    principal: Principal,
    projectId: number,
    issueId: number,
    commentId: number,
    input: unknown
  ): Promise<Comment> {
    const comment = await this.authz.authorizeCommentAccess(
      principal,
      projectId,
      issueId,
      commentId,
      'update'
    )
    const { description } = parseWith(commentSchema, input)
    return this.repos.comments.update(comment.id, description)
  }

  async deleteComment(
    principal: Principal,
    projectId: number,
    issueId: number,
    commentId: number
  ): Promise<void> {
    const comment = await this.authz.authorizeCommentAccess(
      principal,
      projectId,
      issueId,
      commentId,
      'delete'
    )
    await this.repos.comments.delete(comment.id)
  }
}
