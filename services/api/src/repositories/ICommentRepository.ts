import type { Comment, LimitOffset, PageSlice } from '@issuetrack/shared'

export interface ICommentRepository {
  create(issueId: number, authorUserId: number, description: string): Promise<Comment>
  findById(issueId: number, commentId: number): Promise<Comment | null>
  list(issueId: number, page: LimitOffset): Promise<PageSlice<Comment>>
  update(commentId: number, description: string): Promise<Comment>
  delete(commentId: number): Promise<boolean>
}
