import type { Pool } from 'pg'
import type { Comment, LimitOffset, PageSlice } from '@issuetrack/shared'
import {
  createComment,
  deleteComment,
  getCommentById,
  listComments,
  updateComment,
} from '@issuetrack/shared/database/queries'
import type { ICommentRepository } from './ICommentRepository'

export class DatabaseCommentRepository implements ICommentRepository {
  constructor(private readonly db: Pool) {}

  create(issueId: number, authorUserId: number, description: string): Promise<Comment> {
    return createComment(this.db, issueId, authorUserId, description)
  }

  findById(issueId: number, commentId: number): Promise<Comment | null> {
    return getCommentById(this.db, issueId, commentId)
  }

  list(issueId: number, page: LimitOffset): Promise<PageSlice<Comment>> {
    return listComments(this.db, issueId, page)
  }

  update(commentId: number, description: string): Promise<Comment> {
    return updateComment(this.db, commentId, description)
  }

  delete(commentId: number): Promise<boolean> {
    return deleteComment(this.db, commentId)
  }
}
