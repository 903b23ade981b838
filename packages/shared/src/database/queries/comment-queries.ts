import type { Comment } from '../../types/comments'
import type { PageSlice } from '../../types/pagination'
import type { LimitOffset } from '../../utils/pagination'
import type { Queryable } from '../types'

export async function createComment(
  db: Queryable,
  issueId: number,
  authorUserId: number,
  description: string
): Promise<Comment> {
  const result = await db.query<Comment>(
    `
    INSERT INTO comments (issue_id, author_user_id, description)
    VALUES ($1, $2, $3)
    RETURNING *
    `,
    [issueId, authorUserId, description]
  )
  return result.rows[0]
}

/**
 * Get a comment, scoped to the issue it must belong to
 */
export async function getCommentById(
  db: Queryable,
  issueId: number,
  commentId: number
): Promise<Comment | null> {
  const result = await db.query<Comment>(
    'SELECT * FROM comments WHERE issue_id = $1 AND id = $2',
    [issueId, commentId]
  )
  return result.rows[0] || null
}

export async function listComments(
  db: Queryable,
  issueId: number,
  page: LimitOffset
): Promise<PageSlice<Comment>> {
  const countResult = await db.query<{ count: string }>(
    'SELECT COUNT(*) as count FROM comments WHERE issue_id = $1',
    [issueId]
  )
  const result = await db.query<Comment>(
    `
    SELECT * FROM comments
    WHERE issue_id = $1
    ORDER BY id ASC
    LIMIT $2 OFFSET $3
    `,
    [issueId, page.limit, page.offset]
  )

  return {
    count: parseInt(countResult.rows[0]?.count ?? '0', 10),
    items: result.rows,
  }
}

export async function updateComment(
  db: Queryable,
  commentId: number,
  description: string
): Promise<Comment> {
  const result = await db.query<Comment>(
    'UPDATE comments SET description = $2 WHERE id = $1 RETURNING *',
    [commentId, description]
  )

  if (result.rows.length === 0) {
    throw new Error(`Comment with ID ${commentId} not found`)
  }

  return result.rows[0]
}

export async function deleteComment(db: Queryable, commentId: number): Promise<boolean> {
  const result = await db.query('DELETE FROM comments WHERE id = $1', [commentId])
  return (result.rowCount ?? 0) > 0
}
