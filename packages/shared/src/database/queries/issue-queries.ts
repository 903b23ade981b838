import type { Issue, NewIssue } from '../../types/issues'
import type { PageSlice } from '../../types/pagination'
import type { LimitOffset } from '../../utils/pagination'
import type { Queryable } from '../types'

export async function createIssue(db: Queryable, issue: NewIssue): Promise<Issue> {
  const result = await db.query<Issue>(
    `
    INSERT INTO issues (
      project_id,
      title,
      description,
      tag,
      priority,
      status,
      author_user_id,
      assignee_user_id
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
    RETURNING *
    `,
    [
      issue.project_id,
      issue.title,
      issue.description,
      issue.tag,
      issue.priority,
      issue.status,
      issue.author_user_id,
      issue.assignee_user_id,
    ]
  )
  return result.rows[0]
}

/**
 * Get an issue, scoped to the project it must belong to
 */
export async function getIssueById(
  db: Queryable,
  projectId: number,
  issueId: number
): Promise<Issue | null> {
  const result = await db.query<Issue>('SELECT * FROM issues WHERE project_id = $1 AND id = $2', [
    projectId,
    issueId,
  ])
  return result.rows[0] || null
}

/**
 * Issues of a project in creation order
 */
export async function listIssues(
  db: Queryable,
  projectId: number,
  page: LimitOffset
): Promise<PageSlice<Issue>> {
  const countResult = await db.query<{ count: string }>(
    'SELECT COUNT(*) as count FROM issues WHERE project_id = $1',
    [projectId]
  )
  const result = await db.query<Issue>(
    `
    SELECT * FROM issues
    WHERE project_id = $1
    ORDER BY id ASC
    LIMIT $2 OFFSET $3
    `,
    [projectId, page.limit, page.offset]
  )

  return {
    count: parseInt(countResult.rows[0]?.count ?? '0', 10),
    items: result.rows,
  }
}

/**
 * Replace an issue's editable fields; author and project never change
 */
export async function updateIssue(
  db: Queryable,
  issueId: number,
  fields: Omit<NewIssue, 'project_id' | 'author_user_id'>
): Promise<Issue> {
  const result = await db.query<Issue>(
    `
    UPDATE issues
    SET title = $2, description = $3, tag = $4, priority = $5, status = $6, assignee_user_id = $7
    WHERE id = $1
    RETURNING *
    `,
    [
      issueId,
      fields.title,
      fields.description,
      fields.tag,
      fields.priority,
      fields.status,
      fields.assignee_user_id,
    ]
  )

  if (result.rows.length === 0) {
    throw new Error(`Issue with ID ${issueId} not found`)
  }

  return result.rows[0]
}

/**
 * Delete an issue (cascades to its comments)
 */
export async function deleteIssue(db: Queryable, issueId: number): Promise<boolean> {
  const result = await db.query('DELETE FROM issues WHERE id = $1', [issueId])
  return (result.rowCount ?? 0) > 0
}
