import type { Contributor, ContributorPermission } from '../../types/contributors'
import type { PageSlice } from '../../types/pagination'
import type { LimitOffset } from '../../utils/pagination'
import type { Queryable } from '../types'

/**
 * Add a contributor to a project.
 * A second row for the same (project, user) violates the unique constraint (23505).
 */
export async function addContributor(
  db: Queryable,
  projectId: number,
  userId: number,
  permission: ContributorPermission,
  role: string
): Promise<Contributor> {
  const result = await db.query<Contributor>(
    `
    INSERT INTO contributors (project_id, user_id, permission, role)
    VALUES ($1, $2, $3, $4)
    RETURNING *
    `,
    [projectId, userId, permission, role]
  )
  return result.rows[0]
}

/**
 * Insert the OWNER row for (project, user) unless one already exists.
 * Relies on the (project_id, user_id) unique constraint, so concurrent callers
 * cannot both insert.
 * @returns true when a row was inserted
 */
export async function ensureOwnerContributor(
  db: Queryable,
  projectId: number,
  userId: number
): Promise<boolean> {
  const result = await db.query(
    `
    INSERT INTO contributors (project_id, user_id, permission, role)
    VALUES ($1, $2, 'OWNER', '')
    ON CONFLICT (project_id, user_id) DO NOTHING
    `,
    [projectId, userId]
  )
  return (result.rowCount ?? 0) > 0
}

export async function getContributorById(
  db: Queryable,
  projectId: number,
  contributorId: number
): Promise<Contributor | null> {
  const result = await db.query<Contributor>(
    'SELECT * FROM contributors WHERE project_id = $1 AND id = $2',
    [projectId, contributorId]
  )
  return result.rows[0] || null
}

/**
 * Contributors of a project in insertion order
 */
export async function listContributors(
  db: Queryable,
  projectId: number,
  page: LimitOffset
): Promise<PageSlice<Contributor>> {
  const countResult = await db.query<{ count: string }>(
    'SELECT COUNT(*) as count FROM contributors WHERE project_id = $1',
    [projectId]
  )
  const result = await db.query<Contributor>(
    `
    SELECT * FROM contributors
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

export async function removeContributor(
  db: Queryable,
  projectId: number,
  contributorId: number
): Promise<boolean> {
  const result = await db.query('DELETE FROM contributors WHERE project_id = $1 AND id = $2', [
    projectId,
    contributorId,
  ])
  return (result.rowCount ?? 0) > 0
}

/**
 * Check if a user holds OWNER permission on a project
 */
export async function isProjectOwner(
  db: Queryable,
  projectId: number,
  userId: number
): Promise<boolean> {
  const result = await db.query<{ exists: boolean }>(
    `
    SELECT EXISTS(
      SELECT 1 FROM contributors
      WHERE project_id = $1 AND user_id = $2 AND permission = 'OWNER'
    ) as exists
    `,
    [projectId, userId]
  )

  return result.rows[0]?.exists ?? false
}

/**
 * Check if a user is a contributor (OWNER or CONTRIBUTOR) of a project
 */
export async function isProjectMember(
  db: Queryable,
  projectId: number,
  userId: number
): Promise<boolean> {
  const result = await db.query<{ exists: boolean }>(
    `
    SELECT EXISTS(
      SELECT 1 FROM contributors
      WHERE project_id = $1 AND user_id = $2
    ) as exists
    `,
    [projectId, userId]
  )

  return result.rows[0]?.exists ?? false
}
