import type { Pool } from 'pg'
import type { Project, CreateProjectRequest, UpdateProjectRequest } from '../../types/projects'
import type { PageSlice } from '../../types/pagination'
import type { LimitOffset } from '../../utils/pagination'
import { getMembershipJoin } from '../../utils/auth'
import type { Queryable } from '../types'
import { ensureOwnerContributor } from './contributor-queries'

/**
 * Insert a project row; does not create the owner membership
 */
export async function createProject(
  db: Queryable,
  request: CreateProjectRequest,
  authorUserId: number
): Promise<Project> {
  const result = await db.query<Project>(
    `
    INSERT INTO projects (title, description, type, author_user_id)
    VALUES ($1, $2, $3, $4)
    RETURNING *
    `,
    [request.title, request.description, request.type, authorUserId]
  )
  return result.rows[0]
}

/**
 * Create a project and its author's OWNER membership in one transaction
 */
export async function createProjectWithOwner(
  pool: Pool,
  request: CreateProjectRequest,
  authorUserId: number
): Promise<Project> {
  const client = await pool.connect()

  try {
    await client.query('BEGIN')
    const project = await createProject(client, request, authorUserId)
    await ensureOwnerContributor(client, project.id, authorUserId)
    await client.query('COMMIT')
    return project
  } catch (error) {
    await client.query('ROLLBACK')
    throw error
  } finally {
    client.release()
  }
}

export async function getProjectById(db: Queryable, id: number): Promise<Project | null> {
  const result = await db.query<Project>('SELECT * FROM projects WHERE id = $1', [id])
  return result.rows[0] || null
}

/**
 * Projects the user is a contributor of, newest first
 */
export async function listProjectsForUser(
  db: Queryable,
  userId: number,
  page: LimitOffset
): Promise<PageSlice<Project>> {
  const countResult = await db.query<{ count: string }>(
    `SELECT COUNT(*) as count FROM projects p ${getMembershipJoin('$1')}`,
    [userId]
  )
  const result = await db.query<Project>(
    `
    SELECT p.*
    FROM projects p
    ${getMembershipJoin('$1')}
    ORDER BY p.id DESC
    LIMIT $2 OFFSET $3
    `,
    [userId, page.limit, page.offset]
  )

  return {
    count: parseInt(countResult.rows[0]?.count ?? '0', 10),
    items: result.rows,
  }
}

/**
 * Replace a project's editable fields
 */
export async function updateProject(
  db: Queryable,
  id: number,
  request: UpdateProjectRequest
): Promise<Project> {
  const result = await db.query<Project>(
    `
    UPDATE projects
    SET title = $2, description = $3, type = $4
    WHERE id = $1
    RETURNING *
    `,
    [id, request.title, request.description, request.type]
  )

  if (result.rows.length === 0) {
    throw new Error(`Project with ID ${id} not found`)
  }

  return result.rows[0]
}

/**
 * Delete a project (cascades to contributors, issues and their comments)
 */
export async function deleteProject(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query('DELETE FROM projects WHERE id = $1', [id])
  return (result.rowCount ?? 0) > 0
}
