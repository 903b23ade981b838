import type { Pool } from 'pg'
import type {
  CreateProjectRequest,
  LimitOffset,
  PageSlice,
  Project,
  UpdateProjectRequest,
} from '@issuetrack/shared'
import {
  createProjectWithOwner,
  deleteProject,
  getProjectById,
  listProjectsForUser,
  updateProject,
} from '@issuetrack/shared/database/queries'
import type { IProjectRepository } from './IProjectRepository'

/**
 * PostgreSQL implementation of IProjectRepository
 */
export class DatabaseProjectRepository implements IProjectRepository {
  constructor(private readonly db: Pool) {}

  createWithOwner(request: CreateProjectRequest, authorUserId: number): Promise<Project> {
    return createProjectWithOwner(this.db, request, authorUserId)
  }

  findById(id: number): Promise<Project | null> {
    return getProjectById(this.db, id)
  }

  listForUser(userId: number, page: LimitOffset): Promise<PageSlice<Project>> {
    return listProjectsForUser(this.db, userId, page)
  }

  update(id: number, request: UpdateProjectRequest): Promise<Project> {
    return updateProject(this.db, id, request)
  }

  delete(id: number): Promise<boolean> {
    return deleteProject(this.db, id)
  }
}
