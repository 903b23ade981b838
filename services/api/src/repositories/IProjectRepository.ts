import type {
  CreateProjectRequest,
  LimitOffset,
  PageSlice,
  Project,
  UpdateProjectRequest,
} from '@issuetrack/shared'

export interface IProjectRepository {
  /**
   * Insert the project and its author's OWNER membership atomically
   */
  createWithOwner(request: CreateProjectRequest, authorUserId: number): Promise<Project>
  findById(id: number): Promise<Project | null>
  /**
   * Projects the user is a contributor of, newest first
   */
  listForUser(userId: number, page: LimitOffset): Promise<PageSlice<Project>>
  update(id: number, request: UpdateProjectRequest): Promise<Project>
  /**
   * Removes the project with its contributors, issues and comments
   */
  delete(id: number): Promise<boolean>
}
