/**
 * Database models for projects
 */

export interface Project {
  id: number
  title: string
  description: string
  type: string
  author_user_id: number | null
  created_at: Date
}

export interface CreateProjectRequest {
  title: string
  description: string
  type: string
}

// Full replace only: every field is required on update
export type UpdateProjectRequest = CreateProjectRequest
