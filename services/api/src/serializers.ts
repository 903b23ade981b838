import type { Comment, Contributor, Issue, Project, PublicUser, User } from '@issuetrack/shared'

/**
 * Response shapes. Rows are never returned as-is: each resource is mapped
 * to the fields its endpoint exposes.
 */

export function serializeUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
  }
}

// description is write-only in lists
export function serializeProjectListItem(project: Project) {
  return {
    id: project.id,
    title: project.title,
    type: project.type,
    author_user_id: project.author_user_id,
  }
}

export function serializeProjectDetail(project: Project) {
  return {
    id: project.id,
    title: project.title,
    description: project.description,
    type: project.type,
    author_user_id: project.author_user_id,
  }
}

export function serializeContributor(contributor: Contributor) {
  return {
    id: contributor.id,
    project_id: contributor.project_id,
    user_id: contributor.user_id,
    permission: contributor.permission,
    role: contributor.role,
  }
}

export function serializeIssue(issue: Issue) {
  return {
    id: issue.id,
    project_id: issue.project_id,
    title: issue.title,
    description: issue.description,
    tag: issue.tag,
    priority: issue.priority,
    status: issue.status,
    author_user_id: issue.author_user_id,
    assignee_user_id: issue.assignee_user_id,
    created_time: issue.created_time.toISOString(),
  }
}

export function serializeComment(comment: Comment) {
  return {
    id: comment.id,
    issue_id: comment.issue_id,
    author_user_id: comment.author_user_id,
    description: comment.description,
    created_time: comment.created_time.toISOString(),
  }
}
