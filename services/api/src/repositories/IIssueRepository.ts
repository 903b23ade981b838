import type { Issue, LimitOffset, NewIssue, PageSlice } from '@issuetrack/shared'

export interface IIssueRepository {
  create(issue: NewIssue): Promise<Issue>
  findById(projectId: number, issueId: number): Promise<Issue | null>
  list(projectId: number, page: LimitOffset): Promise<PageSlice<Issue>>
  update(issueId: number, fields: Omit<NewIssue, 'project_id' | 'author_user_id'>): Promise<Issue>
  delete(issueId: number): Promise<boolean>
}
