import type { Pool } from 'pg'
import type { Issue, LimitOffset, NewIssue, PageSlice } from '@issuetrack/shared'
import {
  createIssue,
  deleteIssue,
  getIssueById,
  listIssues,
  updateIssue,
} from '@issuetrack/shared/database/queries'
import type { IIssueRepository } from './IIssueRepository'

export class DatabaseIssueRepository implements IIssueRepository {
  constructor(private readonly db: Pool) {}

  create(issue: NewIssue): Promise<Issue> {
    return createIssue(this.db, issue)
  }

  findById(projectId: number, issueId: number): Promise<Issue | null> {
    return getIssueById(this.db, projectId, issueId)
  }

  list(projectId: number, page: LimitOffset): Promise<PageSlice<Issue>> {
    return listIssues(this.db, projectId, page)
  }

  update(issueId: number, fields: Omit<NewIssue, 'project_id' | 'author_user_id'>): Promise<Issue> {
    return updateIssue(this.db, issueId, fields)
  }

  delete(issueId: number): Promise<boolean> {
    return deleteIssue(this.db, issueId)
  }
}
