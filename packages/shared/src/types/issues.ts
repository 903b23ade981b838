export interface Issue {
  id: number
  project_id: number
  title: string
  description: string
  tag: string
  priority: string
  status: string
  author_user_id: number | null
  assignee_user_id: number | null
  created_time: Date
}

export interface IssueFields {
  title: string
  description: string
  tag: string
  priority: string
  status: string
  assignee_user_id?: number | null
}

/**
 * Row to persist once author and assignee have been resolved
 */
export interface NewIssue extends Omit<IssueFields, 'assignee_user_id'> {
  project_id: number
  author_user_id: number
  assignee_user_id: number
}
