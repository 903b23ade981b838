export interface Comment {
  id: number
  issue_id: number
  author_user_id: number | null
  description: string
  created_time: Date
}
