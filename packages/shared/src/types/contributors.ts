/**
 * Database models for project membership and ownership
 */

export const CONTRIBUTOR_PERMISSIONS = ['OWNER', 'CONTRIBUTOR'] as const

export type ContributorPermission = (typeof CONTRIBUTOR_PERMISSIONS)[number]

export interface Contributor {
  id: number
  project_id: number
  user_id: number | null
  permission: ContributorPermission
  role: string
}
