import type { Contributor, ContributorPermission, LimitOffset, PageSlice } from '@issuetrack/shared'

/**
 * Repository interface for project membership.
 * `add` throws ConflictError when (project, user) already has a row.
 */
export interface IContributorRepository {
  add(
    projectId: number,
    userId: number,
    permission: ContributorPermission,
    role: string
  ): Promise<Contributor>
  /**
   * Insert-or-skip of the OWNER row for (project, user)
   * @returns true when a row was inserted
   */
  ensureOwner(projectId: number, userId: number): Promise<boolean>
  findById(projectId: number, contributorId: number): Promise<Contributor | null>
  /**
   * Contributors in insertion order
   */
  list(projectId: number, page: LimitOffset): Promise<PageSlice<Contributor>>
  remove(projectId: number, contributorId: number): Promise<boolean>
  isOwner(projectId: number, userId: number): Promise<boolean>
  isMember(projectId: number, userId: number): Promise<boolean>
}
