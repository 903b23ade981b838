import type { User } from '@issuetrack/shared'
import type { InsertUserParams } from '@issuetrack/shared/database/queries'

/**
 * Repository interface for user accounts.
 * `create` throws ConflictError when the email is already registered.
 */
export interface IUserRepository {
  create(params: InsertUserParams): Promise<User>
  findById(id: number): Promise<User | null>
  findByEmail(email: string): Promise<User | null>
}
