import type { Pool } from 'pg'
import { ConflictError, getPgErrorCode, PG_UNIQUE_VIOLATION, type User } from '@issuetrack/shared'
import {
  createUser,
  getUserByEmail,
  getUserById,
  type InsertUserParams,
} from '@issuetrack/shared/database/queries'
import type { IUserRepository } from './IUserRepository'

/**
 * PostgreSQL implementation of IUserRepository
 */
export class DatabaseUserRepository implements IUserRepository {
  constructor(private readonly db: Pool) {}

  async create(params: InsertUserParams): Promise<User> {
    try {
      return await createUser(this.db, params)
    } catch (error) {
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new ConflictError('A user with that email already exists.')
      }
      throw error
    }
  }

  findById(id: number): Promise<User | null> {
    return getUserById(this.db, id)
  }

  findByEmail(email: string): Promise<User | null> {
    return getUserByEmail(this.db, email)
  }
}
