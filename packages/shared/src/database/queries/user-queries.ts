import type { User } from '../../types/users'
import type { Queryable } from '../types'

export interface InsertUserParams {
  email: string
  password_hash: string
  first_name: string
  last_name: string
  is_staff: boolean
  is_superuser: boolean
}

/**
 * Insert a user; a duplicate email surfaces as a unique violation (23505)
 */
export async function createUser(db: Queryable, params: InsertUserParams): Promise<User> {
  const result = await db.query<User>(
    `
    INSERT INTO users (email, password_hash, first_name, last_name, is_staff, is_superuser)
    VALUES ($1, $2, $3, $4, $5, $6)
    RETURNING *
    `,
    [
      params.email,
      params.password_hash,
      params.first_name,
      params.last_name,
      params.is_staff,
      params.is_superuser,
    ]
  )
  return result.rows[0]
}

export async function getUserById(db: Queryable, id: number): Promise<User | null> {
  const result = await db.query<User>('SELECT * FROM users WHERE id = $1', [id])
  return result.rows[0] || null
}

export async function getUserByEmail(db: Queryable, email: string): Promise<User | null> {
  const result = await db.query<User>('SELECT * FROM users WHERE email = $1', [email])
  return result.rows[0] || null
}
