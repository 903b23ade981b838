/**
 * Identity types for accounts and authenticated principals
 */

export interface User {
  id: number
  email: string
  password_hash: string
  first_name: string
  last_name: string
  is_active: boolean
  is_staff: boolean
  is_superuser: boolean
  created_at: Date
}

/**
 * User as returned by the API (no password hash)
 */
export type PublicUser = Pick<User, 'id' | 'email' | 'first_name' | 'last_name'>

export interface CreateUserRequest {
  email: string
  password: string
  first_name?: string
  last_name?: string
  is_staff?: boolean
  is_superuser?: boolean
}

/**
 * The authenticated identity making a request.
 * Passed explicitly to every service operation.
 */
export interface Principal {
  id: number
  email: string
  is_staff: boolean
  is_superuser: boolean
}

export type TokenType = 'access' | 'refresh'

export interface TokenPair {
  access: string
  refresh: string
}

export interface TokenClaims {
  user_id: number
  token_type: TokenType
}
