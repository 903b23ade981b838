import bcrypt from 'bcryptjs'
import {
  config,
  ConflictError,
  normalizeEmail,
  parseWith,
  signupSchema,
  loginSchema,
  AuthenticationError,
  ValidationError,
  type CreateUserRequest,
  type User,
} from '@issuetrack/shared'
import type { IUserRepository } from '../repositories/IUserRepository'
import { logger } from '../middleware/logger'

const DUPLICATE_EMAIL = 'user with this email already exists.'

/**
 * Account creation and credential verification
 */
export class UserService {
  constructor(
    private readonly users: IUserRepository,
    private readonly bcryptRounds: number = config.auth.bcryptRounds
  ) {}

  /**
   * Public signup: validates the payload, then creates a regular account
   */
  async signup(input: unknown): Promise<User> {
    const data = parseWith(signupSchema, input)
    return this.createUser(data)
  }

  /**
   * Create an account with a hashed password.
   * The email's domain part is lower-cased before storage and lookup.
   */
  async createUser(account: CreateUserRequest): Promise<User> {
    const email = normalizeEmail(account.email)
    if (!email) {
      throw ValidationError.forField('email', 'User must have an email address.')
    }

    if (await this.users.findByEmail(email)) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL)
    }

    const passwordHash = await bcrypt.hash(account.password, this.bcryptRounds)

    try {
      const user = await this.users.create({
        email,
        password_hash: passwordHash,
        first_name: account.first_name ?? '',
        last_name: account.last_name ?? '',
        is_staff: account.is_staff ?? false,
        is_superuser: account.is_superuser ?? false,
      })

      logger.info('User created', { userId: user.id, metadata: { staff: user.is_staff } })
      return user
    } catch (error) {
      // Lost a race against a concurrent signup for the same email
      if (error instanceof ConflictError) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL)
      }
      throw error
    }
  }

  async createSuperuser(email: string, password: string): Promise<User> {
    return this.createUser({ email, password, is_staff: true, is_superuser: true })
  }

  /**
   * Check an email/password pair.
   * @throws ValidationError for a missing or blank field
   * @throws AuthenticationError for unknown, inactive or wrong credentials
   */
  async verifyCredentials(input: unknown): Promise<User> {
    const { email, password } = parseWith(loginSchema, input)

    const user = await this.users.findByEmail(normalizeEmail(email) ?? email)
    if (!user || !user.is_active) {
      throw new AuthenticationError('No active account found with the given credentials')
    }

    const matches = await bcrypt.compare(password, user.password_hash)
    if (!matches) {
      throw new AuthenticationError('No active account found with the given credentials')
    }

    return user
  }

  async getActiveUser(id: number): Promise<User | null> {
    const user = await this.users.findById(id)
    return user && user.is_active ? user : null
  }
}
