import { randomUUID } from 'crypto'
import jwt, { type JwtPayload } from 'jsonwebtoken'
import { z } from 'zod'
import {
  AuthenticationError,
  parseWith,
  refreshSchema,
  verifySchema,
  type Principal,
  type TokenClaims,
  type TokenPair,
  type TokenType,
  type User,
} from '@issuetrack/shared'
import type { UserService } from './UserService'

export interface TokenServiceOptions {
  secret: string
  // seconds
  accessTokenTtl: number
  refreshTokenTtl: number
}

const claimsSchema = z.object({
  user_id: z.number().int().positive(),
  token_type: z.enum(['access', 'refresh']),
})

const INVALID_TOKEN = 'Token is invalid or expired'

/**
 * Issues and checks HS256 JWT access/refresh pairs
 */
export class TokenService {
  constructor(
    private readonly userService: UserService,
    private readonly options: TokenServiceOptions
  ) {}

  /**
   * Exchange credentials for a token pair
   */
  async login(input: unknown): Promise<TokenPair> {
    const user = await this.userService.verifyCredentials(input)
    return this.issuePair(user)
  }

  issuePair(user: User): TokenPair {
    return {
      access: this.sign(user.id, 'access'),
      refresh: this.sign(user.id, 'refresh'),
    }
  }

  /**
   * Exchange a refresh token for a new access token
   */
  async refresh(input: unknown): Promise<{ access: string }> {
    const { refresh } = parseWith(refreshSchema, input)
    const claims = this.decode(refresh, 'refresh')
    await this.requireActiveUser(claims.user_id)
    return { access: this.sign(claims.user_id, 'access') }
  }

  /**
   * Check that a token of either type is well-formed, signed and unexpired
   */
  verify(input: unknown): Record<string, never> {
    const { token } = parseWith(verifySchema, input)
    this.decode(token)
    return {}
  }

  /**
   * Resolve an access token to the principal it was issued to
   */
  async authenticate(accessToken: string): Promise<Principal> {
    const claims = this.decode(accessToken, 'access')
    const user = await this.requireActiveUser(claims.user_id)

    return {
      id: user.id,
      email: user.email,
      is_staff: user.is_staff,
      is_superuser: user.is_superuser,
    }
  }

  private sign(userId: number, tokenType: TokenType): string {
    const claims: TokenClaims = { user_id: userId, token_type: tokenType }
    return jwt.sign({ ...claims, jti: randomUUID() }, this.options.secret, {
      algorithm: 'HS256',
      expiresIn:
        tokenType === 'access' ? this.options.accessTokenTtl : this.options.refreshTokenTtl,
    })
  }

  private decode(token: string, expected?: TokenType): TokenClaims {
    let payload: string | JwtPayload
    try {
      payload = jwt.verify(token, this.options.secret, { algorithms: ['HS256'] })
    } catch {
      throw new AuthenticationError(INVALID_TOKEN)
    }

    const parsed = claimsSchema.safeParse(payload)
    if (!parsed.success) {
      throw new AuthenticationError(INVALID_TOKEN)
    }
    if (expected && parsed.data.token_type !== expected) {
      throw new AuthenticationError(`Token has wrong type, expected ${expected}`)
    }
    return parsed.data
  }

  private async requireActiveUser(userId: number): Promise<User> {
    const user = await this.userService.getActiveUser(userId)
    if (!user) {
      throw new AuthenticationError('User not found or inactive')
    }
    return user
  }
}
