import { beforeEach, describe, expect, it } from 'vitest'
import jwt from 'jsonwebtoken'
import { AuthenticationError, ValidationError } from '@issuetrack/shared'
import { createTestContext, TEST_PASSWORD, TEST_SECRET, type TestContext } from './helpers/fixtures'

describe('UserService', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
  })

  it('stores a bcrypt hash, never the password', async () => {
    const user = await ctx.services.users.signup({
      email: 'Jane@Example.COM',
      password: TEST_PASSWORD,
      first_name: 'Jane',
    })

    expect(user.email).toBe('Jane@example.com')
    expect(user.first_name).toBe('Jane')
    expect(user.last_name).toBe('')
    expect(user.password_hash).not.toBe(TEST_PASSWORD)
    expect(user.password_hash.startsWith('$2')).toBe(true)
  })

  it('rejects a duplicate email', async () => {
    await ctx.services.users.signup({ email: 'jane@example.com', password: TEST_PASSWORD })

    const error = await ctx.services.users
      .signup({ email: 'jane@EXAMPLE.com', password: TEST_PASSWORD })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ValidationError)
    if (error instanceof ValidationError) {
      expect(error.fields).toEqual({ email: ['user with this email already exists.'] })
    }
  })

  it('rejects a short password', async () => {
    await expect(
      ctx.services.users.signup({ email: 'jane@example.com', password: 'short' })
    ).rejects.toThrow(ValidationError)
  })

  it('refuses an empty email when creating accounts directly', async () => {
    await expect(
      ctx.services.users.createUser({ email: '  ', password: TEST_PASSWORD })
    ).rejects.toThrow('User must have an email address.')
  })

  it('creates superusers with staff rights', async () => {
    const admin = await ctx.services.users.createSuperuser('admin@example.com', TEST_PASSWORD)

    expect(admin.is_staff).toBe(true)
    expect(admin.is_superuser).toBe(true)
  })
})

describe('TokenService', () => {
  let ctx: TestContext

  beforeEach(async () => {
    ctx = createTestContext()
    await ctx.services.users.signup({ email: 'jane@example.com', password: TEST_PASSWORD })
  })

  it('issues an access/refresh pair for valid credentials', async () => {
    const pair = await ctx.services.tokens.login({
      email: 'jane@example.com',
      password: TEST_PASSWORD,
    })

    const access = jwt.verify(pair.access, TEST_SECRET)
    const refresh = jwt.verify(pair.refresh, TEST_SECRET)
    expect(access).toMatchObject({ user_id: 1, token_type: 'access' })
    expect(refresh).toMatchObject({ user_id: 1, token_type: 'refresh' })
  })

  it('rejects a wrong password', async () => {
    await expect(
      ctx.services.tokens.login({ email: 'jane@example.com', password: 'not-the-password' })
    ).rejects.toThrow('No active account found with the given credentials')
  })

  it('rejects an inactive account', async () => {
    ctx.store.users[0].is_active = false

    await expect(
      ctx.services.tokens.login({ email: 'jane@example.com', password: TEST_PASSWORD })
    ).rejects.toThrow(AuthenticationError)
  })

  it('resolves an access token to its principal', async () => {
    const pair = await ctx.services.tokens.login({
      email: 'jane@example.com',
      password: TEST_PASSWORD,
    })

    expect(await ctx.services.tokens.authenticate(pair.access)).toEqual({
      id: 1,
      email: 'jane@example.com',
      is_staff: false,
      is_superuser: false,
    })
  })

  it('refuses a refresh token as an access token', async () => {
    const pair = await ctx.services.tokens.login({
      email: 'jane@example.com',
      password: TEST_PASSWORD,
    })

    await expect(ctx.services.tokens.authenticate(pair.refresh)).rejects.toThrow(
      'Token has wrong type, expected access'
    )
  })

  it('exchanges a refresh token for a new access token', async () => {
    const pair = await ctx.services.tokens.login({
      email: 'jane@example.com',
      password: TEST_PASSWORD,
    })

    const { access } = await ctx.services.tokens.refresh({ refresh: pair.refresh })

    expect(access).not.toBe(pair.access)
    expect(await ctx.services.tokens.authenticate(access)).toMatchObject({ id: 1 })
  })

  it('rejects tokens signed with another secret', async () => {
    const forged = jwt.sign({ user_id: 1, token_type: 'access' }, 'other-secret')

    await expect(ctx.services.tokens.authenticate(forged)).rejects.toThrow(
      'Token is invalid or expired'
    )
    expect(() => ctx.services.tokens.verify({ token: forged })).toThrow(AuthenticationError)
  })

  it('rejects expired tokens', async () => {
    const expired = jwt.sign({ user_id: 1, token_type: 'access' }, TEST_SECRET, {
      expiresIn: -10,
    })

    await expect(ctx.services.tokens.authenticate(expired)).rejects.toThrow(
      'Token is invalid or expired'
    )
  })

  it('verifies a valid token of either type', async () => {
    const pair = await ctx.services.tokens.login({
      email: 'jane@example.com',
      password: TEST_PASSWORD,
    })

    expect(ctx.services.tokens.verify({ token: pair.refresh })).toEqual({})
  })
})
