import type { Contributor, Principal, Project, User } from '@issuetrack/shared'
import { createServices, type Services } from '../../src/services'
import type { Repositories } from '../../src/repositories/create-repositories'
import { createInMemoryRepositories, InMemoryStore } from './in-memory-repositories'

export const TEST_SECRET = 'test-secret'
export const TEST_PASSWORD = 'test-password'

export interface TestContext {
  store: InMemoryStore
  repos: Repositories
  services: Services
}

export function createTestContext(): TestContext {
  const store = new InMemoryStore()
  const repos = createInMemoryRepositories(store)
  const services = createServices(repos, {
    secret: TEST_SECRET,
    accessTokenTtl: 300,
    refreshTokenTtl: 86400,
    bcryptRounds: 4,
  })
  return { store, repos, services }
}

export function toPrincipal(user: User): Principal {
  return {
    id: user.id,
    email: user.email,
    is_staff: user.is_staff,
    is_superuser: user.is_superuser,
  }
}

export async function createPrincipal(ctx: TestContext, email: string): Promise<Principal> {
  const user = await ctx.services.users.createUser({ email, password: TEST_PASSWORD })
  return toPrincipal(user)
}

export async function createProject(
  ctx: TestContext,
  author: Principal,
  title = 'Tracker'
): Promise<Project> {
  return ctx.services.projects.createProject(author, { title, type: 'back-end' })
}

/**
 * The stored membership row of `userId` in `projectId`
 */
export function getMembership(ctx: TestContext, projectId: number, userId: number): Contributor {
  const row = ctx.store.contributors.find(
    contributor => contributor.project_id === projectId && contributor.user_id === userId
  )
  if (!row) {
    throw new Error(`user ${userId} is not a member of project ${projectId}`)
  }
  return row
}

export const ISSUE_PAYLOAD = {
  title: 'Login button misaligned',
  description: 'Shifted two pixels left',
  tag: 'BUG',
  priority: 'LOW',
  status: 'To Do',
}
