import { Hono } from 'hono'
import { buildPage, type ApiEnv } from '@issuetrack/shared'
import type { RouteDeps } from './types'
import { getPrincipal } from '../middleware/auth'
import { serializeContributor } from '../serializers'
import { getPageRequest, methodNotAllowed, parseIdParam, readJson } from './helpers'

export function createProjectMemberRoutes({ services, pageSize }: RouteDeps) {
  const members = new Hono<ApiEnv>()

  // GET /projects/:id/users - List contributors (owner only)
  members.get('/:id/users', async c => {
    const page = getPageRequest(c, pageSize)
    const slice = await services.contributors.listMembers(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      page
    )
    return c.json(buildPage(slice, page, c.req.url, serializeContributor))
  })

  // POST /projects/:id/users - Add a contributor (owner only)
  members.post('/:id/users', async c => {
    const contributor = await services.contributors.addMember(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      await readJson(c)
    )
    return c.json(serializeContributor(contributor), 201)
  })

  // DELETE /projects/:id/users/:contributorId - Remove a contributor (owner only)
  members.delete('/:id/users/:contributorId', async c => {
    await services.contributors.removeMember(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('contributorId'))
    )
    return c.body(null, 204)
  })

  members.on(['GET', 'PUT', 'PATCH'], '/:id/users/:contributorId', methodNotAllowed)

  return members
}
