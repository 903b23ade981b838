import { Hono } from 'hono'
import { buildPage, type ApiEnv } from '@issuetrack/shared'
import type { RouteDeps } from './types'
import { getPrincipal } from '../middleware/auth'
import { serializeIssue } from '../serializers'
import { getPageRequest, methodNotAllowed, parseIdParam, readJson } from './helpers'

export function createIssueRoutes({ services, pageSize }: RouteDeps) {
  const issues = new Hono<ApiEnv>()

  // GET /projects/:id/issues - List issues in creation order (contributors)
  issues.get('/:id/issues', async c => {
    const page = getPageRequest(c, pageSize)
    const slice = await services.issues.listIssues(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      page
    )
    return c.json(buildPage(slice, page, c.req.url, serializeIssue))
  })

  // POST /projects/:id/issues - Open an issue (contributors)
  issues.post('/:id/issues', async c => {
    const issue = await services.issues.createIssue(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      await readJson(c)
    )
    return c.json(serializeIssue(issue), 201)
  })

  // PUT /projects/:id/issues/:issueId - Replace an issue (author only)
  issues.put('/:id/issues/:issueId', async c => {
    const issue = await services.issues.updateIssue(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      await readJson(c)
    )
    return c.json(serializeIssue(issue))
  })

  // DELETE /projects/:id/issues/:issueId - Delete an issue (author only)
  issues.delete('/:id/issues/:issueId', async c => {
    await services.issues.deleteIssue(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId'))
    )
    return c.body(null, 204)
  })

  // Issues are only retrieved through the list
  issues.on(['GET', 'PATCH'], '/:id/issues/:issueId', methodNotAllowed)

  return issues
}
