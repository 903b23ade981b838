import { Hono } from 'hono'
import { buildPage, type ApiEnv } from '@issuetrack/shared'
import type { RouteDeps } from './types'
import { getPrincipal } from '../middleware/auth'
import { serializeProjectDetail, serializeProjectListItem } from '../serializers'
import { getPageRequest, methodNotAllowed, parseIdParam, readJson } from './helpers'

export function createProjectRoutes({ services, pageSize }: RouteDeps) {
  const projects = new Hono<ApiEnv>()

  // GET /projects - Projects the user contributes to, newest first
  projects.get('/', async c => {
    const page = getPageRequest(c, pageSize)
    const slice = await services.projects.listProjects(getPrincipal(c), page)
    return c.json(buildPage(slice, page, c.req.url, serializeProjectListItem))
  })

  // POST /projects - Create a project; the creator becomes its owner
  projects.post('/', async c => {
    const project = await services.projects.createProject(getPrincipal(c), await readJson(c))
    return c.json(serializeProjectDetail(project), 201)
  })

  // GET /projects/:id - Project detail (contributors only)
  projects.get('/:id', async c => {
    const project = await services.projects.getProject(
      getPrincipal(c),
      parseIdParam(c.req.param('id'))
    )
    return c.json(serializeProjectDetail(project))
  })

  // PUT /projects/:id - Replace a project (author only)
  projects.put('/:id', async c => {
    const project = await services.projects.updateProject(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      await readJson(c)
    )
    return c.json(serializeProjectDetail(project))
  })

  // DELETE /projects/:id - Delete a project and everything in it (author only)
  projects.delete('/:id', async c => {
    await services.projects.deleteProject(getPrincipal(c), parseIdParam(c.req.param('id')))
    return c.body(null, 204)
  })

  projects.patch('/:id', methodNotAllowed)

  return projects
}
