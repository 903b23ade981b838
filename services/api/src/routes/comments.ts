import { Hono } from 'hono'
import { buildPage, type ApiEnv } from '@issuetrack/shared'
import type { RouteDeps } from './types'
import { getPrincipal } from '../middleware/auth'
import { serializeComment } from '../serializers'
import { getPageRequest, methodNotAllowed, parseIdParam, readJson } from './helpers'

const COLLECTION = '/:id/issues/:issueId/comments'
const DETAIL = '/:id/issues/:issueId/comments/:commentId'

export function createCommentRoutes({ services, pageSize }: RouteDeps) {
  const comments = new Hono<ApiEnv>()

  comments.get(COLLECTION, async c => {
    const page = getPageRequest(c, pageSize)
    const slice = await services.comments.listComments(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      page
    )
    return c.json(buildPage(slice, page, c.req.url, serializeComment))
  })

  comments.post(COLLECTION, async c => {
    const comment = await services.comments.createComment(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      await readJson(c)
    )
    return c.json(serializeComment(comment), 201)
  })

  comments.get(DETAIL, async c => {
    const comment = await services.comments.getComment(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      parseIdParam(c.req.param('commentId'))
    )
    return c.json(serializeComment(comment))
  })

  comments.put(DETAIL, async c => {
    const comment = await services.comments.updateComment(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      parseIdParam(c.req.param('commentId')),
      await readJson(c)
    )
    return c.json(serializeComment(comment))
  })

  comments.delete(DETAIL, async c => {
    await services.comments.deleteComment(
      getPrincipal(c),
      parseIdParam(c.req.param('id')),
      parseIdParam(c.req.param('issueId')),
      parseIdParam(c.req.param('commentId'))
    )
    return c.body(null, 204)
  })

  comments.patch(DETAIL, methodNotAllowed)

  return comments
}
