import { beforeEach, describe, expect, it } from 'vitest'
import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
  type Principal,
  type Project,
} from '@issuetrack/shared'
import {
  createPrincipal,
  createProject,
  createTestContext,
  ISSUE_PAYLOAD,
  type TestContext,
} from './helpers/fixtures'

describe('IssueService', () => {
  let ctx: TestContext
  let author: Principal
  let member: Principal
  let outsider: Principal
  let project: Project

  beforeEach(async () => {
    ctx = createTestContext()
    author = await createPrincipal(ctx, 'author@example.com')
    member = await createPrincipal(ctx, 'member@example.com')
    outsider = await createPrincipal(ctx, 'outsider@example.com')
    project = await createProject(ctx, author)
    await ctx.repos.contributors.add(project.id, member.id, 'CONTRIBUTOR', '')
  })

  describe('createIssue', () => {
    it('assigns the author when no assignee is given', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)

      expect(issue).toMatchObject({
        ...ISSUE_PAYLOAD,
        project_id: project.id,
        author_user_id: member.id,
        assignee_user_id: member.id,
      })
      expect(ctx.store.issues).toHaveLength(1)
    })

    it('assigns an explicit assignee who is a contributor', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, {
        ...ISSUE_PAYLOAD,
        assignee_user_id: author.id,
      })

      expect(issue.assignee_user_id).toBe(author.id)
    })

    it('treats a null assignee as absent', async () => {
      const issue = await ctx.services.issues.createIssue(author, project.id, {
        ...ISSUE_PAYLOAD,
        assignee_user_id: null,
      })

      expect(issue.assignee_user_id).toBe(author.id)
    })

    it('rejects an assignee outside the project', async () => {
      const error = await ctx.services.issues
        .createIssue(member, project.id, { ...ISSUE_PAYLOAD, assignee_user_id: outsider.id })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.fields).toEqual({
          assignee_user_id: ['The assignee must be a contributor of this project.'],
        })
      }
      expect(ctx.store.issues).toHaveLength(0)
    })

    it('ignores author and project fields in the payload', async () => {
      const other = await createProject(ctx, outsider, 'Other')

      const issue = await ctx.services.issues.createIssue(member, project.id, {
        ...ISSUE_PAYLOAD,
        author_user_id: outsider.id,
        project_id: other.id,
      })

      expect(issue.author_user_id).toBe(member.id)
      expect(issue.project_id).toBe(project.id)
    })

    it('requires every mandatory field', async () => {
      const error = await ctx.services.issues
        .createIssue(member, project.id, { title: 'Only a title' })
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(Object.keys(error.fields).sort()).toEqual(['priority', 'status', 'tag'])
      }
    })

    it('is refused to non-contributors', async () => {
      await expect(
        ctx.services.issues.createIssue(outsider, project.id, ISSUE_PAYLOAD)
      ).rejects.toThrow(ForbiddenError)
    })

    it('reports a missing project as not found', async () => {
      await expect(ctx.services.issues.createIssue(member, 999, ISSUE_PAYLOAD)).rejects.toThrow(
        NotFoundError
      )
    })
  })

  describe('listIssues', () => {
    it('lists the issues of the project in creation order', async () => {
      const first = await ctx.services.issues.createIssue(author, project.id, ISSUE_PAYLOAD)
      const second = await ctx.services.issues.createIssue(member, project.id, {
        ...ISSUE_PAYLOAD,
        title: 'Second',
      })

      const slice = await ctx.services.issues.listIssues(member, project.id, {
        page: 1,
        pageSize: 10,
      })

      expect(slice.count).toBe(2)
      expect(slice.items.map(i => i.id)).toEqual([first.id, second.id])
    })

    it('is refused to non-contributors', async () => {
      await expect(
        ctx.services.issues.listIssues(outsider, project.id, { page: 1, pageSize: 10 })
      ).rejects.toThrow('You are not a contributor of this project.')
    })
  })

  describe('updateIssue', () => {
    it('replaces the fields of an issue', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)

      const updated = await ctx.services.issues.updateIssue(member, project.id, issue.id, {
        ...ISSUE_PAYLOAD,
        status: 'Finished',
        assignee_user_id: author.id,
      })

      expect(updated).toMatchObject({
        id: issue.id,
        status: 'Finished',
        author_user_id: member.id,
        assignee_user_id: author.id,
      })
    })

    it('is reserved to the issue author', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)

      await expect(
        ctx.services.issues.updateIssue(author, project.id, issue.id, ISSUE_PAYLOAD)
      ).rejects.toThrow('Only the issue author can modify this issue.')
    })

    it('does not find an issue through another project', async () => {
      const other = await createProject(ctx, member, 'Other')
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)

      await expect(
        ctx.services.issues.updateIssue(member, other.id, issue.id, ISSUE_PAYLOAD)
      ).rejects.toThrow('Issue not found.')
    })
  })

  describe('deleteIssue', () => {
    it('deletes the issue with its comments', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)
      await ctx.services.comments.createComment(author, project.id, issue.id, {
        description: 'Confirmed',
      })

      await ctx.services.issues.deleteIssue(member, project.id, issue.id)

      expect(ctx.store.issues).toHaveLength(0)
      expect(ctx.store.comments).toHaveLength(0)
    })

    it('is reserved to the issue author', async () => {
      const issue = await ctx.services.issues.createIssue(member, project.id, ISSUE_PAYLOAD)

      await expect(
        ctx.services.issues.deleteIssue(author, project.id, issue.id)
      ).rejects.toThrow(ForbiddenError)
      expect(ctx.store.issues).toHaveLength(1)
    })
  })
})
