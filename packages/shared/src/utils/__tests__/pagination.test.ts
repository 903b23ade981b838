import { describe, it, expect } from 'vitest'
import { assertPageInRange, buildPage, toLimitOffset, toPageRequest } from '../pagination'
import { NotFoundError } from '../../types/errors'

describe('toLimitOffset', () => {
  it('converts a page number to an offset', () => {
    expect(toLimitOffset({ page: 3, pageSize: 10 })).toEqual({ limit: 10, offset: 20 })
  })
})

describe('toPageRequest', () => {
  it('keeps pages whose offset fits an INTEGER', () => {
    expect(toPageRequest(4, 10)).toEqual({ page: 4, pageSize: 10 })
    expect(toPageRequest(1073741824, 2)).toEqual({ page: 1073741824, pageSize: 2 })
  })

  it('rejects pages whose offset overflows an INTEGER', () => {
    expect(() => toPageRequest(1073741825, 2)).toThrow('Invalid page.')
    expect(() => toPageRequest(2147483647, 10)).toThrow(NotFoundError)
  })
})

describe('assertPageInRange', () => {
  it('allows the first page of an empty list', () => {
    expect(() => assertPageInRange({ page: 1, pageSize: 10 }, 0)).not.toThrow()
  })

  it('rejects a page that starts past the last row', () => {
    expect(() => assertPageInRange({ page: 2, pageSize: 10 }, 10)).toThrow(NotFoundError)
    expect(() => assertPageInRange({ page: 2, pageSize: 10 }, 11)).not.toThrow()
  })
})

describe('buildPage', () => {
  const slice = { count: 25, items: [1, 2, 3] }

  it('links both neighbours of a middle page', () => {
    const page = buildPage(
      slice,
      { page: 2, pageSize: 10 },
      'http://api.test/projects?page=2&sort=x',
      n => n * 10
    )

    expect(page).toEqual({
      count: 25,
      next: 'http://api.test/projects?page=3&sort=x',
      previous: 'http://api.test/projects?sort=x',
      results: [10, 20, 30],
    })
  })

  it('has no next link on the last page', () => {
    const page = buildPage(slice, { page: 3, pageSize: 10 }, 'http://api.test/projects?page=3', n => n)

    expect(page.next).toBeNull()
    expect(page.previous).toBe('http://api.test/projects?page=2')
  })
})
