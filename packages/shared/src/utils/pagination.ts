import type { Page, PageRequest, PageSlice } from '../types/pagination'
import { NotFoundError } from '../types/errors'
import { MAX_ID } from './validation'

export interface LimitOffset {
  limit: number
  offset: number
}

/**
 * Pages whose offset leaves the INTEGER range cannot exist
 */
export function toPageRequest(page: number, pageSize: number): PageRequest {
  if ((page - 1) * pageSize > MAX_ID) {
    throw new NotFoundError('Invalid page.')
  }
  return { page, pageSize }
}

export function toLimitOffset(request: PageRequest): LimitOffset {
  return {
    limit: request.pageSize,
    offset: (request.page - 1) * request.pageSize,
  }
}

/**
 * Pages past the last one are an error; page 1 of an empty list is not
 */
export function assertPageInRange(request: PageRequest, count: number): void {
  if (request.page > 1 && (request.page - 1) * request.pageSize >= count) {
    throw new NotFoundError('Invalid page.')
  }
}

function pageUrl(requestUrl: string, page: number): string {
  const url = new URL(requestUrl)
  if (page <= 1) {
    url.searchParams.delete('page')
  } else {
    url.searchParams.set('page', String(page))
  }
  return url.toString()
}

/**
 * Wrap one page of rows in the `{count, next, previous, results}` envelope
 */
export function buildPage<T, R = T>(
  slice: PageSlice<T>,
  request: PageRequest,
  requestUrl: string,
  serialize: (item: T) => R
): Page<R> {
  const hasNext = request.page * request.pageSize < slice.count
  const hasPrevious = request.page > 1

  return {
    count: slice.count,
    next: hasNext ? pageUrl(requestUrl, request.page + 1) : null,
    previous: hasPrevious ? pageUrl(requestUrl, request.page - 1) : null,
    results: slice.items.map(serialize),
  }
}
