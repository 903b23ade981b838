/**
 * Paginated list envelope returned by every list endpoint
 */
export interface Page<T> {
  count: number
  next: string | null
  previous: string | null
  results: T[]
}

export interface PageRequest {
  page: number
  pageSize: number
}

export interface PageSlice<T> {
  count: number
  items: T[]
}
