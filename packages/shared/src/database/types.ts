import type { QueryResult, QueryResultRow } from 'pg'

/**
 * Anything that can run a parameterized query: a Pool or a checked-out client
 * inside a transaction
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>
}
