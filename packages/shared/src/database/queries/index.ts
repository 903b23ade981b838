export * from './user-queries'
export * from './project-queries'
export * from './contributor-queries'
export * from './issue-queries'
export * from './comment-queries'
export type { Queryable } from '../types'
