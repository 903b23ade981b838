export * from './users'
export * from './projects'
export * from './contributors'
export * from './issues'
export * from './comments'
export * from './pagination'
export * from './errors'
export * from './hono'
