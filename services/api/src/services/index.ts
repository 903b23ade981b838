import type { Repositories } from '../repositories/create-repositories'
import { AuthorizationService } from './AuthorizationService'
import { CommentService } from './CommentService'
import { ContributorService } from './ContributorService'
import { IssueService } from './IssueService'
import { ProjectService } from './ProjectService'
import { TokenService, type TokenServiceOptions } from './TokenService'
import { UserService } from './UserService'

export interface Services {
  users: UserService
  tokens: TokenService
  authorization: AuthorizationService
  projects: ProjectService
  contributors: ContributorService
  issues: IssueService
  comments: CommentService
}

export interface ServiceOptions extends TokenServiceOptions {
  bcryptRounds: number
}

/**
 * Wire the domain services on top of a set of repositories
 */
export function createServices(repos: Repositories, options: ServiceOptions): Services {
  const authorization = new AuthorizationService(repos)
  const users = new UserService(repos.users, options.bcryptRounds)

  return {
    users,
    tokens: new TokenService(users, options),
    authorization,
    projects: new ProjectService(repos, authorization),
    contributors: new ContributorService(repos, authorization),
    issues: new IssueService(repos, authorization),
    comments: new CommentService(repos, authorization),
  }
}
