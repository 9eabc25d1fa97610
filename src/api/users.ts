/**
 * Current-user lookup: login -> numeric id -> full profile.
 */

import { UserNotFoundError } from '../errors'
import log from '../logger'
import { apiEndpoint, type AuthenticatedSession } from './session'
import {
  decodeJson,
  userProfileSchema,
  userSummaryListSchema,
  type UserProfile,
  type UserSummary,
} from './types'

export interface ResolvedUser {
  summary: UserSummary
  profile: UserProfile
}

export interface UserResolver {
  resolve(): Promise<ResolvedUser>
}

export function buildUsersByLoginUrl(apiUrl: string, clientId: string, login: string): string {
  const url = apiEndpoint(apiUrl, '/v2/users')
  url.searchParams.set('client_id', clientId)
  url.searchParams.set('filter[login]', login)
  return url.toString()
}

export function buildUserByIdUrl(apiUrl: string, id: number, clientId: string): string {
  const url = apiEndpoint(apiUrl, `/v2/users/${encodeURIComponent(String(id))}`)
  url.searchParams.set('client_id', clientId)
  return url.toString()
}

/**
 * Resolves the session's login through the users API. Both requests run on
 * every resolve, whatever the caller needs from the result.
 */
export class ApiUserResolver implements UserResolver {
  constructor(
    private readonly session: AuthenticatedSession,
    private readonly apiUrl: string
  ) {}

  async findByLogin(): Promise<UserSummary> {
    const login = this.session.getLogin()
    const url = buildUsersByLoginUrl(this.apiUrl, this.session.getClientId(), login)

    const body = await this.session.call(url)
    const users = decodeJson(body, userSummaryListSchema, 'users')

    const [first] = users
    if (!first) {
      throw new UserNotFoundError(login)
    }
    if (users.length > 1) {
      log.debug(`${users.length} users match login "${login}", using the first`)
    }
    return first
  }

  async getProfile(id: number): Promise<UserProfile> {
    const url = buildUserByIdUrl(this.apiUrl, id, this.session.getClientId())
    const body = await this.session.call(url)
    return decodeJson(body, userProfileSchema, `users/${id}`)
  }

  async resolve(): Promise<ResolvedUser> {
    const summary = await this.findByLogin()
    const profile = await this.getProfile(summary.id)
    return { summary, profile }
  }
}
