import { getApiUrl, type AppConfig } from '../config'
import { UrlConstructionError } from '../errors'
import log from '../logger'
import { request } from './request'
import { decodeJson, tokenInfoSchema, type TokenInfo } from './types'

/**
 * What the rest of the CLI needs from an authenticated session:
 * one GET primitive plus the identity it was created with.
 */
export interface AuthenticatedSession {
  call(url: string): Promise<string>
  getClientId(): string
  getLogin(): string
}

export interface SessionOptions {
  /** API base URL, defaults to INTRA_API_URL or https://api.intra.42.fr */
  apiUrl?: string
  /** Per-request timeout in milliseconds */
  timeout?: number
}

/**
 * Build an absolute API URL from a base URL and a path.
 * Any base path prefix is kept.
 */
export function apiEndpoint(apiUrl: string, path: string): URL {
  try {
    return new URL(`${apiUrl.replace(/\/+$/, '')}${path}`)
  } catch (err) {
    throw new UrlConstructionError(`Invalid API URL: ${apiUrl}`, { cause: err })
  }
}

/**
 * Exchange the OAuth application credentials for an access token
 * (client_credentials grant).
 */
export async function requestToken(config: AppConfig, apiUrl: string, timeout?: number): Promise<TokenInfo> {
  const url = apiEndpoint(apiUrl, '/oauth/token')
  const body = new URLSearchParams({
    grant_type: 'client_credentials',
    client_id: config.client_id,
    client_secret: config.client_secret,
  })

  const text = await request(url.toString(), {
    method: 'POST',
    body: body.toString(),
    contentType: 'application/x-www-form-urlencoded',
    timeout,
  })
  return decodeJson(text, tokenInfoSchema, 'token')
}

/**
 * Session authenticated with the configured OAuth application.
 * The token lives for the process only; nothing is cached on disk.
 */
export class Session implements AuthenticatedSession {
  private constructor(
    private readonly config: AppConfig,
    private readonly token: TokenInfo,
    private readonly timeout?: number
  ) {}

  static async create(config: AppConfig, options: SessionOptions = {}): Promise<Session> {
    const apiUrl = options.apiUrl ?? getApiUrl()
    log.debug(`Requesting access token from ${apiUrl}`)
    const token = await requestToken(config, apiUrl, options.timeout)
    return new Session(config, token, options.timeout)
  }

  async call(url: string): Promise<string> {
    return request(url, { token: this.token.access_token, timeout: this.timeout })
  }

  getClientId(): string {
    return this.config.client_id
  }

  getLogin(): string {
    return this.config.login
  }
}
