/**
 * HTTP request utility for the intra API.
 * Handles auth headers, timeouts, debug logging and error mapping.
 */

import { SessionError } from '../errors'
import log from '../logger'

// =============================================================================
// Request logging
// =============================================================================

function redact(value: string): string {
  if (value.length <= 2) return '**'
  return value.slice(0, 2) + '**'
}

const SECRET_PARAMS = ['client_secret', 'access_token']

/**
 * Mask secrets in a URL or form body before logging it
 */
export function redactParams(text: string): string {
  return text.replace(/([?&]|^)([^=&?]+)=([^&]*)/g, (match, sep: string, key: string, value: string) =>
    SECRET_PARAMS.includes(key) ? `${sep}${key}=${redact(value)}` : match
  )
}

function logRequest(method: string, url: string, headers: Record<string, string>, body?: string): void {
  const redactedHeaders: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === 'authorization') {
      const parts = value.split(' ')
      redactedHeaders[key] = parts.length === 2 ? `${parts[0]} ${redact(parts[1] ?? '')}` : redact(value)
    } else {
      redactedHeaders[key] = value
    }
  }
  log.debug(`-> ${method} ${redactParams(url)}`)
  log.debug(`  headers: ${JSON.stringify(redactedHeaders)}`)
  if (body !== undefined) {
    log.debug(`  body: ${redactParams(body)}`)
  }
}

function logResponse(status: number, statusText: string, contentType: string | null): void {
  log.debug(`<- ${status} ${statusText} [${contentType || 'no content-type'}]`)
}

// =============================================================================
// Core request utility
// =============================================================================

export const DEFAULT_TIMEOUT = 30000 // 30 seconds

export interface RequestOptions {
  method?: string
  body?: string
  contentType?: string
  token?: string
  timeout?: number
}

/**
 * Pull a human-readable message out of an intra error body.
 * OAuth errors carry error_description, API errors carry error or message.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined
  for (const key of ['error_description', 'message', 'error']) {
    if (key in body) {
      const value: unknown = Reflect.get(body, key)
      if (typeof value === 'string' && value) return value
    }
  }
  return undefined
}

function parseErrorBody(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * Make an API request and return the raw response body.
 *
 * @param url - Absolute request URL
 * @param options - Request options
 * @returns The response body as text
 */
export async function request(url: string, options: RequestOptions = {}): Promise<string> {
  const method = options.method || 'GET'
  const timeout = options.timeout || DEFAULT_TIMEOUT

  const headers: Record<string, string> = { Accept: 'application/json' }
  if (options.contentType) {
    headers['Content-Type'] = options.contentType
  }
  if (options.token) {
    headers['Authorization'] = `Bearer ${options.token}`
  }

  logRequest(method, url, headers, options.body)

  // Execute request with timeout
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeout)

  let response: Response
  try {
    response = await fetch(url, {
      method,
      headers,
      body: options.body,
      signal: controller.signal,
    })
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new SessionError('Request timed out', 0)
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new SessionError(`Request failed: ${message}`, 0)
  } finally {
    clearTimeout(timeoutId)
  }

  logResponse(response.status, response.statusText, response.headers.get('content-type'))

  const text = await response.text()

  if (!response.ok) {
    log.debug(`Response body (first 500 chars): ${text.slice(0, 500)}`)

    const body = parseErrorBody(text)
    const errorMessage = extractErrorMessage(body)
      ?? `Request failed: ${response.status} ${response.statusText}`

    throw new SessionError(errorMessage, response.status, body)
  }

  return text
}
