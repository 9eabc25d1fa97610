import { describe, expect, test, beforeAll, afterAll } from 'vitest'
import { extractErrorMessage, redactParams, request } from '../../../src/api/request'
import { SessionError } from '../../../src/errors'
import { MockApiServer } from '../../mock-api-server'

describe('redactParams', () => {
  test('masks client_secret in a form body', () => {
    expect(redactParams('grant_type=client_credentials&client_id=abc&client_secret=s3cret')).toBe(
      'grant_type=client_credentials&client_id=abc&client_secret=s3**'
    )
  })

  test('masks access_token in a query string', () => {
    expect(redactParams('http://x.test/v2/me?access_token=abcdef&page=2')).toBe(
      'http://x.test/v2/me?access_token=ab**&page=2'
    )
  })

  test('leaves other parameters untouched', () => {
    const url = 'https://api.intra.42.fr/v2/users?client_id=abc&filter%5Blogin%5D=jdoe'
    expect(redactParams(url)).toBe(url)
  })
})

describe('extractErrorMessage', () => {
  test('prefers error_description', () => {
    expect(extractErrorMessage({ error: 'invalid_client', error_description: 'Client authentication failed' })).toBe(
      'Client authentication failed'
    )
  })

  test('falls back to message, then error', () => {
    expect(extractErrorMessage({ message: 'Record not found' })).toBe('Record not found')
    expect(extractErrorMessage({ error: 'Not Found' })).toBe('Not Found')
  })

  test('returns undefined for non-objects and empty values', () => {
    expect(extractErrorMessage('oops')).toBeUndefined()
    expect(extractErrorMessage(null)).toBeUndefined()
    expect(extractErrorMessage({ error: '' })).toBeUndefined()
  })
})

describe('request', () => {
  const server = new MockApiServer()
  let baseUrl: string

  beforeAll(async () => {
    server
      .route('GET /ok', () => ({ body: { hello: 'world' } }))
      .route('GET /unauthorized', () => ({
        status: 401,
        body: { error: 'invalid_token', error_description: 'The access token is invalid' },
      }))
      .route('GET /plain-error', () => ({ status: 500, body: 'upstream exploded', contentType: 'text/plain' }))
      .route('GET /slow', () => ({ delay: 500, body: {} }))
      .route('POST /echo', (req) => ({ body: { received: req.body } }))
    baseUrl = await server.start()
  })

  afterAll(async () => {
    await server.stop()
  })

  test('returns the raw body on success', async () => {
    expect(await request(`${baseUrl}/ok`)).toBe('{"hello":"world"}')
  })

  test('sends the bearer token', async () => {
    await request(`${baseUrl}/ok`, { token: 'test-token' })
    const last = server.requests[server.requests.length - 1]
    expect(last?.headers.authorization).toBe('Bearer test-token')
  })

  test('sends the body with its content type', async () => {
    const text = await request(`${baseUrl}/echo`, {
      method: 'POST',
      body: 'a=1&b=2',
      contentType: 'application/x-www-form-urlencoded',
    })
    expect(JSON.parse(text)).toEqual({ received: 'a=1&b=2' })
    const last = server.requests[server.requests.length - 1]
    expect(last?.headers['content-type']).toBe('application/x-www-form-urlencoded')
  })

  test('maps an error response to SessionError with the API message', async () => {
    const error = await request(`${baseUrl}/unauthorized`).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SessionError)
    expect(error).toMatchObject({
      message: 'The access token is invalid',
      status: 401,
      body: { error: 'invalid_token', error_description: 'The access token is invalid' },
    })
  })

  test('keeps a non-JSON error body as text', async () => {
    const error = await request(`${baseUrl}/plain-error`).catch((err: unknown) => err)
    expect(error).toMatchObject({
      message: 'Request failed: 500 Internal Server Error',
      status: 500,
      body: 'upstream exploded',
    })
  })

  test('times out with status 0', async () => {
    const error = await request(`${baseUrl}/slow`, { timeout: 50 }).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SessionError)
    expect(error).toMatchObject({ message: 'Request timed out', status: 0 })
  })

  test('maps a connection failure to SessionError with status 0', async () => {
    const error = await request('http://127.0.0.1:1/unreachable').catch((err: unknown) => err)
    expect(error).toBeInstanceOf(SessionError)
    expect(error).toMatchObject({ status: 0 })
  })
})
