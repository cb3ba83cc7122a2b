import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { FakeCollectionClient } from '../helpers/fake-client'
import { startTestServer, type TestServer } from '../helpers/test-server'

/**
 * Contract test for POST /api/auth and the web authorization flow
 */
describe('Authentication - Contract Test', () => {
  let server: TestServer
  let client: FakeCollectionClient

  beforeAll(async () => {
    client = new FakeCollectionClient()
    server = await startTestServer({ client })
  })

  afterAll(async () => {
    await server.close()
  })

  it('signs in with explicit credentials and sets a session cookie', async () => {
    const browser = server.browser()

    const response = await browser.request('/api/auth', {
      method: 'POST',
      body: {
        consumerKey: 'test-key',
        consumerSecret: 'test-secret',
        token: 'test-token',
        tokenSecret: 'test-token-secret'
      }
    })

    expect(response.status).toBe(200)
    expect(response.headers.get('set-cookie')).toMatch(/^qrl_session=[0-9a-f-]{36}; .*HttpOnly/)
    expect(response._data).toEqual({
      success: true,
      data: {
        stage: 'Authenticated',
        username: 'crate-digger',
        folder: null,
        releaseCount: 0,
        selectedCount: 0,
        sort: null
      }
    })
  })

  it('falls back to the configured credentials', async () => {
    const response = await server.browser().request('/api/auth', { method: 'POST' })

    expect(response.status).toBe(200)
    expect(response._data).toMatchObject({ success: true, data: { stage: 'Authenticated' } })
  })

  it('answers 401 when Discogs rejects the token', async () => {
    const response = await server.browser().request('/api/auth', {
      method: 'POST',
      body: { token: 'revoked-token' }
    })

    expect(response.status).toBe(401)
    expect(response._data).toMatchObject({
      success: false,
      statusCode: 401,
      error: { code: 'AUTH_ERROR', retryable: false }
    })
  })

  it('answers 400 for fields it does not know', async () => {
    const response = await server.browser().request('/api/auth', {
      method: 'POST',
      body: { password: 'test-secret' }
    })

    expect(response.status).toBe(400)
    expect(response._data).toMatchObject({
      success: false,
      error: { code: 'VALIDATION_ERROR', details: { field: 'password' } }
    })
  })

  it('completes the web authorization flow', async () => {
    const browser = server.browser()

    const started = await browser.request('/api/auth/authorize')
    expect(started.status).toBe(200)
    expect(started._data).toEqual({
      success: true,
      data: { authorizeUrl: 'https://www.discogs.com/oauth/authorize?oauth_token=req-token' }
    })
    expect(client.callbackUrls).toContain('http://localhost:3000/api/auth/callback')

    const finished = await browser.request('/api/auth/callback?oauth_token=req-token&oauth_verifier=verifier-1')
    expect(finished.status).toBe(200)
    expect(finished._data).toMatchObject({ success: true, data: { stage: 'Authenticated', username: 'crate-digger' } })
  })

  it('refuses a callback for a token it did not hand out', async () => {
    const browser = server.browser()
    await browser.request('/api/auth/authorize')

    const response = await browser.request('/api/auth/callback?oauth_token=other-token&oauth_verifier=verifier-1')

    expect(response.status).toBe(401)
    expect(response._data).toMatchObject({ error: { code: 'AUTH_ERROR' } })
  })

  it('answers 409 when folders are requested before signing in', async () => {
    const response = await server.browser().request('/api/folders')

    expect(response.status).toBe(409)
    expect(response._data).toMatchObject({
      success: false,
      statusCode: 409,
      error: {
        code: 'SEQUENCE_ERROR',
        details: { requiredStage: 'Authenticated', currentStage: 'Unauthenticated' }
      }
    })
  })
})
