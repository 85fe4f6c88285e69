import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../../src/app.ts'
import { clearConfigCache } from '../../src/auth/config.ts'
import type { HttpClient } from '../../src/http/types.ts'

const createHttpClient = (): HttpClient => ({
  execute: vi.fn<HttpClient['execute']>().mockResolvedValue({
    status: 200,
    statusText: 'OK',
    content: 'access_token=test-access-token&expires_on=3600',
  }),
  executeJson: vi.fn<HttpClient['executeJson']>(async (_request, parse) => {
    const body = { id: '10001', name: 'Test User', username: 'testuser' }
    return {
      status: 200,
      statusText: 'OK',
      content: JSON.stringify(body),
      data: parse(body),
    }
  }),
})

const startLogin = async (app: ReturnType<typeof createApp>) => {
  const res = await app.request('/auth/facebook')
  const location = res.headers.get('Location') ?? ''
  return { res, location, state: new URL(location).searchParams.get('state') }
}

describe('Facebook login flow', () => {
  const originalEnv = process.env

  beforeEach(() => {
    process.env = { ...originalEnv }
    process.env.FACEBOOK_APP_ID = 'test-facebook-app-id'
    process.env.FACEBOOK_APP_SECRET = 'test-facebook-app-secret'
    process.env.APP_BASE_URL = 'https://login.example.com'
    delete process.env.OAUTH_STATE_TTL_SECONDS
    clearConfigCache()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    process.env = originalEnv
    clearConfigCache()
    vi.restoreAllMocks()
  })

  it('should return name and version from /about', async () => {
    const app = createApp({ httpClient: createHttpClient() })
    const res = await app.request('/about')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      name: 'facebook-auth-client',
      version: '1.0.0',
    })
  })

  it('should redirect to the Facebook login dialog with a state', async () => {
    const app = createApp({ httpClient: createHttpClient() })
    const { res, location, state } = await startLogin(app)

    expect(res.status).toBe(302)
    const url = new URL(location)
    expect(url.hostname).toBe('www.facebook.com')
    expect(url.pathname.endsWith('/dialog/oauth')).toBe(true)
    expect(url.searchParams.get('client_id')).toBe('test-facebook-app-id')
    expect(url.searchParams.get('redirect_uri')).toBe(
      'https://login.example.com/auth/facebook/callback',
    )
    expect(url.searchParams.get('response_type')).toBe('code')
    expect(state).toHaveLength(32)
  })

  it('should authenticate a callback carrying the issued state', async () => {
    const httpClient = createHttpClient()
    const app = createApp({ httpClient })
    const { state } = await startLogin(app)

    const res = await app.request(
      `/auth/facebook/callback?code=test-code&state=${state}`,
    )

    expect(res.status).toBe(200)
    const body = (await res.json()) as Record<string, unknown>
    expect(body.provider).toBe('facebook')
    expect(body.user).toEqual({
      id: '10001',
      name: 'Test User',
      userName: 'testuser',
      isVerified: false,
    })
    expect(typeof body.expires_on).toBe('string')
    expect(JSON.stringify(body)).not.toContain('test-access-token')
    expect(httpClient.execute).toHaveBeenCalledWith({
      url: expect.stringContaining('/oauth/access_token'),
      query: {
        client_id: 'test-facebook-app-id',
        client_secret: 'test-facebook-app-secret',
        redirect_uri: 'https://login.example.com/auth/facebook/callback',
        code: 'test-code',
      },
    })
  })

  it('should not accept the same state twice', async () => {
    const app = createApp({ httpClient: createHttpClient() })
    const { state } = await startLogin(app)

    await app.request(`/auth/facebook/callback?code=test-code&state=${state}`)
    const replay = await app.request(
      `/auth/facebook/callback?code=test-code&state=${state}`,
    )

    expect(replay.status).toBe(401)
    expect(await replay.json()).toEqual({
      error: 'authentication_failed',
      error_description:
        "The states do not match. It's possible that you may be a victim of a CSRF.",
    })
  })

  it('should reject a state it never issued without calling Facebook', async () => {
    const httpClient = createHttpClient()
    const app = createApp({ httpClient })

    const res = await app.request(
      '/auth/facebook/callback?code=test-code&state=forged',
    )

    expect(res.status).toBe(401)
    expect(httpClient.execute).not.toHaveBeenCalled()
  })

  it('should require a state alongside the code', async () => {
    const app = createApp({ httpClient: createHttpClient() })

    const res = await app.request('/auth/facebook/callback?code=test-code')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'invalid_request',
      error_description: 'state is required',
    })
  })

  it('should surface the error Facebook reports on the redirect', async () => {
    const app = createApp({ httpClient: createHttpClient() })

    const res = await app.request(
      '/auth/facebook/callback?error=access_denied&error_reason=user_denied&error_description=Permissions+error',
    )

    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({
      error: 'authentication_failed',
      error_description:
        'Reason: user_denied. Error: access_denied. Description: Permissions error.',
    })
  })

  it('should answer 400 for a request that is not a callback', async () => {
    const app = createApp({ httpClient: createHttpClient() })

    const res = await app.request('/auth/facebook/callback?foo=bar')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      error: 'invalid_request',
      error_description: 'Not a Facebook authorization callback',
    })
  })

  it('should answer 503 when Facebook is not configured', async () => {
    delete process.env.FACEBOOK_APP_SECRET
    const app = createApp({ httpClient: createHttpClient() })

    const login = await app.request('/auth/facebook')
    const callback = await app.request('/auth/facebook/callback?code=abc')

    expect(login.status).toBe(503)
    expect(callback.status).toBe(503)
  })
})
