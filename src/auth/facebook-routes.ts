import { Hono } from 'hono'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { AuthenticationProvider } from '../providers/base.ts'
import { normalizeParameters } from '../providers/callback-parameters.ts'
import type { StateStore } from './state-store.ts'

export interface FacebookRoutesOptions {
  /** Unset when FACEBOOK_APP_ID / FACEBOOK_APP_SECRET are missing */
  provider: AuthenticationProvider | null
  stateStore: StateStore
}

const notConfigured = {
  error:
    'Facebook OAuth is not configured. Set FACEBOOK_APP_ID and FACEBOOK_APP_SECRET.',
}

export const createFacebookRoutes = (options: FacebookRoutesOptions) => {
  const { provider, stateStore } = options
  const routes = new Hono()

  /**
   * GET /auth/facebook
   * Redirect to the Facebook login dialog with a fresh CSRF state.
   */
  routes.get('/facebook', (c) => {
    if (!provider) {
      return c.json(notConfigured, 503)
    }
    return c.redirect(provider.getAuthorizationUrl(stateStore.issue()), 302)
  })

  /**
   * GET /auth/facebook/callback
   * Complete the flow with the redirect's query parameters.
   */
  routes.get('/facebook/callback', async (c) => {
    if (!provider) {
      return c.json(notConfigured, 503)
    }

    const query = new URL(c.req.url).searchParams
    const params = normalizeParameters(query)
    const state = params.get('state')

    if (params.has('code') && state === undefined) {
      return c.json(
        { error: 'invalid_request', error_description: 'state is required' },
        400,
      )
    }

    const expectedState =
      state !== undefined ? stateStore.consume(state) : null
    if (state !== undefined && expectedState === null) {
      logSecurityEvent({ event: 'state_rejected', provider: 'facebook' })
    }

    const result = await provider.authenticateClient(query, expectedState ?? '')

    if (!result) {
      return c.json(
        {
          error: 'invalid_request',
          error_description: 'Not a Facebook authorization callback',
        },
        400,
      )
    }

    if (result.status === 'failed') {
      logSecurityEvent({
        event: 'auth_failure',
        provider: result.providerType,
        reason: result.errorInformation.message,
      })
      return c.json(
        {
          error: 'authentication_failed',
          error_description: result.errorInformation.message,
        },
        401,
      )
    }

    logSecurityEvent({
      event: 'auth_success',
      provider: result.providerType,
      user_id: result.userInformation.id,
    })
    return c.json(
      {
        provider: result.providerType,
        user: result.userInformation,
        expires_on: new Date(result.accessToken.expiresAt).toISOString(),
      },
      200,
    )
  })

  return routes
}
