import { Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import { getAuthConfig, getFacebookRedirectUri } from './auth/config.ts'
import { createFacebookRoutes } from './auth/facebook-routes.ts'
import { createStateStore } from './auth/state-store.ts'
import { createFetchHttpClient } from './http/fetch-client.ts'
import type { HttpClient } from './http/types.ts'
import { createFacebookProvider } from './providers/facebook.ts'
import { getFacebookConfig } from './providers/facebook-config.ts'

const { name, version } = info

export interface AppOptions {
  httpClient?: HttpClient
}

export const createApp = (options: AppOptions = {}) => {
  const { stateTtlSeconds } = getAuthConfig()
  const { isConfigured, clientId, clientSecret } = getFacebookConfig()

  const provider = isConfigured
    ? createFacebookProvider({
        clientId,
        clientSecret,
        redirectUri: getFacebookRedirectUri(),
        httpClient: options.httpClient ?? createFetchHttpClient(),
      })
    : null

  const app = new Hono()

  app.get('/', (c) =>
    c.json({
      message: 'Start a login at /auth/facebook',
    }),
  )

  app.get('/about', (c) =>
    c.json({
      name,
      version,
    }),
  )

  app.route(
    '/auth',
    createFacebookRoutes({
      provider,
      stateStore: createStateStore(stateTtlSeconds),
    }),
  )

  return app
}
