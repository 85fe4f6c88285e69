import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.ts'
import { getAuthConfig } from './auth/config.ts'
import { log } from './plumbing/logger.ts'
import { getFacebookConfig } from './providers/facebook-config.ts'

const { port, baseUrl } = getAuthConfig()

if (!process.env.PORT) {
  log('process.env.PORT is undefined - defaulting to 3000')
}
if (!getFacebookConfig().isConfigured) {
  log(
    'FACEBOOK_APP_ID or FACEBOOK_APP_SECRET is unset - Facebook login is disabled',
    'warn',
  )
}

serve({ fetch: createApp().fetch, port }, () => {
  log(`Auth service listening at ${baseUrl}`)
})
