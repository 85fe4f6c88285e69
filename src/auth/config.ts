import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-number.ts'

export interface AuthConfig {
  port: number
  baseUrl: string
  stateTtlSeconds: number
}

let cachedConfig: AuthConfig | null = null

const validateConfig = (config: AuthConfig): void => {
  const errors: string[] = []

  if (!config.baseUrl) {
    errors.push('APP_BASE_URL must be set')
  } else if (!config.baseUrl.match(/^https?:\/\//)) {
    errors.push('APP_BASE_URL must be a valid URL (http:// or https://)')
  }

  if (config.stateTtlSeconds <= 0) {
    errors.push('OAUTH_STATE_TTL_SECONDS must be greater than zero')
  }

  if (errors.length > 0) {
    throw new Error(
      `Auth configuration validation failed:\n${errors.join('\n')}`,
    )
  }
}

export const getAuthConfig = (): AuthConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const port = parseNumber(process.env.PORT, 3000)
  const baseUrlEnv = process.env.APP_BASE_URL
  // Explicitly empty is an error; unset falls back to localhost
  const baseUrl =
    baseUrlEnv !== undefined
      ? baseUrlEnv.trim().replace(/\/$/, '')
      : `http://localhost:${port}`

  const config: AuthConfig = {
    port,
    baseUrl,
    stateTtlSeconds: parseNumber(process.env.OAUTH_STATE_TTL_SECONDS, 600),
  }

  validateConfig(config)
  cachedConfig = config

  log('Auth configuration validated and loaded')

  return config
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}

export const getFacebookRedirectUri = (): string =>
  `${getAuthConfig().baseUrl}/auth/facebook/callback`
