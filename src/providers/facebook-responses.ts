import { parseNumber } from '../plumbing/parse-number.ts'

export interface FacebookTokenContent {
  accessToken?: string
  /** Seconds until the token expires */
  expiresIn?: number
}

export interface MeResponse {
  id?: string
  first_name?: string
  last_name?: string
  link?: string
  locale?: string
  name?: string
  timezone?: number
  username?: string
  verified?: boolean
}

const POSITIVE_INTEGER = /^[1-9]\d*$/

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const optionalString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

const scalarString = (value: unknown): string | undefined =>
  typeof value === 'number' ? String(value) : optionalString(value)

const parseExpiresIn = (value: string | undefined): number | undefined => {
  const seconds = parseNumber(value, -1)
  return seconds >= 0 ? seconds : undefined
}

const parseJsonTokenContent = (content: string): FacebookTokenContent => {
  let value: unknown
  try {
    value = JSON.parse(content)
  } catch {
    return {}
  }
  if (!isRecord(value)) {
    return {}
  }
  return {
    accessToken: optionalString(value.access_token),
    expiresIn: parseExpiresIn(
      scalarString(value.expires_on) ??
        scalarString(value.expires_in) ??
        scalarString(value.expires),
    ),
  }
}

/**
 * Parse the body of the access_token endpoint. Older Graph versions answer
 * with `access_token=...&expires=...`; current ones with a JSON object.
 */
export const parseTokenContent = (content: string): FacebookTokenContent => {
  const trimmed = content.trim()
  if (trimmed.startsWith('{')) {
    return parseJsonTokenContent(trimmed)
  }

  const params = new URLSearchParams(trimmed)
  return {
    accessToken: optionalString(params.get('access_token')),
    expiresIn: parseExpiresIn(
      params.get('expires_on') ??
        params.get('expires_in') ??
        params.get('expires') ??
        undefined,
    ),
  }
}

const readId = (value: unknown): string | undefined => {
  const id = scalarString(value)
  return id && POSITIVE_INTEGER.test(id) ? id : undefined
}

/**
 * Narrow a deserialized /me body. Throws when the body is not an object.
 */
export const readMeResponse = (value: unknown): MeResponse => {
  if (!isRecord(value)) {
    throw new Error('Facebook /me response is not a JSON object')
  }
  return {
    id: readId(value.id),
    first_name: optionalString(value.first_name),
    last_name: optionalString(value.last_name),
    link: optionalString(value.link),
    locale: optionalString(value.locale),
    name: optionalString(value.name),
    timezone: typeof value.timezone === 'number' ? value.timezone : undefined,
    username: optionalString(value.username),
    verified: typeof value.verified === 'boolean' ? value.verified : undefined,
  }
}
