import { STATUS_CODES } from 'node:http'

/**
 * Compact reason phrase for a status code: 401 -> "Unauthorized",
 * 404 -> "NotFound". Unknown codes fall back to the number.
 */
export const statusName = (status: number): string => {
  const phrase = STATUS_CODES[status]
  if (!phrase) {
    return String(status)
  }
  return phrase.replace(/[^A-Za-z]/g, '')
}
