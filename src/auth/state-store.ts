import { nanoid } from 'nanoid'

interface StateEntry {
  expiresAt: number
}

export interface StateStore {
  /** Issue a fresh state value valid for the store's TTL. */
  issue: () => string
  /** Remove and return the state if it was issued and has not expired. */
  consume: (state: string) => string | null
}

/**
 * In-memory state store for OAuth CSRF protection.
 * Single use: a consumed state cannot be replayed.
 */
export const createStateStore = (ttlSeconds: number): StateStore => {
  const entries = new Map<string, StateEntry>()

  const pruneExpired = (): void => {
    const now = Date.now()
    for (const [key, value] of entries.entries()) {
      if (value.expiresAt < now) {
        entries.delete(key)
      }
    }
  }

  return {
    issue: () => {
      pruneExpired()
      const state = nanoid(32)
      entries.set(state, { expiresAt: Date.now() + ttlSeconds * 1000 })
      return state
    },
    consume: (state) => {
      const entry = entries.get(state)
      entries.delete(state)
      pruneExpired()
      if (!entry || entry.expiresAt < Date.now()) {
        return null
      }
      return state
    },
  }
}
