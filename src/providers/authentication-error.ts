/**
 * Fault attached to a failed AuthenticatedClient. Wraps the transport or
 * parsing error that stopped the flow, when there was one.
 */
export class AuthenticationError extends Error {
  override readonly name = 'AuthenticationError'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
