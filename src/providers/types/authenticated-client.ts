import type { AuthenticationError } from '../authentication-error.ts'
import type { ProviderType } from './provider-type.ts'

export interface AccessToken {
  token: string
  /** Expiry as epoch milliseconds */
  expiresAt: number
}

/**
 * Profile subset normalized from the provider's "me" payload.
 * `id` is the provider's positive integer id as a decimal string; Graph ids
 * do not fit in a double.
 */
export interface UserInformation {
  id: string
  name: string
  userName: string
  firstName?: string
  lastName?: string
  locale?: string
  link?: string
  timezone?: number
  isVerified: boolean
}

export interface ErrorInformation {
  message: string
  cause?: AuthenticationError
}

export interface AuthenticatedClientSuccess {
  status: 'authenticated'
  providerType: ProviderType
  accessToken: AccessToken
  userInformation: UserInformation
  errorInformation: null
}

export interface AuthenticatedClientFailure {
  status: 'failed'
  providerType: ProviderType
  /** Present when the token exchange succeeded and a later step failed */
  accessToken?: AccessToken
  userInformation: null
  errorInformation: ErrorInformation
}

export type AuthenticatedClient =
  | AuthenticatedClientSuccess
  | AuthenticatedClientFailure
