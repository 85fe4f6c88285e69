import { statusName } from '../http/status-name.ts'
import type {
  HttpClient,
  HttpJsonResponse,
  HttpResponse,
} from '../http/types.ts'
import { log } from '../plumbing/logger.ts'
import { AuthenticationError, describeError } from './authentication-error.ts'
import type { AuthenticationProvider } from './base.ts'
import {
  type CallbackParameters,
  type NormalizedParameters,
  normalizeParameters,
} from './callback-parameters.ts'
import {
  FACEBOOK_AUTH_URL,
  FACEBOOK_ME_FIELDS,
  FACEBOOK_SCOPES,
  FACEBOOK_TOKEN_URL,
  FACEBOOK_USER_INFO_URL,
} from './facebook-config.ts'
import {
  type MeResponse,
  parseTokenContent,
  readMeResponse,
} from './facebook-responses.ts'
import type {
  AccessToken,
  AuthenticatedClient,
  AuthenticatedClientFailure,
  AuthenticatedClientSuccess,
  UserInformation,
} from './types/authenticated-client.ts'
import type { ProviderType } from './types/provider-type.ts'

export interface FacebookProviderOptions {
  clientId: string
  clientSecret: string
  redirectUri: string
  httpClient: HttpClient
}

const PROVIDER_TYPE: ProviderType = 'facebook'

const CSRF_MESSAGE =
  "The states do not match. It's possible that you may be a victim of a CSRF."
const TOKEN_TRANSPORT_MESSAGE =
  'Failed to retrieve an oauth access token from Facebook.'
const TOKEN_CONTENT_MESSAGE =
  "Retrieved a Facebook Access Token but it doesn't contain both the access_token and expires_on parameters."
const ME_TRANSPORT_MESSAGE =
  'Failed to retrieve any Me data from the Facebook Api.'
const ME_CONTENT_MESSAGE =
  "Retrieved some Me data from the Facebook Api but it doesn't contain a valid user id."

const ERROR_KEYS = ['error', 'error_reason', 'error_description'] as const

const tokenStatusMessage = (response: HttpResponse): string =>
  `Failed to obtain an Access Token from Facebook OR the the response was not an HTTP Status 200 OK. Response Status: ${statusName(response.status)}. Response Description: ${response.statusText}`

const meStatusMessage = (response: HttpResponse): string =>
  `Failed to obtain some Me data from the Facebook api OR the the response was not an HTTP Status 200 OK. Response Status: ${statusName(response.status)}. Response Description: ${response.statusText}`

const providerErrorMessage = (params: NormalizedParameters): string =>
  `Reason: ${params.get('error_reason') ?? ''}. Error: ${params.get('error') ?? ''}. Description: ${params.get('error_description') ?? ''}.`

const failure = (
  message: string,
  options: { cause?: AuthenticationError; accessToken?: AccessToken } = {},
): AuthenticatedClientFailure => {
  log(
    {
      message: 'Facebook authentication failed',
      reason: message,
      ...(options.cause?.cause !== undefined
        ? { error: describeError(options.cause.cause) }
        : {}),
    },
    'info',
  )

  const result: AuthenticatedClientFailure = {
    status: 'failed',
    providerType: PROVIDER_TYPE,
    ...(options.accessToken
      ? { accessToken: Object.freeze(options.accessToken) }
      : {}),
    userInformation: null,
    errorInformation: Object.freeze({
      message,
      ...(options.cause ? { cause: options.cause } : {}),
    }),
  }
  return Object.freeze(result)
}

const toUserInformation = (
  id: string,
  me: MeResponse,
): UserInformation => {
  const name = me.name ?? id
  return {
    id,
    name,
    userName: me.username ?? name,
    firstName: me.first_name,
    lastName: me.last_name,
    locale: me.locale,
    link: me.link,
    timezone: me.timezone,
    isVerified: me.verified ?? false,
  }
}

/**
 * Facebook authorization-code client.
 * Exchanges the redirect's code for an access token, then fetches /me.
 * Every failure resolves to a failed AuthenticatedClient; nothing rejects.
 */
export const createFacebookProvider = (
  options: FacebookProviderOptions,
): AuthenticationProvider => {
  const { clientId, clientSecret, redirectUri, httpClient } = options

  const retrieveAccessToken = async (
    code: string,
  ): Promise<AccessToken | AuthenticatedClientFailure> => {
    let response: HttpResponse
    try {
      response = await httpClient.execute({
        url: FACEBOOK_TOKEN_URL,
        query: {
          client_id: clientId,
          client_secret: clientSecret,
          redirect_uri: redirectUri,
          code,
        },
      })
    } catch (error) {
      return failure(TOKEN_TRANSPORT_MESSAGE, {
        cause: new AuthenticationError(TOKEN_TRANSPORT_MESSAGE, {
          cause: error,
        }),
      })
    }

    if (response.status !== 200) {
      const message = tokenStatusMessage(response)
      return failure(message, { cause: new AuthenticationError(message) })
    }

    const { accessToken, expiresIn } = parseTokenContent(response.content)
    if (!accessToken || expiresIn === undefined) {
      return failure(TOKEN_CONTENT_MESSAGE, {
        cause: new AuthenticationError(TOKEN_CONTENT_MESSAGE),
      })
    }

    return {
      token: accessToken,
      expiresAt: Date.now() + expiresIn * 1000,
    }
  }

  const retrieveMe = async (
    accessToken: AccessToken,
  ): Promise<UserInformation | AuthenticatedClientFailure> => {
    let response: HttpJsonResponse<MeResponse>
    try {
      response = await httpClient.executeJson(
        {
          url: FACEBOOK_USER_INFO_URL,
          query: {
            access_token: accessToken.token,
            fields: FACEBOOK_ME_FIELDS.join(','),
          },
        },
        readMeResponse,
      )
    } catch (error) {
      return failure(ME_TRANSPORT_MESSAGE, {
        cause: new AuthenticationError(ME_TRANSPORT_MESSAGE, { cause: error }),
        accessToken,
      })
    }

    if (response.status !== 200) {
      const message = meStatusMessage(response)
      return failure(message, {
        cause: new AuthenticationError(message),
        accessToken,
      })
    }

    const id = response.data?.id
    if (!response.data || !id) {
      return failure(ME_CONTENT_MESSAGE, {
        cause: new AuthenticationError(ME_CONTENT_MESSAGE),
        accessToken,
      })
    }

    return toUserInformation(id, response.data)
  }

  const getAuthorizationUrl = (state: string): string => {
    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: redirectUri,
      response_type: 'code',
      scope: FACEBOOK_SCOPES.join(','),
      state,
    })

    return `${FACEBOOK_AUTH_URL}?${params.toString()}`
  }

  const authenticateClient = async (
    inputParameters: CallbackParameters,
    expectedState: string,
  ): Promise<AuthenticatedClient | null> => {
    const params = normalizeParameters(inputParameters)
    const code = params.get('code')
    const hasProviderError = ERROR_KEYS.some((key) => params.has(key))

    if (hasProviderError) {
      return failure(providerErrorMessage(params))
    }

    if (!code) {
      return null
    }

    const state = params.get('state')
    if (state !== undefined && state !== expectedState) {
      return failure(CSRF_MESSAGE)
    }

    const accessToken = await retrieveAccessToken(code)
    if ('status' in accessToken) {
      return accessToken
    }

    const userInformation = await retrieveMe(accessToken)
    if ('status' in userInformation) {
      return userInformation
    }

    const result: AuthenticatedClientSuccess = {
      status: 'authenticated',
      providerType: PROVIDER_TYPE,
      accessToken: Object.freeze(accessToken),
      userInformation: Object.freeze(userInformation),
      errorInformation: null,
    }
    return Object.freeze(result)
  }

  return {
    providerType: PROVIDER_TYPE,
    getAuthorizationUrl,
    authenticateClient,
  }
}
