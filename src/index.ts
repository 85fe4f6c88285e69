export { createFetchHttpClient } from './http/fetch-client.ts'
export type {
  HttpClient,
  HttpJsonResponse,
  HttpRequest,
  HttpResponse,
} from './http/types.ts'
export {
  AuthenticationError,
  describeError,
} from './providers/authentication-error.ts'
export type { AuthenticationProvider } from './providers/base.ts'
export type { CallbackParameters } from './providers/callback-parameters.ts'
export {
  createFacebookProvider,
  type FacebookProviderOptions,
} from './providers/facebook.ts'
export { getFacebookConfig } from './providers/facebook-config.ts'
export type {
  AccessToken,
  AuthenticatedClient,
  AuthenticatedClientFailure,
  AuthenticatedClientSuccess,
  ErrorInformation,
  UserInformation,
} from './providers/types/authenticated-client.ts'
export type { ProviderType } from './providers/types/provider-type.ts'
