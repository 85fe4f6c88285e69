/**
 * Base types for external identity providers.
 * The result shape lives in types/authenticated-client.ts.
 */
import type { CallbackParameters } from './callback-parameters.ts'
import type { AuthenticatedClient } from './types/authenticated-client.ts'
import type { ProviderType } from './types/provider-type.ts'

export interface AuthenticationProvider {
  readonly providerType: ProviderType
  /** Login dialog URL that starts the authorization-code flow. */
  getAuthorizationUrl: (state: string) => string
  /**
   * Complete the flow from the provider's redirect parameters.
   * Resolves to null when the parameters are not a callback for this
   * provider; never rejects.
   */
  authenticateClient: (
    inputParameters: CallbackParameters,
    expectedState: string,
  ) => Promise<AuthenticatedClient | null>
}
