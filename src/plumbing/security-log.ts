/**
 * Security and audit logging for the provider callback flow.
 * Never logs access tokens, authorization codes or app secrets.
 */

import type { ProviderType } from '../providers/types/provider-type.ts'
import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  provider: ProviderType
  /** Provider-side user id */
  user_id: string
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  provider: ProviderType
  reason: string
}

export interface StateRejectedEvent {
  event: 'state_rejected'
  provider: ProviderType
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | StateRejectedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log(
    {
      message: 'Security event',
      security_event: event,
    },
    event.event === 'auth_success' ? 'info' : 'warn',
  )
}
