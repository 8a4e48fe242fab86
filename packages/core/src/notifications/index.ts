/**
 * Notifications module exports
 */

export {
  DispatchCoordinator,
  capMessageLength,
  MAX_MESSAGE_LENGTH,
  TRUNCATED_MESSAGE_LENGTH,
  OMITTED_SUFFIX,
} from './dispatcher.js'
export type { DispatchCoordinatorConfig } from './dispatcher.js'

export type {
  SendResult,
  Notifier,
  OutboundMessage,
  DispatchFailure,
  DispatchResult,
} from './types.js'
