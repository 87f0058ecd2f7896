/**
 * Callback module: evaluation notification.
 */

export type { CallbackNotifier, CallbackPayload, CallbackStatus, FetchLike } from './types.js'
export { CallbackNotifierImpl, createCallbackNotifier } from './callback-notifier-impl.js'
export type { CallbackNotifierConfig, CallbackNotifierDeps } from './callback-notifier-impl.js'
export { buildCallbackPayload } from './payload.js'
