/**
 * EngineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "task:accepted", "engine:ready")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { Nonce, TaskError, TaskState, TaskStatusView, NotificationOutcome } from './types.js'

/**
 * Complete typed map of all events emitted on the engine event bus.
 * Use `keyof EngineEvents` to constrain event keys.
 */
export interface EngineEvents {
  // -------------------------------------------------------------------------
  // Task lifecycle events
  // -------------------------------------------------------------------------

  /** A submission was accepted and its record created in `queued` */
  'task:accepted': {
    nonce: Nonce
    task: string
    round: number
  }

  /** A record moved along the state machine */
  'task:state-changed': {
    nonce: Nonce
    from: TaskState
    to: TaskState
  }

  /** A stage failed without aborting the task (publish degraded, fallback used) */
  'task:warning': {
    nonce: Nonce
    warning: TaskError
  }

  /** A record reached `completed` */
  'task:completed': {
    nonce: Nonce
    status: TaskStatusView
  }

  /** A record reached `failed` */
  'task:failed': {
    nonce: Nonce
    error: TaskError
  }

  /** The evaluation callback finished (delivered or exhausted) */
  'task:notified': {
    nonce: Nonce
    outcome: NotificationOutcome
  }

  // -------------------------------------------------------------------------
  // Engine lifecycle events
  // -------------------------------------------------------------------------

  /** All services initialized */
  'engine:ready': Record<string, never>

  /** Shutdown requested */
  'engine:shutdown': {
    reason: string
  }
}
