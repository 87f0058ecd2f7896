/**
 * Types for the callback module.
 */

import type { NotificationOutcome, TaskError } from '../../core/types.js'

/** Terminal outcome reported to the evaluator */
export type CallbackStatus = 'completed' | 'failed'

/** JSON body POSTed to the evaluation URL */
export interface CallbackPayload {
  nonce: string
  status: CallbackStatus
  email: string
  task: string
  round: number
  repo_url: string | null
  pages_url: string | null
  commit_sha: string | null
  error?: TaskError
  timestamp: string
}

/** The subset of the fetch API the notifier needs */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface CallbackNotifier {
  /**
   * POST `payload` to `url`, retrying transport failures and non-2xx answers.
   * Never throws; exhaustion is reported in the outcome.
   */
  notify(url: string, payload: CallbackPayload, options?: { signal?: AbortSignal }): Promise<NotificationOutcome>
}
