/**
 * CallbackNotifierImpl: HTTP POST with a per-attempt timeout and capped
 * exponential backoff between attempts.
 */

import type pino from 'pino'
import { NotificationFailedError, toTaskError } from '../../core/errors.js'
import type { NotificationOutcome } from '../../core/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { retryWithBackoff } from '../../utils/retry.js'
import type { CallbackNotifier, CallbackPayload, FetchLike } from './types.js'

export interface CallbackNotifierConfig {
  timeoutMs: number
  maxAttempts: number
  retryBaseMs: number
  retryMaxMs: number
}

export interface CallbackNotifierDeps {
  config: CallbackNotifierConfig
  fetch?: FetchLike
  logger?: pino.Logger
  now?: () => Date
}

class CallbackHttpError extends Error {
  constructor(readonly status: number) {
    super(`Callback answered HTTP ${String(status)}`)
    this.name = 'CallbackHttpError'
  }
}

export class CallbackNotifierImpl implements CallbackNotifier {
  private readonly _config: CallbackNotifierConfig
  private readonly _fetch: FetchLike
  private readonly _logger: pino.Logger
  private readonly _now: () => Date

  constructor(deps: CallbackNotifierDeps) {
    this._config = deps.config
    this._fetch = deps.fetch ?? ((url, init) => fetch(url, init))
    this._logger = deps.logger ?? createLogger('callback')
    this._now = deps.now ?? (() => new Date())
  }

  async notify(url: string, payload: CallbackPayload, options: { signal?: AbortSignal } = {}): Promise<NotificationOutcome> {
    const body = JSON.stringify(payload)
    const signal = options.signal
    const log = this._logger.child({ nonce: payload.nonce, status: payload.status })
    let attempts = 0
    let statusCode: number | undefined

    try {
      const delivered = await retryWithBackoff(
        async (attempt) => {
          attempts = attempt
          const response = await this._post(url, body, signal)
          statusCode = response.status
          await response.body?.cancel()
          if (!response.ok) throw new CallbackHttpError(response.status)
          return response.status
        },
        {
          maxRetries: this._config.maxAttempts - 1,
          baseDelayMs: this._config.retryBaseMs,
          maxDelayMs: this._config.retryMaxMs,
          ...(signal !== undefined && { signal }),
          onRetry: (err, attempt, delayMs) => {
            log.warn({ attempt, delayMs, reason: errorMessage(err) }, 'Callback delivery failed; retrying')
          },
        }
      )
      log.info({ attempts, statusCode: delivered }, 'Callback delivered')
      return { delivered: true, attempts, statusCode: delivered, deliveredAt: this._now().toISOString() }
    } catch (err) {
      const failure = new NotificationFailedError(
        `Callback delivery failed after ${String(attempts)} attempt(s): ${errorMessage(err)}`,
        { attempts, ...(statusCode !== undefined && { statusCode }) }
      )
      log.error({ attempts, statusCode, reason: errorMessage(err) }, 'Callback delivery exhausted')
      return {
        delivered: false,
        attempts,
        ...(statusCode !== undefined && { statusCode }),
        error: toTaskError(failure),
      }
    }
  }

  private async _post(url: string, body: string, signal: AbortSignal | undefined): Promise<Response> {
    const controller = new AbortController()
    const timeoutMs = this._config.timeoutMs
    const timer = setTimeout(() => {
      controller.abort(new Error(`Callback timed out after ${String(timeoutMs)}ms`))
    }, timeoutMs)
    const onAbort = (): void => {
      controller.abort(signal?.reason)
    }
    if (signal?.aborted === true) onAbort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      return await this._fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body,
        signal: controller.signal,
      })
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }
}

export function createCallbackNotifier(deps: CallbackNotifierDeps): CallbackNotifier {
  return new CallbackNotifierImpl(deps)
}
