/**
 * PagesPublisherImpl: enable, then read the URL, with retries on transient
 * hosting failures.
 */

import type pino from 'pino'
import { PublishDegradedError } from '../../core/errors.js'
import type { RepositoryHandle } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { retryWithBackoff } from '../../utils/retry.js'
import { HostingError, type HostingClient } from '../repository/hosting-client.js'
import { defaultPagesUrl } from '../repository/project-files.js'
import type { PagesPublisher, PublishResult } from './pages-publisher.js'

export interface PagesPublisherConfig {
  /** Directory served from the default branch */
  path: '/' | '/docs'
  maxRetries: number
  retryBaseMs: number
  retryMaxMs: number
}

export interface PagesPublisherDeps {
  client: HostingClient
  config: PagesPublisherConfig
  logger?: pino.Logger
}

export class PagesPublisherImpl implements PagesPublisher {
  private readonly _client: HostingClient
  private readonly _config: PagesPublisherConfig
  private readonly _logger: pino.Logger

  constructor(deps: PagesPublisherDeps) {
    this._client = deps.client
    this._config = deps.config
    this._logger = deps.logger ?? createLogger('pages')
  }

  async ensurePublished(handle: RepositoryHandle, options: { signal?: AbortSignal } = {}): Promise<PublishResult> {
    const signal = options.signal
    const request = { ...(signal !== undefined && { signal }) }

    const enabled = await this._withRetry('enable pages', handle, signal, () =>
      this._client.enablePages(handle, { branch: handle.defaultBranch, path: this._config.path }, request)
    )
    const reported = await this._withRetry('read pages url', handle, signal, () =>
      this._client.getPagesUrl(handle, request)
    )

    const result: PublishResult =
      reported !== null && reported !== ''
        ? { pagesUrl: reported, enabled, urlSource: 'provider' }
        : { pagesUrl: defaultPagesUrl(handle), enabled, urlSource: 'conventional' }

    this._logger.info({ repository: handle.fullName, ...result }, 'Pages published')
    return result
  }

  private async _withRetry<T>(
    operation: string,
    handle: RepositoryHandle,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await retryWithBackoff(fn, {
        maxRetries: this._config.maxRetries,
        baseDelayMs: this._config.retryBaseMs,
        maxDelayMs: this._config.retryMaxMs,
        ...(signal !== undefined && { signal }),
        shouldRetry: (err) => err instanceof HostingError && err.transient,
        onRetry: (err, attempt, delayMs) => {
          this._logger.warn({ operation, attempt, delayMs, repository: handle.fullName }, 'Pages call failed; retrying')
        },
      })
    } catch (err) {
      if (err instanceof HostingError) {
        throw new PublishDegradedError(`Could not ${operation} for ${handle.fullName}: ${err.message}`, {
          operation,
          repository: handle.fullName,
          hostingCode: err.code,
          fallbackUrl: defaultPagesUrl(handle),
        })
      }
      throw err
    }
  }
}

export function createPagesPublisher(deps: PagesPublisherDeps): PagesPublisher {
  return new PagesPublisherImpl(deps)
}
