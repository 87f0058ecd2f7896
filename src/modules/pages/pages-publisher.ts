/**
 * PagesPublisher: makes a committed repository reachable as a static site.
 */

import type { RepositoryHandle } from '../../core/types.js'
import type { EnablePagesResult } from '../repository/hosting-client.js'

/** Where the returned URL came from */
export type PagesUrlSource = 'provider' | 'conventional'

export interface PublishResult {
  pagesUrl: string
  enabled: EnablePagesResult
  urlSource: PagesUrlSource
}

export interface PagesPublisher {
  /**
   * Enable static hosting from the default branch and resolve the public URL.
   * Safe to call for every round: an already-enabled site counts as success.
   * @throws {PublishDegradedError} when hosting cannot be enabled or read
   */
  ensurePublished(handle: RepositoryHandle, options?: { signal?: AbortSignal }): Promise<PublishResult>
}
