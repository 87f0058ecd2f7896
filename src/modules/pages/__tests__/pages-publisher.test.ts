import { describe, it, expect, beforeEach } from 'vitest'
import { PagesPublisherImpl, type PagesPublisherConfig } from '../pages-publisher-impl.js'
import { HostingError } from '../../repository/hosting-client.js'
import { PublishDegradedError } from '../../../core/errors.js'
import type { RepositoryHandle } from '../../../core/types.js'
import { InMemoryHostingClient } from '../../../../test/fakes/in-memory-hosting.js'

const config: PagesPublisherConfig = { path: '/', maxRetries: 2, retryBaseMs: 1, retryMaxMs: 2 }

describe('PagesPublisherImpl', () => {
  let client: InMemoryHostingClient
  let handle: RepositoryHandle
  let publisher: PagesPublisherImpl

  beforeEach(() => {
    client = new InMemoryHostingClient({ owner: 'Octo' })
    handle = client.seedRepository('site')
    publisher = new PagesPublisherImpl({ client, config })
  })

  it('enables pages and returns the reported URL', async () => {
    const result = await publisher.ensurePublished(handle)
    expect(result).toEqual({ pagesUrl: 'https://Octo.github.io/site/', enabled: 'enabled', urlSource: 'provider' })
    expect(client.repositories.get('site')?.pages).toEqual({ branch: 'main', path: '/' })
  })

  it('is idempotent across rounds', async () => {
    await publisher.ensurePublished(handle)
    const again = await publisher.ensurePublished(handle)
    expect(again.enabled).toBe('already-enabled')
    expect(again.pagesUrl).toBe('https://Octo.github.io/site/')
  })

  it('falls back to the conventional URL when none is reported', async () => {
    client.pagesUrlOverride = null
    const result = await publisher.ensurePublished(handle)
    expect(result).toEqual({ pagesUrl: 'https://octo.github.io/site/', enabled: 'enabled', urlSource: 'conventional' })
  })

  it('retries transient failures', async () => {
    client.failNext('enablePages', new HostingError('Rate limited', 'RATE_LIMITED', 429), 2)
    const result = await publisher.ensurePublished(handle)
    expect(result.enabled).toBe('enabled')
    expect(client.callCount('enablePages')).toBe(3)
  })

  it('degrades when pages cannot be enabled', async () => {
    client.failAlways('enablePages', new HostingError('Permission denied', 'PERMISSION_DENIED', 403))
    const error: unknown = await publisher.ensurePublished(handle).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(PublishDegradedError)
    if (error instanceof PublishDegradedError) {
      expect(error.kind).toBe('PublishDegraded')
      expect(error.context).toMatchObject({
        operation: 'enable pages',
        hostingCode: 'PERMISSION_DENIED',
        fallbackUrl: 'https://octo.github.io/site/',
      })
    }
    expect(client.callCount('getPagesUrl')).toBe(0)
  })

  it('degrades after transient failures run out', async () => {
    client.failAlways('getPagesUrl', new HostingError('Server error (503)', 'SERVER_ERROR', 503))
    await expect(publisher.ensurePublished(handle)).rejects.toBeInstanceOf(PublishDegradedError)
    expect(client.callCount('getPagesUrl')).toBe(3)
  })
})
