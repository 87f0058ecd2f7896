/**
 * GitHubHostingClient over a real Octokit whose fetch is served in-process.
 */

import { describe, it, expect } from 'vitest'
import { Octokit } from '@octokit/rest'
import { GitHubHostingClient, mapOctokitError } from '../github-hosting-client.js'
import { HostingError, isHostingError } from '../hosting-client.js'
import type { RepositoryHandle } from '../../../core/types.js'

interface Reply {
  status: number
  body?: unknown
}

interface RecordedRequest {
  method: string
  path: string
  body: unknown
}

type Router = (method: string, path: string, body: unknown) => Reply

function fakeGitHub(router: Router): { client: (owner?: string, ownerType?: 'user' | 'org') => GitHubHostingClient; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url)
    const method = init?.method ?? 'GET'
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    // `{ref}` expands with `/` percent-encoded
    const path = decodeURIComponent(url.pathname)
    requests.push({ method, path, body })
    const reply = router(method, path, body)
    return new Response(reply.body === undefined ? null : JSON.stringify(reply.body), {
      status: reply.status,
      headers: { 'content-type': 'application/json' },
    })
  }
  const octokit = new Octokit({ auth: 'test-token', request: { fetch } })
  return {
    client: (owner, ownerType) =>
      new GitHubHostingClient({
        octokit,
        ...(owner !== undefined && { owner }),
        ...(ownerType !== undefined && { ownerType }),
      }),
    requests,
  }
}

function repoData(owner: string, name: string): Record<string, unknown> {
  return {
    name,
    full_name: `${owner}/${name}`,
    html_url: `https://github.com/${owner}/${name}`,
    default_branch: 'main',
    owner: { login: owner },
  }
}

const handle: RepositoryHandle = {
  owner: 'octo',
  name: 'site',
  fullName: 'octo/site',
  htmlUrl: 'https://github.com/octo/site',
  defaultBranch: 'main',
}

async function hostingErrorOf(promise: Promise<unknown>): Promise<HostingError> {
  const err: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e
  )
  if (!(err instanceof HostingError)) throw new Error(`expected HostingError, got ${String(err)}`)
  return err
}

describe('GitHubHostingClient', () => {
  describe('owner and repositories', () => {
    it('resolves the authenticated user once', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 200, body: { login: 'octo' } }))
      const github = client()
      expect(await github.resolveOwner()).toBe('octo')
      expect(await github.resolveOwner()).toBe('octo')
      expect(requests.filter((r) => r.path === '/user')).toHaveLength(1)
    })

    it('creates a user repository with an initial commit', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: repoData('octo', 'site') }))
      const created = await client().createRepository('site', { private: false, description: 'Generated site' })

      expect(created).toEqual(handle)
      expect(requests[0]?.method).toBe('POST')
      expect(requests[0]?.path).toBe('/user/repos')
      expect(requests[0]?.body).toMatchObject({ name: 'site', private: false, auto_init: true, description: 'Generated site' })
    })

    it('creates organisation repositories under the org', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: repoData('acme', 'site') }))
      const created = await client('acme', 'org').createRepository('site', { private: true })

      expect(created.fullName).toBe('acme/site')
      expect(requests.map((r) => r.path)).toEqual(['/orgs/acme/repos'])
    })

    it('maps a name collision to NAME_TAKEN', async () => {
      const { client } = fakeGitHub(() => ({
        status: 422,
        body: {
          message: 'Repository creation failed.',
          errors: [{ resource: 'Repository', code: 'custom', field: 'name', message: 'name already exists on this account' }],
        },
      }))
      const err = await hostingErrorOf(client().createRepository('site', { private: false }))
      expect(err.code).toBe('NAME_TAKEN')
      expect(err.transient).toBe(false)
    })

    it('returns null for a missing repository', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 404, body: { message: 'Not Found' } }))
      expect(await client('octo').getRepository('site')).toBeNull()
      expect(requests[0]?.path).toBe('/repos/octo/site')
    })
  })

  describe('git data', () => {
    it('reads the branch head', async () => {
      const { client } = fakeGitHub((_method, path) => {
        if (path === '/repos/octo/site/git/ref/heads/main') return { status: 200, body: { object: { sha: 'c1' } } }
        if (path === '/repos/octo/site/git/commits/c1') return { status: 200, body: { sha: 'c1', tree: { sha: 't1' } } }
        return { status: 500 }
      })
      expect(await client().getBranchHead(handle, 'main')).toEqual({ commitSha: 'c1', treeSha: 't1' })
    })

    it('treats an empty repository as having no head', async () => {
      const { client } = fakeGitHub(() => ({ status: 409, body: { message: 'Git Repository is empty.' } }))
      expect(await client().getBranchHead(handle, 'main')).toBeNull()
    })

    it('lists blobs of a tree', async () => {
      const { client } = fakeGitHub(() => ({
        status: 200,
        body: {
          sha: 't1',
          truncated: false,
          tree: [
            { path: 'index.html', type: 'blob', sha: 'b1', mode: '100644' },
            { path: 'docs', type: 'tree', sha: 't2', mode: '040000' },
            { path: 'docs/a.md', type: 'blob', sha: 'b2', mode: '100644' },
          ],
        },
      }))
      const tree = await client().listTree(handle, 't1')
      expect([...tree]).toEqual([
        ['index.html', 'b1'],
        ['docs/a.md', 'b2'],
      ])
    })

    it('creates a tree on top of the base tree', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: { sha: 't2', tree: [] } }))
      const sha = await client().createTree(handle, [{ path: 'index.html', content: '<html></html>' }], 't1')

      expect(sha).toBe('t2')
      expect(requests[0]?.path).toBe('/repos/octo/site/git/trees')
      expect(requests[0]?.body).toEqual({
        base_tree: 't1',
        tree: [{ path: 'index.html', mode: '100644', type: 'blob', content: '<html></html>' }],
      })
    })

    it('creates a commit with its parents', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: { sha: 'c2' } }))
      const sha = await client().createCommit(handle, { message: 'Round 1', treeSha: 't2', parents: ['c1'] })
      expect(sha).toBe('c2')
      expect(requests[0]?.body).toEqual({ message: 'Round 1', tree: 't2', parents: ['c1'] })
    })

    it('moves the ref without forcing', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 200, body: { ref: 'refs/heads/main', object: { sha: 'c2' } } }))
      await client().updateRef(handle, 'main', 'c2')
      expect(requests[0]?.method).toBe('PATCH')
      expect(requests[0]?.path).toBe('/repos/octo/site/git/refs/heads/main')
      expect(requests[0]?.body).toEqual({ sha: 'c2', force: false })
    })

    it('maps a non-fast-forward ref update to a transient conflict', async () => {
      const { client } = fakeGitHub(() => ({ status: 422, body: { message: 'Update is not a fast forward' } }))
      const err = await hostingErrorOf(client().updateRef(handle, 'main', 'c2'))
      expect(err.code).toBe('CONFLICT')
      expect(err.transient).toBe(true)
    })

    it('creates a missing branch ref', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: { ref: 'refs/heads/main' } }))
      await client().createRef(handle, 'main', 'c1')
      expect(requests[0]?.path).toBe('/repos/octo/site/git/refs')
      expect(requests[0]?.body).toEqual({ ref: 'refs/heads/main', sha: 'c1' })
    })
  })

  describe('pages', () => {
    it('enables pages from the branch root', async () => {
      const { client, requests } = fakeGitHub(() => ({ status: 201, body: { html_url: 'https://octo.github.io/site/' } }))
      expect(await client().enablePages(handle, { branch: 'main', path: '/' })).toBe('enabled')
      expect(requests[0]?.path).toBe('/repos/octo/site/pages')
      expect(requests[0]?.body).toEqual({ source: { branch: 'main', path: '/' } })
    })

    it('treats an existing site as already enabled', async () => {
      const { client } = fakeGitHub(() => ({ status: 409, body: { message: 'GitHub Pages is already enabled.' } }))
      expect(await client().enablePages(handle, { branch: 'main', path: '/' })).toBe('already-enabled')
    })

    it('reads the published URL', async () => {
      const { client } = fakeGitHub(() => ({ status: 200, body: { html_url: 'https://octo.github.io/site/', status: 'built' } }))
      expect(await client().getPagesUrl(handle)).toBe('https://octo.github.io/site/')
    })

    it('returns null when no site exists', async () => {
      const { client } = fakeGitHub(() => ({ status: 404, body: { message: 'Not Found' } }))
      expect(await client().getPagesUrl(handle)).toBeNull()
    })
  })

  describe('error mapping', () => {
    it.each([
      { status: 401, message: 'Bad credentials', code: 'PERMISSION_DENIED', transient: false },
      { status: 403, message: 'API rate limit exceeded for user ID 1.', code: 'RATE_LIMITED', transient: true },
      { status: 403, message: 'Resource not accessible by integration', code: 'PERMISSION_DENIED', transient: false },
      { status: 429, message: 'Too many requests', code: 'RATE_LIMITED', transient: true },
      { status: 502, message: 'Bad gateway', code: 'SERVER_ERROR', transient: true },
    ])('maps $status ($message) to $code', async ({ status, message, code, transient }) => {
      const { client } = fakeGitHub(() => ({ status, body: { message } }))
      const err = await hostingErrorOf(client('octo').getRepository('site'))
      expect(err.code).toBe(code)
      expect(err.status).toBe(status)
      expect(err.transient).toBe(transient)
    })

    it('keeps the validation message for unrecognised 422s', () => {
      const source = Object.assign(new Error('Validation Failed'), { status: 422, response: { data: { message: 'bad field' } } })
      const mapped = mapOctokitError(source, 'create tree')
      expect(isHostingError(mapped, 'VALIDATION_FAILED')).toBe(true)
      expect(mapped.message).toBe('Validation failed during create tree: Validation Failed {"message":"bad field"}')
    })

    it('maps errors without a status to NETWORK_ERROR', () => {
      const mapped = mapOctokitError(new Error('socket hang up'), 'get repository')
      expect(isHostingError(mapped, 'NETWORK_ERROR')).toBe(true)
    })

    it('passes aborts through', () => {
      const abort = new Error('aborted')
      abort.name = 'AbortError'
      expect(mapOctokitError(abort, 'get repository')).toBe(abort)
    })

    it('fails every call without credentials', async () => {
      const github = new GitHubHostingClient()
      expect(github.configured).toBe(false)
      const err = await hostingErrorOf(github.createRepository('site', { private: false }))
      expect(err.code).toBe('NOT_CONFIGURED')
    })
  })
})
