/**
 * GitHubHostingClient: HostingClient over the GitHub REST API (Octokit).
 *
 * Commits go through the Git Data API (tree → commit → ref) so a branch only
 * ever moves to a commit whose whole tree already exists.
 */

import { Octokit } from '@octokit/rest'
import type { RepositoryHandle } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import {
  HostingError,
  type BranchHead,
  type CreateCommitInput,
  type CreateRepositoryOptions,
  type EnablePagesResult,
  type HostingClient,
  type PagesSource,
  type RequestOptions,
  type TreeFile,
} from './hosting-client.js'

export interface GitHubHostingClientOptions {
  /** Personal access or app token; without it every call fails NOT_CONFIGURED */
  token?: string
  baseUrl?: string
  /** Owner of created repositories; defaults to the authenticated user */
  owner?: string
  ownerType?: 'user' | 'org'
  /** Pre-built client, used instead of token/baseUrl */
  octokit?: Octokit
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}

function responseText(error: unknown): string {
  if (!(error instanceof Error)) return String(error)
  let text = error.message
  if ('response' in error && isPlainObject(error.response)) {
    const data = error.response['data']
    if (data !== undefined) text += ` ${JSON.stringify(data)}`
  }
  return text
}

/**
 * Map an Octokit RequestError (or anything else thrown) to a HostingError.
 * Abort errors are returned unchanged so cancellation is never retried.
 */
export function mapOctokitError(error: unknown, operation: string): HostingError | Error {
  if (error instanceof HostingError) return error
  if (error instanceof Error && error.name === 'AbortError') return error

  const status = statusOf(error)
  const text = responseText(error)

  if (status === undefined) {
    return new HostingError(`Network error during ${operation}: ${text}`, 'NETWORK_ERROR', undefined, { operation })
  }
  if (status === 429 || (status === 403 && /rate limit/i.test(text))) {
    return new HostingError(`Rate limited during ${operation}`, 'RATE_LIMITED', status, { operation })
  }
  if (status === 401 || status === 403) {
    return new HostingError(`Permission denied during ${operation}`, 'PERMISSION_DENIED', status, { operation })
  }
  if (status === 404) {
    return new HostingError(`Not found during ${operation}`, 'NOT_FOUND', status, { operation })
  }
  if (status === 409) {
    return new HostingError(`Conflict during ${operation}`, 'CONFLICT', status, { operation })
  }
  if (status === 422) {
    if (/name already exists/i.test(text)) {
      return new HostingError(`Name already exists during ${operation}`, 'NAME_TAKEN', status, { operation })
    }
    if (/fast[- ]forward|reference already exists|reference cannot be updated/i.test(text)) {
      return new HostingError(`Ref conflict during ${operation}`, 'CONFLICT', status, { operation })
    }
    return new HostingError(`Validation failed during ${operation}: ${text}`, 'VALIDATION_FAILED', status, { operation })
  }
  if (status >= 500) {
    return new HostingError(`Server error (${String(status)}) during ${operation}`, 'SERVER_ERROR', status, { operation })
  }
  return new HostingError(`Unexpected status ${String(status)} during ${operation}`, 'VALIDATION_FAILED', status, { operation })
}

// ---------------------------------------------------------------------------
// GitHubHostingClient
// ---------------------------------------------------------------------------

interface RepositoryData {
  name: string
  full_name: string
  html_url: string
  default_branch?: string
  owner: { login: string }
}

function toHandle(data: RepositoryData): RepositoryHandle {
  return {
    owner: data.owner.login,
    name: data.name,
    fullName: data.full_name,
    htmlUrl: data.html_url,
    defaultBranch: data.default_branch ?? 'main',
  }
}

export class GitHubHostingClient implements HostingClient {
  private readonly _octokit: Octokit | undefined
  private readonly _ownerType: 'user' | 'org'
  private _owner: string | undefined

  constructor(options: GitHubHostingClientOptions = {}) {
    this._ownerType = options.ownerType ?? 'user'
    this._owner = options.owner
    if (options.octokit !== undefined) {
      this._octokit = options.octokit
    } else if (options.token !== undefined && options.token !== '') {
      this._octokit = new Octokit({
        auth: options.token,
        userAgent: 'pagesmith',
        ...(options.baseUrl !== undefined && { baseUrl: options.baseUrl }),
      })
    }
  }

  get configured(): boolean {
    return this._octokit !== undefined
  }

  async resolveOwner(options: RequestOptions = {}): Promise<string> {
    if (this._owner !== undefined) return this._owner
    const octokit = this._client()
    const { data } = await this._call('resolve owner', () =>
      octokit.rest.users.getAuthenticated({ request: { signal: options.signal } })
    )
    this._owner = data.login
    return data.login
  }

  async createRepository(
    name: string,
    input: CreateRepositoryOptions,
    options: RequestOptions = {}
  ): Promise<RepositoryHandle> {
    const octokit = this._client()
    const params = {
      name,
      private: input.private,
      auto_init: true,
      ...(input.description !== undefined && { description: input.description }),
      ...(input.homepage !== undefined && { homepage: input.homepage }),
      request: { signal: options.signal },
    }
    if (this._ownerType === 'org') {
      const org = await this.resolveOwner(options)
      const { data } = await this._call('create repository', () =>
        octokit.rest.repos.createInOrg({ org, ...params })
      )
      return toHandle(data)
    }
    const { data } = await this._call('create repository', () =>
      octokit.rest.repos.createForAuthenticatedUser(params)
    )
    return toHandle(data)
  }

  async getRepository(name: string, options: RequestOptions = {}): Promise<RepositoryHandle | null> {
    const octokit = this._client()
    const owner = await this.resolveOwner(options)
    try {
      const { data } = await this._call('get repository', () =>
        octokit.rest.repos.get({ owner, repo: name, request: { signal: options.signal } })
      )
      return toHandle(data)
    } catch (err) {
      if (err instanceof HostingError && err.code === 'NOT_FOUND') return null
      throw err
    }
  }

  async getBranchHead(handle: RepositoryHandle, branch: string, options: RequestOptions = {}): Promise<BranchHead | null> {
    const octokit = this._client()
    const repo = { owner: handle.owner, repo: handle.name, request: { signal: options.signal } }
    let commitSha: string
    try {
      const { data } = await this._call('read branch ref', () =>
        octokit.rest.git.getRef({ ...repo, ref: `heads/${branch}` })
      )
      commitSha = data.object.sha
    } catch (err) {
      // 404: no such branch; 409: repository has no commits yet
      if (err instanceof HostingError && (err.code === 'NOT_FOUND' || err.status === 409)) return null
      throw err
    }
    const { data: commit } = await this._call('read head commit', () =>
      octokit.rest.git.getCommit({ ...repo, commit_sha: commitSha })
    )
    return { commitSha, treeSha: commit.tree.sha }
  }

  async listTree(handle: RepositoryHandle, treeSha: string, options: RequestOptions = {}): Promise<Map<string, string>> {
    const octokit = this._client()
    const { data } = await this._call('read tree', () =>
      octokit.rest.git.getTree({
        owner: handle.owner,
        repo: handle.name,
        tree_sha: treeSha,
        recursive: 'true',
        request: { signal: options.signal },
      })
    )
    const files = new Map<string, string>()
    for (const item of data.tree) {
      if (item.type === 'blob' && item.path !== undefined && item.sha !== undefined) {
        files.set(item.path, item.sha)
      }
    }
    return files
  }

  async createTree(
    handle: RepositoryHandle,
    files: TreeFile[],
    baseTreeSha: string | undefined,
    options: RequestOptions = {}
  ): Promise<string> {
    const octokit = this._client()
    const { data } = await this._call('create tree', () =>
      octokit.rest.git.createTree({
        owner: handle.owner,
        repo: handle.name,
        tree: files.map((file) => ({
          path: file.path,
          mode: '100644' as const,
          type: 'blob' as const,
          content: file.content,
        })),
        ...(baseTreeSha !== undefined && { base_tree: baseTreeSha }),
        request: { signal: options.signal },
      })
    )
    return data.sha
  }

  async createCommit(handle: RepositoryHandle, input: CreateCommitInput, options: RequestOptions = {}): Promise<string> {
    const octokit = this._client()
    const { data } = await this._call('create commit', () =>
      octokit.rest.git.createCommit({
        owner: handle.owner,
        repo: handle.name,
        message: input.message,
        tree: input.treeSha,
        parents: input.parents,
        request: { signal: options.signal },
      })
    )
    return data.sha
  }

  async updateRef(handle: RepositoryHandle, branch: string, commitSha: string, options: RequestOptions = {}): Promise<void> {
    const octokit = this._client()
    await this._call('update branch ref', () =>
      octokit.rest.git.updateRef({
        owner: handle.owner,
        repo: handle.name,
        ref: `heads/${branch}`,
        sha: commitSha,
        force: false,
        request: { signal: options.signal },
      })
    )
  }

  async createRef(handle: RepositoryHandle, branch: string, commitSha: string, options: RequestOptions = {}): Promise<void> {
    const octokit = this._client()
    await this._call('create branch ref', () =>
      octokit.rest.git.createRef({
        owner: handle.owner,
        repo: handle.name,
        ref: `refs/heads/${branch}`,
        sha: commitSha,
        request: { signal: options.signal },
      })
    )
  }

  async enablePages(handle: RepositoryHandle, source: PagesSource, options: RequestOptions = {}): Promise<EnablePagesResult> {
    const octokit = this._client()
    try {
      await this._call('enable pages', () =>
        octokit.rest.repos.createPagesSite({
          owner: handle.owner,
          repo: handle.name,
          source: { branch: source.branch, path: source.path },
          request: { signal: options.signal },
        })
      )
      return 'enabled'
    } catch (err) {
      if (err instanceof HostingError && (err.status === 409 || (err.status === 422 && /already/i.test(err.message)))) {
        return 'already-enabled'
      }
      throw err
    }
  }

  async getPagesUrl(handle: RepositoryHandle, options: RequestOptions = {}): Promise<string | null> {
    const octokit = this._client()
    try {
      const { data } = await this._call('read pages site', () =>
        octokit.rest.repos.getPages({ owner: handle.owner, repo: handle.name, request: { signal: options.signal } })
      )
      return data.html_url ?? null
    } catch (err) {
      if (err instanceof HostingError && err.code === 'NOT_FOUND') return null
      throw err
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _client(): Octokit {
    if (this._octokit === undefined) {
      throw new HostingError('Hosting credentials are not configured', 'NOT_CONFIGURED')
    }
    return this._octokit
  }

  private async _call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw mapOctokitError(err, operation)
    }
  }
}
