/**
 * HostingClient: the port to the source-hosting provider.
 *
 * The repository manager and pages publisher only see this interface and
 * the semantic HostingError codes; status codes and SDK errors stay inside
 * the adapter.
 */

import { PagesmithError } from '../../core/errors.js'
import type { RepositoryHandle } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Semantic error codes for hosting operations.
 */
export type HostingErrorCode =
  | 'NAME_TAKEN'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'RATE_LIMITED'
  | 'CONFLICT'
  | 'VALIDATION_FAILED'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'NOT_CONFIGURED'

const TRANSIENT_CODES: ReadonlySet<HostingErrorCode> = new Set([
  'RATE_LIMITED',
  'CONFLICT',
  'SERVER_ERROR',
  'NETWORK_ERROR',
])

export class HostingError extends PagesmithError {
  declare readonly code: HostingErrorCode
  /** HTTP status, when the provider answered */
  readonly status: number | undefined

  constructor(message: string, code: HostingErrorCode, status?: number, context: Record<string, unknown> = {}) {
    super(message, code, { ...context, ...(status !== undefined && { status }) })
    this.name = 'HostingError'
    this.status = status
  }

  /** Worth retrying: rate limits, 5xx, network failures, ref races */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code)
  }
}

export function isHostingError(err: unknown, code?: HostingErrorCode): err is HostingError {
  return err instanceof HostingError && (code === undefined || err.code === code)
}

// ---------------------------------------------------------------------------
// Operation types
// ---------------------------------------------------------------------------

export interface RequestOptions {
  signal?: AbortSignal
}

export interface CreateRepositoryOptions {
  private: boolean
  description?: string
  homepage?: string
}

/** Tip of a branch */
export interface BranchHead {
  commitSha: string
  treeSha: string
}

/** A file to write in a tree */
export interface TreeFile {
  path: string
  content: string
}

export interface CreateCommitInput {
  message: string
  treeSha: string
  parents: string[]
}

export interface PagesSource {
  branch: string
  path: '/' | '/docs'
}

export type EnablePagesResult = 'enabled' | 'already-enabled'

// ---------------------------------------------------------------------------
// HostingClient interface
// ---------------------------------------------------------------------------

export interface HostingClient {
  /** Whether credentials are available */
  readonly configured: boolean

  /** Account that owns created repositories */
  resolveOwner(options?: RequestOptions): Promise<string>

  /**
   * Create a repository with an initial commit on its default branch.
   * @throws {HostingError} `NAME_TAKEN` when the name is in use.
   */
  createRepository(name: string, input: CreateRepositoryOptions, options?: RequestOptions): Promise<RepositoryHandle>

  /** Look a repository up by name under the owner; null when absent */
  getRepository(name: string, options?: RequestOptions): Promise<RepositoryHandle | null>

  /** Null when the branch does not exist or the repository is empty */
  getBranchHead(handle: RepositoryHandle, branch: string, options?: RequestOptions): Promise<BranchHead | null>

  /** Blob shas of every file in a tree, keyed by path */
  listTree(handle: RepositoryHandle, treeSha: string, options?: RequestOptions): Promise<Map<string, string>>

  /** Returns the new tree sha */
  createTree(handle: RepositoryHandle, files: TreeFile[], baseTreeSha: string | undefined, options?: RequestOptions): Promise<string>

  /** Returns the new commit sha */
  createCommit(handle: RepositoryHandle, input: CreateCommitInput, options?: RequestOptions): Promise<string>

  /**
   * Fast-forward a branch.
   * @throws {HostingError} `CONFLICT` when the branch moved meanwhile.
   */
  updateRef(handle: RepositoryHandle, branch: string, commitSha: string, options?: RequestOptions): Promise<void>

  createRef(handle: RepositoryHandle, branch: string, commitSha: string, options?: RequestOptions): Promise<void>

  enablePages(handle: RepositoryHandle, source: PagesSource, options?: RequestOptions): Promise<EnablePagesResult>

  /** Null when hosting is not (yet) enabled */
  getPagesUrl(handle: RepositoryHandle, options?: RequestOptions): Promise<string | null>
}
