/**
 * RepositoryManagerImpl: lookup-before-create keyed by task name, and
 * atomic, idempotent commits through the HostingClient.
 */

import type pino from 'pino'
import { RepositoryNameExhaustedError, RepositoryUnavailableError } from '../../core/errors.js'
import type { RepositoryHandle } from '../../core/types.js'
import { KeyedMutex } from '../../utils/keyed-mutex.js'
import { createLogger } from '../../utils/logger.js'
import { retryWithBackoff } from '../../utils/retry.js'
import type { StatusStore } from '../status-store/status-store.js'
import { gitBlobSha } from './git-blob.js'
import { HostingError, type HostingClient, type TreeFile } from './hosting-client.js'
import { candidateName, repositoryName } from './repository-name.js'
import type { CommitResult, EnsureRepositoryResult, RepositoryManager } from './repository-manager.js'

export interface RepositoryManagerConfig {
  repoPrefix: string
  private: boolean
  maxNameAttempts: number
  maxRetries: number
  retryBaseMs: number
  retryMaxMs: number
}

export interface RepositoryManagerDeps {
  client: HostingClient
  statusStore: StatusStore
  config: RepositoryManagerConfig
  logger?: pino.Logger
}

export class RepositoryManagerImpl implements RepositoryManager {
  private readonly _client: HostingClient
  private readonly _store: StatusStore
  private readonly _config: RepositoryManagerConfig
  private readonly _logger: pino.Logger
  private readonly _taskLocks = new KeyedMutex()
  private readonly _repoLocks = new KeyedMutex()

  constructor(deps: RepositoryManagerDeps) {
    this._client = deps.client
    this._store = deps.statusStore
    this._config = deps.config
    this._logger = deps.logger ?? createLogger('repository')
  }

  // ---------------------------------------------------------------------------
  // ensureRepository
  // ---------------------------------------------------------------------------

  async ensureRepository(
    taskName: string,
    round: number,
    options: { signal?: AbortSignal } = {}
  ): Promise<EnsureRepositoryResult> {
    return this._taskLocks.runExclusive(taskName, async () => {
      const binding = this._store.getRepositoryBinding(taskName)
      if (binding !== undefined) {
        this._logger.debug({ taskName, repository: binding.handle.fullName }, 'Reusing bound repository')
        return { handle: binding.handle, resolution: 'binding' as const, attemptedNames: [] }
      }

      const base = repositoryName(taskName, this._config.repoPrefix)

      if (round >= 2) {
        const existing = await this._withRetry('look up repository', options.signal, () =>
          this._client.getRepository(base, options)
        )
        if (existing !== null) {
          this._store.bindRepository(taskName, existing)
          this._logger.info({ taskName, repository: existing.fullName }, 'Found repository for later round')
          return { handle: existing, resolution: 'lookup' as const, attemptedNames: [] }
        }
        this._logger.warn({ taskName, round, name: base }, 'No repository for later round; creating one')
      }

      const { handle, attemptedNames } = await this._createWithSuffix(taskName, base, options.signal)
      this._store.bindRepository(taskName, handle)
      this._logger.info({ taskName, repository: handle.fullName }, 'Repository created')
      return { handle, resolution: 'created' as const, attemptedNames }
    })
  }

  private async _createWithSuffix(
    taskName: string,
    base: string,
    signal: AbortSignal | undefined
  ): Promise<{ handle: RepositoryHandle; attemptedNames: string[] }> {
    const attemptedNames: string[] = []
    for (let attempt = 1; attempt <= this._config.maxNameAttempts; attempt++) {
      const name = candidateName(base, attempt)
      attemptedNames.push(name)
      // A create whose response was lost may still have been applied.
      let lostResponse = false
      try {
        const handle = await this._withRetry('create repository', signal, async () => {
          try {
            return await this._client.createRepository(
              name,
              { private: this._config.private, description: `Generated site for task ${taskName}` },
              { ...(signal !== undefined && { signal }) }
            )
          } catch (err) {
            if (err instanceof HostingError && err.transient) lostResponse = true
            throw err
          }
        })
        return { handle, attemptedNames }
      } catch (err) {
        if (!(err instanceof RepositoryUnavailableError && err.context['hostingCode'] === 'NAME_TAKEN')) throw err
        if (lostResponse) {
          const existing = await this._withRetry('look up repository', signal, () =>
            this._client.getRepository(name, { ...(signal !== undefined && { signal }) })
          )
          if (existing !== null) {
            this._logger.info({ taskName, name }, 'Adopting repository created by an unacknowledged request')
            return { handle: existing, attemptedNames }
          }
        }
        this._logger.info({ taskName, name }, 'Repository name taken; trying next candidate')
      }
    }
    throw new RepositoryNameExhaustedError(taskName, attemptedNames)
  }

  // ---------------------------------------------------------------------------
  // commitFiles
  // ---------------------------------------------------------------------------

  async commitFiles(
    handle: RepositoryHandle,
    files: TreeFile[],
    options: { message: string; signal?: AbortSignal }
  ): Promise<CommitResult> {
    const signal = options.signal
    const request = { ...(signal !== undefined && { signal }) }
    const branch = handle.defaultBranch

    return this._repoLocks.runExclusive(handle.fullName, () =>
      this._withRetry('commit files', signal, async () => {
        // Every attempt starts from the current head so a retry after a
        // partially applied attempt never commits twice.
        const head = await this._client.getBranchHead(handle, branch, request)
        if (head !== null) {
          const tree = await this._client.listTree(handle, head.treeSha, request)
          if (files.every((file) => tree.get(file.path) === gitBlobSha(file.content))) {
            this._logger.info({ repository: handle.fullName, commitSha: head.commitSha }, 'Branch already up to date')
            return { commitSha: head.commitSha, treeSha: head.treeSha, skipped: true }
          }
        }

        const treeSha = await this._client.createTree(handle, files, head?.treeSha, request)
        const commitSha = await this._client.createCommit(
          handle,
          { message: options.message, treeSha, parents: head === null ? [] : [head.commitSha] },
          request
        )
        if (head === null) {
          await this._client.createRef(handle, branch, commitSha, request)
        } else {
          await this._client.updateRef(handle, branch, commitSha, request)
        }
        this._logger.info({ repository: handle.fullName, commitSha, files: files.length }, 'Committed files')
        return { commitSha, treeSha, skipped: false }
      })
    )
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Retry transient hosting failures; anything left over becomes
   * RepositoryUnavailableError. Non-hosting errors (aborts) pass through.
   */
  private async _withRetry<T>(operation: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(fn, {
        maxRetries: this._config.maxRetries,
        baseDelayMs: this._config.retryBaseMs,
        maxDelayMs: this._config.retryMaxMs,
        ...(signal !== undefined && { signal }),
        shouldRetry: (err) => err instanceof HostingError && err.transient,
        onRetry: (err, attempt, delayMs) => {
          this._logger.warn(
            { operation, attempt, delayMs, code: err instanceof HostingError ? err.code : undefined },
            'Transient hosting failure; retrying'
          )
        },
      })
    } catch (err) {
      if (err instanceof HostingError) {
        throw new RepositoryUnavailableError(`Hosting provider failed to ${operation}: ${err.message}`, {
          operation,
          hostingCode: err.code,
          ...(err.status !== undefined && { status: err.status }),
        })
      }
      throw err
    }
  }
}

export function createRepositoryManager(deps: RepositoryManagerDeps): RepositoryManager {
  return new RepositoryManagerImpl(deps)
}
