/**
 * RepositoryManager: resolves the repository of a task and commits to it.
 *
 * Resolution is serialized per task name and commits per repository, so two
 * rounds of one task never race to create or update the same repository.
 */

import type { RepositoryHandle } from '../../core/types.js'
import type { TreeFile } from './hosting-client.js'

/** How a handle was obtained */
export type RepositoryResolution = 'binding' | 'lookup' | 'created'

export interface EnsureRepositoryResult {
  handle: RepositoryHandle
  resolution: RepositoryResolution
  /** Candidate names tried before one was free (created only) */
  attemptedNames: string[]
}

export interface CommitResult {
  commitSha: string
  treeSha: string
  /** The branch already held exactly these files; nothing was written */
  skipped: boolean
}

export interface RepositoryManager {
  /**
   * Reuse the task's bound repository, else (round ≥ 2) look the candidate
   * name up, else create it with collision suffixes. Binds the result.
   * @throws {RepositoryNameExhaustedError}
   * @throws {RepositoryUnavailableError}
   */
  ensureRepository(taskName: string, round: number, options?: { signal?: AbortSignal }): Promise<EnsureRepositoryResult>

  /**
   * Write `files` to the default branch as one commit.
   * @throws {RepositoryUnavailableError}
   */
  commitFiles(
    handle: RepositoryHandle,
    files: TreeFile[],
    options: { message: string; signal?: AbortSignal }
  ): Promise<CommitResult>
}
