/**
 * StatusStore: the engine's only shared state.
 *
 * Holds every TaskRecord for the process lifetime plus the repository
 * binding of each task name. Every mutation runs synchronously from read to
 * write, so concurrent tasks never interleave inside one update. Reads hand
 * out deep copies; callers cannot mutate stored records.
 */

import type { BaseService } from '../../core/di.js'
import type { RepositoryHandle, TaskError, TaskRecord, TaskState } from '../../core/types.js'
import type {
  NewTaskRecord,
  RepositoryBinding,
  TaskListFilter,
  TaskRecordPatch,
  TaskStateCounts,
} from './types.js'

export interface StatusStore extends BaseService {
  /**
   * Create a record in `queued`.
   * @throws {DuplicateNonceError} if the nonce was already accepted.
   */
  create(input: NewTaskRecord): TaskRecord

  get(nonce: string): TaskRecord | undefined

  has(nonce: string): boolean

  /** Records in acceptance order */
  list(filter?: TaskListFilter): TaskRecord[]

  /**
   * Move a record along the state machine. Moving to `failed` requires an
   * error; no other state accepts one.
   * @throws {RecordInvariantError} on an illegal move or unknown nonce.
   */
  transition(nonce: string, to: TaskState, error?: TaskError): TaskRecord

  /**
   * Fill in stage results. Write-once fields may be re-written only with the
   * same value. A terminal record accepts only `notification`.
   * @throws {RecordInvariantError}
   */
  update(nonce: string, patch: TaskRecordPatch): TaskRecord

  addWarning(nonce: string, warning: TaskError): TaskRecord

  /**
   * Bind a task name to its repository. Re-binding to the same repository is
   * a no-op; binding to a different one throws RecordInvariantError.
   */
  bindRepository(taskName: string, handle: RepositoryHandle): RepositoryBinding

  getRepositoryBinding(taskName: string): RepositoryBinding | undefined

  /** Append (or replace) the brief committed for `round` of `taskName` */
  recordRoundBrief(taskName: string, round: number, brief: string, nonce: string): RepositoryBinding

  countByState(): TaskStateCounts
}
