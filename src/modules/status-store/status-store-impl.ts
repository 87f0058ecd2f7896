/**
 * In-memory StatusStore implementation.
 */

import { DuplicateNonceError, RecordInvariantError } from '../../core/errors.js'
import type { RepositoryHandle, TaskError, TaskRecord, TaskState, TaskStatusView } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { canTransition, isTerminal } from './state-machine.js'
import type { StatusStore } from './status-store.js'
import type {
  NewTaskRecord,
  RepositoryBinding,
  TaskListFilter,
  TaskRecordPatch,
  TaskStateCounts,
} from './types.js'

const logger = createLogger('status-store')

type WriteOnceField = 'repositoryName' | 'repositoryUrl' | 'commitSha' | 'pagesUrl'

const WRITE_ONCE_FIELDS: readonly WriteOnceField[] = [
  'repositoryName',
  'repositoryUrl',
  'commitSha',
  'pagesUrl',
]

export interface StatusStoreOptions {
  /** Clock for createdAt/updatedAt; tests pin it */
  now?: () => Date
}

// ---------------------------------------------------------------------------
// InMemoryStatusStore
// ---------------------------------------------------------------------------

export class InMemoryStatusStore implements StatusStore {
  private readonly _records = new Map<string, TaskRecord>()
  private readonly _bindings = new Map<string, RepositoryBinding>()
  private readonly _now: () => Date

  constructor(options: StatusStoreOptions = {}) {
    this._now = options.now ?? (() => new Date())
  }

  async initialize(): Promise<void> {
    logger.debug('StatusStore initialized')
  }

  async shutdown(): Promise<void> {
    logger.debug({ records: this._records.size }, 'StatusStore shut down')
  }

  create(input: NewTaskRecord): TaskRecord {
    if (this._records.has(input.nonce)) {
      throw new DuplicateNonceError(input.nonce)
    }
    const timestamp = this._timestamp()
    const record: TaskRecord = {
      nonce: input.nonce,
      taskName: input.taskName,
      round: input.round,
      email: input.email,
      brief: input.brief,
      attachments: input.attachments,
      checks: input.checks,
      evaluationUrl: input.evaluationUrl,
      callerEndpoint: input.callerEndpoint,
      state: 'queued',
      warnings: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    this._records.set(record.nonce, record)
    return structuredClone(record)
  }

  get(nonce: string): TaskRecord | undefined {
    const record = this._records.get(nonce)
    return record === undefined ? undefined : structuredClone(record)
  }

  has(nonce: string): boolean {
    return this._records.has(nonce)
  }

  list(filter: TaskListFilter = {}): TaskRecord[] {
    const result: TaskRecord[] = []
    for (const record of this._records.values()) {
      if (filter.state !== undefined && record.state !== filter.state) continue
      if (filter.taskName !== undefined && record.taskName !== filter.taskName) continue
      result.push(structuredClone(record))
    }
    return result
  }

  transition(nonce: string, to: TaskState, error?: TaskError): TaskRecord {
    const record = this._require(nonce)
    const from = record.state
    if (!canTransition(from, to)) {
      throw new RecordInvariantError(`Illegal transition ${from} → ${to}`, { nonce, from, to })
    }
    if (to === 'failed' && error === undefined) {
      throw new RecordInvariantError('A failed record requires an error', { nonce })
    }
    if (to !== 'failed' && error !== undefined) {
      throw new RecordInvariantError(`State ${to} cannot carry an error`, { nonce })
    }
    record.state = to
    if (error !== undefined) record.error = error
    record.updatedAt = this._timestamp()
    return structuredClone(record)
  }

  update(nonce: string, patch: TaskRecordPatch): TaskRecord {
    const record = this._require(nonce)

    if (isTerminal(record.state)) {
      const illegal = Object.keys(patch).filter((key) => key !== 'notification')
      if (illegal.length > 0) {
        throw new RecordInvariantError(
          `Record ${nonce} is ${record.state}; only the notification outcome may change`,
          { nonce, fields: illegal }
        )
      }
    }

    // Validate every write-once field before touching the record
    for (const field of WRITE_ONCE_FIELDS) {
      const next = patch[field]
      const current = record[field]
      if (next !== undefined && current !== undefined && next !== current) {
        throw new RecordInvariantError(`${field} is write-once`, { nonce, field, current, next })
      }
    }

    for (const field of WRITE_ONCE_FIELDS) {
      const next = patch[field]
      if (next !== undefined) record[field] = next
    }
    if (patch.generatedArtifact !== undefined) record.generatedArtifact = patch.generatedArtifact
    if (patch.artifactSource !== undefined) record.artifactSource = patch.artifactSource
    if (patch.notification !== undefined) record.notification = patch.notification
    record.updatedAt = this._timestamp()
    return structuredClone(record)
  }

  addWarning(nonce: string, warning: TaskError): TaskRecord {
    const record = this._require(nonce)
    record.warnings.push(warning)
    record.updatedAt = this._timestamp()
    return structuredClone(record)
  }

  bindRepository(taskName: string, handle: RepositoryHandle): RepositoryBinding {
    const existing = this._bindings.get(taskName)
    if (existing !== undefined) {
      if (existing.handle.fullName !== handle.fullName) {
        throw new RecordInvariantError(`Task "${taskName}" is already bound to ${existing.handle.fullName}`, {
          taskName,
          bound: existing.handle.fullName,
          requested: handle.fullName,
        })
      }
      return structuredClone(existing)
    }
    const binding: RepositoryBinding = {
      taskName,
      handle: { ...handle },
      rounds: [],
      boundAt: this._timestamp(),
    }
    this._bindings.set(taskName, binding)
    logger.debug({ taskName, repository: handle.fullName }, 'Repository bound')
    return structuredClone(binding)
  }

  getRepositoryBinding(taskName: string): RepositoryBinding | undefined {
    const binding = this._bindings.get(taskName)
    return binding === undefined ? undefined : structuredClone(binding)
  }

  recordRoundBrief(taskName: string, round: number, brief: string, nonce: string): RepositoryBinding {
    const binding = this._bindings.get(taskName)
    if (binding === undefined) {
      throw new RecordInvariantError(`Task "${taskName}" has no repository binding`, { taskName })
    }
    const entry = { round, brief, nonce, committedAt: this._timestamp() }
    const idx = binding.rounds.findIndex((r) => r.round === round)
    if (idx === -1) {
      binding.rounds.push(entry)
      binding.rounds.sort((a, b) => a.round - b.round)
    } else {
      binding.rounds[idx] = entry
    }
    return structuredClone(binding)
  }

  countByState(): TaskStateCounts {
    const counts: TaskStateCounts = {
      queued: 0,
      generating: 0,
      committing: 0,
      publishing: 0,
      notifying: 0,
      completed: 0,
      failed: 0,
    }
    for (const record of this._records.values()) {
      counts[record.state]++
    }
    return counts
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _require(nonce: string): TaskRecord {
    const record = this._records.get(nonce)
    if (record === undefined) {
      throw new RecordInvariantError(`Unknown nonce: ${nonce}`, { nonce })
    }
    return record
  }

  private _timestamp(): string {
    return this._now().toISOString()
  }
}

// ---------------------------------------------------------------------------
// Public projection
// ---------------------------------------------------------------------------

/**
 * Public-safe view of a record: no attachments, artifact body, brief or
 * caller endpoint.
 */
export function toPublicStatus(record: TaskRecord): TaskStatusView {
  return {
    nonce: record.nonce,
    task: record.taskName,
    round: record.round,
    state: record.state,
    ...(record.artifactSource !== undefined && { artifactSource: record.artifactSource }),
    ...(record.repositoryName !== undefined && { repositoryName: record.repositoryName }),
    ...(record.repositoryUrl !== undefined && { repositoryUrl: record.repositoryUrl }),
    ...(record.commitSha !== undefined && { commitSha: record.commitSha }),
    ...(record.pagesUrl !== undefined && { pagesUrl: record.pagesUrl }),
    ...(record.error !== undefined && { error: structuredClone(record.error) }),
    warnings: structuredClone(record.warnings),
    ...(record.notification !== undefined && { notification: structuredClone(record.notification) }),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  }
}

/**
 * Create a new in-memory StatusStore.
 */
export function createStatusStore(options: StatusStoreOptions = {}): StatusStore {
  return new InMemoryStatusStore(options)
}
