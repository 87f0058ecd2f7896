import type { TaskRecord } from '../../core/types.js'
import type { CallbackPayload, CallbackStatus } from './types.js'

/**
 * Project a record onto the callback body. Values the task never produced are
 * sent as null.
 */
export function buildCallbackPayload(record: TaskRecord, status: CallbackStatus, now: Date): CallbackPayload {
  return {
    nonce: record.nonce,
    status,
    email: record.email,
    task: record.taskName,
    round: record.round,
    repo_url: record.repositoryUrl ?? null,
    pages_url: record.pagesUrl ?? null,
    commit_sha: record.commitSha ?? null,
    ...(status === 'failed' && record.error !== undefined && { error: record.error }),
    timestamp: now.toISOString(),
  }
}
