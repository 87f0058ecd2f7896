/**
 * TaskOrchestrator: accepts submissions and drives each one through
 * generating → committing → publishing → notifying.
 */

import type { BaseService } from '../../core/di.js'
import type { TaskStatusView, TaskSubmission } from '../../core/types.js'
import type { TaskListFilter, TaskStateCounts } from '../status-store/types.js'

export interface TaskOrchestrator extends BaseService {
  /**
   * Accept a validated submission and schedule it. Returns as soon as the
   * record exists in `queued`; never waits on a stage.
   * @throws {DuplicateNonceError} if the nonce was already accepted
   * @throws {EngineShutdownError} once shutdown has begun
   */
  submit(submission: TaskSubmission): TaskStatusView

  getStatus(nonce: string): TaskStatusView | undefined

  listTasks(filter?: TaskListFilter): TaskStatusView[]

  /**
   * Resolve once the task is terminal and its callback has settled.
   * @throws {TaskNotFoundError}
   */
  waitForTask(nonce: string): Promise<TaskStatusView>

  /** Tasks accepted and not yet settled */
  readonly activeTasks: number

  counts(): TaskStateCounts
}
