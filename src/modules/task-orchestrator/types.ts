/**
 * Types for the task-orchestrator module.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type pino from 'pino'
import type { CallbackNotifier } from '../callback/types.js'
import type { CodeGenerator } from '../code-generation/code-generator.js'
import type { BriefPolicy } from '../config/config-schema.js'
import type { PagesPublisher } from '../pages/pages-publisher.js'
import type { RepositoryManager } from '../repository/repository-manager.js'
import type { StatusStore } from '../status-store/status-store.js'

export interface TaskOrchestratorConfig {
  /** Wall-clock budget per task, from acceptance to a terminal state */
  taskBudgetMs: number
  maxConcurrentTasks: number
  briefPolicy: BriefPolicy
  /** Copyright holder for LICENSE; defaults to the repository owner */
  licenseHolder?: string
}

/**
 * Dependency injection container for the task orchestrator.
 */
export interface TaskOrchestratorDeps {
  statusStore: StatusStore
  codeGenerator: CodeGenerator
  repositoryManager: RepositoryManager
  pagesPublisher: PagesPublisher
  callbackNotifier: CallbackNotifier
  eventBus: TypedEventBus
  config: TaskOrchestratorConfig
  logger?: pino.Logger
  /** Clock for callback timestamps and the LICENSE year */
  now?: () => Date
}
