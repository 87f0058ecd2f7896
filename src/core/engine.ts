/**
 * Engine interface: the public contract of a running Pagesmith instance.
 *
 * All callers (the CLI, embedding servers, tests) depend on this interface.
 * Create an instance via `createEngine()` from engine-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { TaskStatusView } from './types.js'
import type { PagesmithConfig } from '../modules/config/config-schema.js'
import type { FetchLike } from '../modules/callback/types.js'
import type { GenerativeProvider } from '../modules/code-generation/types.js'
import type { HostingClient } from '../modules/repository/hosting-client.js'
import type { StatusStore } from '../modules/status-store/status-store.js'
import type { TaskListFilter, TaskStateCounts } from '../modules/status-store/types.js'

// ---------------------------------------------------------------------------
// EngineOptions
// ---------------------------------------------------------------------------

export interface EngineOptions {
  /** Validated, merged configuration */
  config: PagesmithConfig

  /**
   * Environment that credentials are read from, by the variable names the
   * configuration gives.
   * @default process.env
   */
  env?: Record<string, string | undefined>

  /**
   * Generative provider. `null` disables the provider (fallback pages only);
   * omitted, one is built from `generation.*` when its API key is set.
   */
  provider?: GenerativeProvider | null

  /** Hosting client; omitted, a GitHub client is built from `hosting.*` */
  hostingClient?: HostingClient

  /** fetch used for evaluation callbacks */
  fetch?: FetchLike

  eventBus?: TypedEventBus
  statusStore?: StatusStore

  /** Clock for callback timestamps, record times and the LICENSE year */
  now?: () => Date

  /**
   * Drain in-flight tasks and exit on SIGTERM/SIGINT.
   * @default false
   */
  handleSignals?: boolean
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export type EngineStatus = 'ok' | 'degraded' | 'shutting-down'

export interface HealthReport {
  /** `degraded` when the provider or hosting credentials are missing */
  status: EngineStatus
  ready: boolean
  generatorConfigured: boolean
  hostingConfigured: boolean
  activeTasks: number
  tasks: TaskStateCounts
  timestamp: string
}

// ---------------------------------------------------------------------------
// Engine interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createEngine(options)`; `engine:ready` fires before it resolves
 *  2. Submit tasks and query their status
 *  3. Call `shutdown()` to stop accepting and drain in-flight tasks
 */
export interface Engine {
  readonly eventBus: TypedEventBus

  readonly isReady: boolean

  /**
   * Validate a raw submission, check its secret and schedule it.
   * @throws {ValidationError} before any record exists
   */
  submit(payload: unknown): TaskStatusView

  getStatus(nonce: string): TaskStatusView | undefined

  listTasks(filter?: TaskListFilter): TaskStatusView[]

  /** @throws {TaskNotFoundError} */
  waitForTask(nonce: string): Promise<TaskStatusView>

  health(): HealthReport

  /**
   * Stop accepting submissions, wait for in-flight tasks, shut services down.
   * Safe to call more than once.
   */
  shutdown(): Promise<void>
}
