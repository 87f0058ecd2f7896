/**
 * The full task pipeline wired over in-process fakes.
 */

import { createEventBus, type TypedEventBus } from '../../src/core/event-bus.js'
import type { EngineEvents } from '../../src/core/event-bus.types.js'
import { CallbackNotifierImpl, type CallbackNotifierConfig } from '../../src/modules/callback/callback-notifier-impl.js'
import { CodeGeneratorImpl } from '../../src/modules/code-generation/code-generator-impl.js'
import type { GenerativeProvider } from '../../src/modules/code-generation/types.js'
import { PagesPublisherImpl } from '../../src/modules/pages/pages-publisher-impl.js'
import { RepositoryManagerImpl, type RepositoryManagerConfig } from '../../src/modules/repository/repository-manager-impl.js'
import { InMemoryStatusStore } from '../../src/modules/status-store/status-store-impl.js'
import { createTaskOrchestrator } from '../../src/modules/task-orchestrator/task-orchestrator-impl.js'
import type { TaskOrchestrator } from '../../src/modules/task-orchestrator/task-orchestrator.js'
import type { TaskOrchestratorConfig } from '../../src/modules/task-orchestrator/types.js'
import type { TaskSubmission } from '../../src/core/types.js'
import { RecordingEvaluator } from './evaluator.js'
import { InMemoryHostingClient } from './in-memory-hosting.js'

export const FIXED_NOW = new Date('2026-03-04T05:06:07.000Z')

const TASK_EVENTS = [
  'task:accepted',
  'task:state-changed',
  'task:warning',
  'task:completed',
  'task:failed',
  'task:notified',
] as const

type TaskEventName = (typeof TASK_EVENTS)[number]

export interface RecordedEvent {
  event: TaskEventName
  nonce: string
  payload: EngineEvents[TaskEventName]
}

export interface HarnessOptions {
  provider?: GenerativeProvider
  hosting?: InMemoryHostingClient
  orchestrator?: Partial<TaskOrchestratorConfig>
  repository?: Partial<RepositoryManagerConfig>
  callback?: Partial<CallbackNotifierConfig>
  generationTimeoutMs?: number
}

export interface Harness {
  orchestrator: TaskOrchestrator
  store: InMemoryStatusStore
  hosting: InMemoryHostingClient
  evaluator: RecordingEvaluator
  eventBus: TypedEventBus
  events: RecordedEvent[]
  /** `from→to` transitions of one task, in order */
  transitionsOf(nonce: string): string[]
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const now = (): Date => FIXED_NOW
  const store = new InMemoryStatusStore({ now })
  const hosting = options.hosting ?? new InMemoryHostingClient()
  const evaluator = new RecordingEvaluator()
  const eventBus = createEventBus()
  const events: RecordedEvent[] = []
  const transitions: Array<EngineEvents['task:state-changed']> = []

  for (const event of TASK_EVENTS) {
    eventBus.on(event, (payload) => {
      events.push({ event, nonce: payload.nonce, payload })
    })
  }
  eventBus.on('task:state-changed', (payload) => {
    transitions.push(payload)
  })

  const retry = { maxRetries: 2, retryBaseMs: 1, retryMaxMs: 2 }
  const orchestrator = createTaskOrchestrator({
    statusStore: store,
    codeGenerator: new CodeGeneratorImpl({
      ...(options.provider !== undefined && { provider: options.provider }),
      timeoutMs: options.generationTimeoutMs ?? 1_000,
      maxAttachmentChars: 4_000,
      minDocumentChars: 100,
    }),
    repositoryManager: new RepositoryManagerImpl({
      client: hosting,
      statusStore: store,
      config: { repoPrefix: '', private: false, maxNameAttempts: 5, ...retry, ...options.repository },
    }),
    pagesPublisher: new PagesPublisherImpl({ client: hosting, config: { path: '/', ...retry } }),
    callbackNotifier: new CallbackNotifierImpl({
      config: { timeoutMs: 1_000, maxAttempts: 3, retryBaseMs: 1, retryMaxMs: 2, ...options.callback },
      fetch: evaluator.fetch,
      now,
    }),
    eventBus,
    config: {
      taskBudgetMs: 5_000,
      maxConcurrentTasks: 4,
      briefPolicy: 'replace',
      licenseHolder: 'Test Holder',
      ...options.orchestrator,
    },
    now,
  })

  return {
    orchestrator,
    store,
    hosting,
    evaluator,
    eventBus,
    events,
    transitionsOf(nonce: string): string[] {
      return transitions.filter((t) => t.nonce === nonce).map((t) => `${t.from}→${t.to}`)
    },
  }
}

export function submission(overrides: Partial<TaskSubmission> = {}): TaskSubmission {
  return {
    email: 'student@example.com',
    task: 'captcha-solver',
    round: 1,
    nonce: 'nonce-1',
    brief: 'Create a captcha solver page with a button#solve and an element #result.',
    attachments: [],
    checks: [],
    evaluationUrl: 'https://eval.example.com/notify',
    endpoint: 'https://caller.example.com/task',
    secret: 'test-secret',
    ...overrides,
  }
}
