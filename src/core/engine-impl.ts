/**
 * EngineImpl: concrete implementation of the Engine interface.
 *
 * The createEngine() factory:
 *  1. Instantiates the TypedEventBus and StatusStore
 *  2. Builds the provider and hosting client from configuration, unless injected
 *  3. Creates every stage with constructor injection
 *  4. Registers services in the ServiceRegistry and initializes them
 *  5. Optionally sets up SIGTERM/SIGINT graceful shutdown handlers
 *  6. Emits engine:ready
 */

import { createLogger } from '../utils/logger.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { Engine, EngineOptions, HealthReport } from './engine.js'
import type { TaskStatusView } from './types.js'
import type { PagesmithConfig } from '../modules/config/config-schema.js'
import { createCallbackNotifier } from '../modules/callback/callback-notifier-impl.js'
import { AiSdkProvider } from '../modules/code-generation/ai-sdk-provider.js'
import { createCodeGenerator } from '../modules/code-generation/code-generator-impl.js'
import type { CodeGenerator } from '../modules/code-generation/code-generator.js'
import type { GenerativeProvider } from '../modules/code-generation/types.js'
import { createPagesPublisher } from '../modules/pages/pages-publisher-impl.js'
import { GitHubHostingClient } from '../modules/repository/github-hosting-client.js'
import type { HostingClient } from '../modules/repository/hosting-client.js'
import { createRepositoryManager } from '../modules/repository/repository-manager-impl.js'
import { createStatusStore } from '../modules/status-store/status-store-impl.js'
import type { TaskListFilter } from '../modules/status-store/types.js'
import { parseSubmission, verifySubmissionSecret } from '../modules/task-orchestrator/submission.js'
import { createTaskOrchestrator } from '../modules/task-orchestrator/task-orchestrator-impl.js'
import type { TaskOrchestrator } from '../modules/task-orchestrator/task-orchestrator.js'

const logger = createLogger('engine')

type Env = Record<string, string | undefined>

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]
  return value === undefined || value.trim() === '' ? undefined : value
}

function buildProvider(config: PagesmithConfig, env: Env): GenerativeProvider | undefined {
  const apiKey = envValue(env, config.generation.api_key_env)
  if (apiKey === undefined) return undefined
  return new AiSdkProvider({
    apiKey,
    model: config.generation.model,
    ...(config.generation.base_url !== undefined && { baseURL: config.generation.base_url }),
  })
}

function buildHostingClient(config: PagesmithConfig, env: Env): HostingClient {
  const token = envValue(env, config.hosting.token_env)
  return new GitHubHostingClient({
    ...(token !== undefined && { token }),
    baseUrl: config.hosting.api_base_url,
    ...(config.hosting.owner !== undefined && { owner: config.hosting.owner }),
    ownerType: config.hosting.owner_type,
  })
}

// ---------------------------------------------------------------------------
// EngineImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('EngineImpl.internal')

interface EngineParts {
  eventBus: TypedEventBus
  registry: ServiceRegistry
  orchestrator: TaskOrchestrator
  codeGenerator: CodeGenerator
  hostingClient: HostingClient
  submissionSecret: string | undefined
  now: () => Date
}

class EngineImpl implements Engine {
  readonly eventBus: TypedEventBus
  private readonly _parts: EngineParts
  private _ready = false
  private _shutdown = false
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(parts: EngineParts) {
    this.eventBus = parts.eventBus
    this._parts = parts
  }

  get isReady(): boolean {
    return this._ready
  }

  submit(payload: unknown): TaskStatusView {
    const submission = parseSubmission(payload)
    verifySubmissionSecret(submission, this._parts.submissionSecret)
    return this._parts.orchestrator.submit(submission)
  }

  getStatus(nonce: string): TaskStatusView | undefined {
    return this._parts.orchestrator.getStatus(nonce)
  }

  listTasks(filter?: TaskListFilter): TaskStatusView[] {
    return this._parts.orchestrator.listTasks(filter)
  }

  waitForTask(nonce: string): Promise<TaskStatusView> {
    return this._parts.orchestrator.waitForTask(nonce)
  }

  health(): HealthReport {
    const generatorConfigured = this._parts.codeGenerator.providerConfigured
    const hostingConfigured = this._parts.hostingClient.configured
    return {
      status: this._shutdown ? 'shutting-down' : generatorConfigured && hostingConfigured ? 'ok' : 'degraded',
      ready: this._ready && !this._shutdown,
      generatorConfigured,
      hostingConfigured,
      activeTasks: this._parts.orchestrator.activeTasks,
      tasks: this._parts.orchestrator.counts(),
      timestamp: this._parts.now().toISOString(),
    }
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    this._removeShutdownHandlers()

    logger.info('Engine shutdown initiated')
    this.eventBus.emit('engine:shutdown', { reason: 'shutdown() called' })

    try {
      await this._parts.registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during engine shutdown')
    }

    logger.info('Engine shutdown complete')
  }

  private _registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      logger.info({ signal }, 'Received signal; draining in-flight tasks')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')
    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  private _removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }

  /**
   * Internal accessor used exclusively by the createEngine factory.
   * @internal
   */
  [INTERNAL](): { markReady: () => void; registerShutdownHandlers: () => void } {
    return {
      markReady: () => {
        this._ready = true
      },
      registerShutdownHandlers: () => {
        this._registerShutdownHandlers()
      },
    }
  }
}

// ---------------------------------------------------------------------------
// createEngine factory
// ---------------------------------------------------------------------------

/**
 * Build and initialize an engine with every stage wired by injection.
 */
export async function createEngine(options: EngineOptions): Promise<Engine> {
  const { config } = options
  const env: Env = options.env ?? process.env
  const now = options.now ?? (() => new Date())

  const eventBus = options.eventBus ?? createEventBus()
  const statusStore = options.statusStore ?? createStatusStore({ now })

  const provider = options.provider === null ? undefined : (options.provider ?? buildProvider(config, env))
  const hostingClient = options.hostingClient ?? buildHostingClient(config, env)

  const codeGenerator = createCodeGenerator({
    ...(provider !== undefined && { provider }),
    timeoutMs: config.generation.timeout_ms,
    maxAttachmentChars: config.generation.max_attachment_chars,
    minDocumentChars: config.generation.min_document_chars,
  })
  const retryPolicy = {
    maxRetries: config.hosting.max_retries,
    retryBaseMs: config.hosting.retry_base_ms,
    retryMaxMs: config.hosting.retry_max_ms,
  }
  const repositoryManager = createRepositoryManager({
    client: hostingClient,
    statusStore,
    config: {
      repoPrefix: config.hosting.repo_prefix,
      private: config.hosting.private,
      maxNameAttempts: config.hosting.max_name_attempts,
      ...retryPolicy,
    },
  })
  const pagesPublisher = createPagesPublisher({
    client: hostingClient,
    config: { path: config.pages.path, ...retryPolicy },
  })
  const callbackNotifier = createCallbackNotifier({
    config: {
      timeoutMs: config.callback.timeout_ms,
      maxAttempts: config.callback.max_attempts,
      retryBaseMs: config.callback.retry_base_ms,
      retryMaxMs: config.callback.retry_max_ms,
    },
    ...(options.fetch !== undefined && { fetch: options.fetch }),
    now,
  })
  const orchestrator = createTaskOrchestrator({
    statusStore,
    codeGenerator,
    repositoryManager,
    pagesPublisher,
    callbackNotifier,
    eventBus,
    config: {
      taskBudgetMs: config.global.task_budget_ms,
      maxConcurrentTasks: config.global.max_concurrent_tasks,
      briefPolicy: config.rounds.brief_policy,
      ...(config.hosting.license_holder !== undefined && { licenseHolder: config.hosting.license_holder }),
    },
    now,
  })

  // The store registers first so it shuts down last, after tasks drain.
  const registry = new ServiceRegistry()
  registry.register('statusStore', statusStore)
  registry.register('taskOrchestrator', orchestrator)

  const engine = new EngineImpl({
    eventBus,
    registry,
    orchestrator,
    codeGenerator,
    hostingClient,
    submissionSecret: envValue(env, config.submission.secret_env),
    now,
  })
  const internal = engine[INTERNAL]()

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed; cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  if (options.handleSignals === true) {
    internal.registerShutdownHandlers()
  }

  internal.markReady()
  eventBus.emit('engine:ready', {})
  logger.info(
    {
      generatorConfigured: codeGenerator.providerConfigured,
      hostingConfigured: hostingClient.configured,
      maxConcurrentTasks: config.global.max_concurrent_tasks,
    },
    'Engine ready'
  )
  return engine
}
