/**
 * Task Orchestrator: factory and pipeline.
 *
 * Each accepted submission runs as its own async unit. A task waits for a
 * concurrency slot in `queued`, then moves through the stages; its wall-clock
 * budget covers the wait. When the budget runs out the current stage is
 * abandoned, the record fails with BudgetExceeded and the evaluator is still
 * told. The budget stops at `notifying`: from there the outcome is settled and
 * the evaluator hears it exactly once.
 */

import type pino from 'pino'
import {
  BudgetExceededError,
  EngineShutdownError,
  GenerationRecoverableError,
  PublishDegradedError,
  TaskNotFoundError,
  toTaskError,
} from '../../core/errors.js'
import type { TaskError, TaskRecord, TaskState, TaskStatusView, TaskSubmission } from '../../core/types.js'
import { ConcurrencyLimiter } from '../../utils/concurrency-limiter.js'
import { abortable, abortReason, errorMessage } from '../../utils/helpers.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { buildCallbackPayload } from '../callback/payload.js'
import type { CallbackStatus } from '../callback/types.js'
import { decodeAttachments } from '../code-generation/attachments.js'
import type { PreviousBrief } from '../code-generation/types.js'
import { buildProjectFiles, defaultPagesUrl } from '../repository/project-files.js'
import { isTerminal } from '../status-store/state-machine.js'
import { toPublicStatus } from '../status-store/status-store-impl.js'
import type { TaskListFilter, TaskStateCounts } from '../status-store/types.js'
import type { TaskOrchestrator } from './task-orchestrator.js'
import type { TaskOrchestratorDeps } from './types.js'

const COMMIT_SUBJECT_MAX = 72

function commitMessage(round: number, brief: string): string {
  const subject = `Round ${String(round)}: ${brief.trim().split('\n')[0] ?? ''}`
  return subject.length > COMMIT_SUBJECT_MAX ? `${subject.slice(0, COMMIT_SUBJECT_MAX - 1)}…` : subject
}

// ---------------------------------------------------------------------------
// createTaskOrchestrator
// ---------------------------------------------------------------------------

export function createTaskOrchestrator(deps: TaskOrchestratorDeps): TaskOrchestrator {
  const {
    statusStore: store,
    codeGenerator,
    repositoryManager,
    pagesPublisher,
    callbackNotifier,
    eventBus,
    config,
  } = deps
  const logger = deps.logger ?? createLogger('task-orchestrator')
  const now = deps.now ?? (() => new Date())
  const limiter = new ConcurrencyLimiter(config.maxConcurrentTasks)

  const _inflight = new Map<string, Promise<void>>()
  let _shuttingDown = false

  // -- record helpers --

  function requireRecord(nonce: string): TaskRecord {
    const record = store.get(nonce)
    if (record === undefined) throw new TaskNotFoundError(nonce)
    return record
  }

  function move(nonce: string, to: TaskState, error?: TaskError): TaskRecord {
    const from = requireRecord(nonce).state
    const record = store.transition(nonce, to, error)
    eventBus.emit('task:state-changed', { nonce, from, to })
    return record
  }

  function warn(nonce: string, warning: TaskError, log: pino.Logger): void {
    store.addWarning(nonce, warning)
    eventBus.emit('task:warning', { nonce, warning })
    log.warn({ kind: warning.kind, code: warning.code }, warning.message)
  }

  // -- stages --

  async function generate(record: TaskRecord, signal: AbortSignal, log: pino.Logger): Promise<void> {
    move(record.nonce, 'generating')

    const previousBriefs: PreviousBrief[] =
      config.briefPolicy === 'merge'
        ? (store.getRepositoryBinding(record.taskName)?.rounds ?? [])
            .filter((r) => r.round < record.round)
            .map((r) => ({ round: r.round, brief: r.brief }))
        : []

    const result = await abortable(
      codeGenerator.generate(
        {
          taskName: record.taskName,
          round: record.round,
          brief: record.brief,
          attachments: record.attachments,
          checks: record.checks,
          previousBriefs,
        },
        { signal }
      ),
      signal
    )

    store.update(record.nonce, { generatedArtifact: result.html, artifactSource: result.source })
    if (result.source === 'fallback') {
      const reason = result.fallbackReason ?? 'PROVIDER_ERROR'
      warn(
        record.nonce,
        toTaskError(
          new GenerationRecoverableError(`Fallback page used (${reason})`, reason, {
            ...(result.detail !== undefined && { detail: result.detail }),
          })
        ),
        log
      )
    }
    log.info({ source: result.source, bytes: result.html.length }, 'Artifact ready')
  }

  async function commit(record: TaskRecord, signal: AbortSignal, log: pino.Logger): Promise<void> {
    move(record.nonce, 'committing')

    const { handle, resolution } = await abortable(
      repositoryManager.ensureRepository(record.taskName, record.round, { signal }),
      signal
    )
    const current = requireRecord(record.nonce)
    const history = store.getRepositoryBinding(record.taskName)?.rounds ?? []

    const files = buildProjectFiles({
      taskName: record.taskName,
      round: record.round,
      brief: record.brief,
      html: current.generatedArtifact ?? '',
      artifactSource: current.artifactSource ?? 'fallback',
      repository: handle,
      pagesUrl: defaultPagesUrl(handle),
      history: history.map((r) => ({ round: r.round, brief: r.brief })),
      licenseHolder: config.licenseHolder ?? handle.owner,
      year: now().getUTCFullYear(),
    })

    const result = await abortable(
      repositoryManager.commitFiles(handle, files, { message: commitMessage(record.round, record.brief), signal }),
      signal
    )

    store.update(record.nonce, {
      repositoryName: handle.name,
      repositoryUrl: handle.htmlUrl,
      commitSha: result.commitSha,
    })
    store.recordRoundBrief(record.taskName, record.round, record.brief, record.nonce)
    log.info(
      { repository: handle.fullName, resolution, commitSha: result.commitSha, skipped: result.skipped },
      'Files committed'
    )
  }

  async function publish(record: TaskRecord, signal: AbortSignal, log: pino.Logger): Promise<void> {
    move(record.nonce, 'publishing')

    const current = requireRecord(record.nonce)
    const binding = store.getRepositoryBinding(record.taskName)
    if (binding === undefined || current.commitSha === undefined) {
      throw new Error(`Task ${record.nonce} reached publishing without a commit`)
    }

    try {
      const result = await abortable(pagesPublisher.ensurePublished(binding.handle, { signal }), signal)
      store.update(record.nonce, { pagesUrl: result.pagesUrl })
      log.info({ pagesUrl: result.pagesUrl, urlSource: result.urlSource }, 'Site published')
    } catch (err) {
      if (!(err instanceof PublishDegradedError) || signal.aborted) throw err
      warn(record.nonce, toTaskError(err), log)
    }
  }

  async function notify(nonce: string, status: CallbackStatus, log: pino.Logger): Promise<void> {
    const record = requireRecord(nonce)
    const payload = buildCallbackPayload(record, status, now())
    const outcome = await callbackNotifier.notify(record.evaluationUrl, payload)

    store.update(nonce, { notification: outcome })
    if (outcome.error !== undefined) {
      warn(nonce, outcome.error, log)
    }
    eventBus.emit('task:notified', { nonce, outcome })
  }

  // -- pipeline --

  async function runTask(nonce: string): Promise<void> {
    const record = requireRecord(nonce)
    const log = childLogger(logger, { nonce, task: record.taskName, round: record.round })

    const budget = new AbortController()
    const timer = setTimeout(() => {
      const stage = store.get(nonce)?.state
      budget.abort(new BudgetExceededError(config.taskBudgetMs, { stage }))
    }, config.taskBudgetMs)
    const signal = budget.signal
    let slotHeld = false

    try {
      await limiter.acquire(signal)
      slotHeld = true

      await generate(record, signal, log)
      await commit(record, signal, log)
      await publish(record, signal, log)

      limiter.release()
      slotHeld = false

      clearTimeout(timer)
      move(nonce, 'notifying')
      await notify(nonce, 'completed', log)

      const done = move(nonce, 'completed')
      eventBus.emit('task:completed', { nonce, status: toPublicStatus(done) })
      log.info({ pagesUrl: done.pagesUrl, commitSha: done.commitSha }, 'Task completed')
    } catch (err) {
      clearTimeout(timer)
      if (slotHeld) {
        limiter.release()
        slotHeld = false
      }
      await fail(nonce, signal.aborted ? abortReason(signal) : err, log)
    }
  }

  async function fail(nonce: string, err: unknown, log: pino.Logger): Promise<void> {
    const error = toTaskError(err)
    const current = store.get(nonce)
    if (current === undefined || isTerminal(current.state)) {
      log.error({ err, state: current?.state }, 'Task error after it settled')
      return
    }

    move(nonce, 'failed', error)
    eventBus.emit('task:failed', { nonce, error })
    log.error({ kind: error.kind, code: error.code, stage: current.state }, `Task failed: ${error.message}`)

    // The success callback already went out.
    if (current.state === 'notifying') return

    await notify(nonce, 'failed', log)
  }

  function start(nonce: string): void {
    const run = runTask(nonce)
      .catch((err: unknown) => {
        logger.error({ nonce, err: errorMessage(err) }, 'Task pipeline crashed')
      })
      .finally(() => {
        _inflight.delete(nonce)
      })
    _inflight.set(nonce, run)
  }

  // -- public API --

  return {
    async initialize(): Promise<void> {
      logger.debug(
        { maxConcurrentTasks: config.maxConcurrentTasks, taskBudgetMs: config.taskBudgetMs },
        'Task orchestrator initialized'
      )
    },

    async shutdown(): Promise<void> {
      _shuttingDown = true
      const draining = [..._inflight.values()]
      if (draining.length > 0) {
        logger.info({ tasks: draining.length }, 'Waiting for in-flight tasks')
      }
      await Promise.all(draining)
      logger.debug('Task orchestrator shut down')
    },

    submit(submission: TaskSubmission): TaskStatusView {
      if (_shuttingDown) throw new EngineShutdownError()

      const { attachments, skipped } = decodeAttachments(submission.attachments)
      const record = store.create({
        nonce: submission.nonce,
        taskName: submission.task,
        round: submission.round,
        email: submission.email,
        brief: submission.brief,
        attachments,
        checks: submission.checks,
        evaluationUrl: submission.evaluationUrl,
        callerEndpoint: submission.endpoint,
      })
      const log = childLogger(logger, { nonce: record.nonce, task: record.taskName, round: record.round })

      for (const item of skipped) {
        warn(
          record.nonce,
          toTaskError(
            new GenerationRecoverableError(`Attachment "${item.name}" skipped: ${item.reason}`, 'ATTACHMENT_SKIPPED', {
              attachment: item.name,
            })
          ),
          log
        )
      }

      eventBus.emit('task:accepted', { nonce: record.nonce, task: record.taskName, round: record.round })
      log.info({ attachments: attachments.length, skipped: skipped.length }, 'Task accepted')
      start(record.nonce)
      return toPublicStatus(requireRecord(record.nonce))
    },

    getStatus(nonce: string): TaskStatusView | undefined {
      const record = store.get(nonce)
      return record === undefined ? undefined : toPublicStatus(record)
    },

    listTasks(filter?: TaskListFilter): TaskStatusView[] {
      return store.list(filter).map(toPublicStatus)
    },

    async waitForTask(nonce: string): Promise<TaskStatusView> {
      requireRecord(nonce)
      await _inflight.get(nonce)
      return toPublicStatus(requireRecord(nonce))
    },

    get activeTasks(): number {
      return _inflight.size
    },

    counts(): TaskStateCounts {
      return store.countByState()
    },
  }
}
