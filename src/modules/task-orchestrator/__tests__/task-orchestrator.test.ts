import { describe, it, expect } from 'vitest'
import { DuplicateNonceError, EngineShutdownError, TaskNotFoundError } from '../../../core/errors.js'
import { HostingError } from '../../repository/hosting-client.js'
import { createHarness, FIXED_NOW, submission } from '../../../../test/fakes/harness.js'
import { DelayedProvider, FailingProvider, HangingProvider, sampleDocument, StaticProvider } from '../../../../test/fakes/providers.js'

const HAPPY_PATH = [
  'queued→generating',
  'generating→committing',
  'committing→publishing',
  'publishing→notifying',
  'notifying→completed',
]

describe('TaskOrchestrator', () => {
  describe('submit', () => {
    it('returns the queued status before any stage runs', async () => {
      const { orchestrator } = createHarness({ provider: new StaticProvider(sampleDocument('Captcha')) })

      const status = orchestrator.submit(submission())

      expect(status).toMatchObject({ nonce: 'nonce-1', task: 'captcha-solver', round: 1, state: 'queued', warnings: [] })
      expect(orchestrator.activeTasks).toBe(1)
      await orchestrator.waitForTask('nonce-1')
      expect(orchestrator.activeTasks).toBe(0)
    })

    it('rejects a nonce it has already accepted', async () => {
      const { orchestrator } = createHarness()
      orchestrator.submit(submission())

      expect(() => orchestrator.submit(submission({ brief: 'Another brief' }))).toThrow(DuplicateNonceError)
      await orchestrator.waitForTask('nonce-1')
    })

    it('records skipped attachments as warnings', async () => {
      const { orchestrator } = createHarness({ provider: new StaticProvider(sampleDocument('Captcha')) })

      const status = orchestrator.submit(
        submission({
          attachments: [
            { name: 'sample.png', url: 'data:image/png;base64,iVBORw0KGgo=' },
            { name: 'notes.txt', url: 'https://files.example.com/notes.txt' },
          ],
        })
      )

      expect(status.warnings).toEqual([
        {
          kind: 'GenerationRecoverable',
          code: 'GENERATION_RECOVERABLE',
          message: 'Attachment "notes.txt" skipped: not a data: URL',
          details: { reason: 'ATTACHMENT_SKIPPED', attachment: 'notes.txt' },
        },
      ])
      await orchestrator.waitForTask('nonce-1')
    })
  })

  describe('pipeline', () => {
    it('runs every stage in order and reports completion', async () => {
      const { orchestrator, hosting, evaluator, transitionsOf } = createHarness({
        provider: new StaticProvider(sampleDocument('Captcha')),
      })

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(transitionsOf('nonce-1')).toEqual(HAPPY_PATH)
      expect(status).toMatchObject({
        state: 'completed',
        artifactSource: 'provider',
        repositoryName: 'captcha-solver',
        repositoryUrl: 'https://github.com/octo/captcha-solver',
        pagesUrl: 'https://octo.github.io/captcha-solver/',
        commitSha: hosting.headSha('captcha-solver'),
        warnings: [],
      })
      expect(status.notification).toEqual({
        delivered: true,
        attempts: 1,
        statusCode: 200,
        deliveredAt: FIXED_NOW.toISOString(),
      })
      expect(hosting.readFile('captcha-solver', 'index.html')).toBe(sampleDocument('Captcha'))
      expect(evaluator.received).toEqual([
        {
          url: 'https://eval.example.com/notify',
          payload: {
            nonce: 'nonce-1',
            status: 'completed',
            email: 'student@example.com',
            task: 'captcha-solver',
            round: 1,
            repo_url: 'https://github.com/octo/captcha-solver',
            pages_url: 'https://octo.github.io/captcha-solver/',
            commit_sha: hosting.headSha('captcha-solver'),
            timestamp: FIXED_NOW.toISOString(),
          },
        },
      ])
    })

    it('emits accepted, completed and notified events', async () => {
      const { orchestrator, events } = createHarness()

      orchestrator.submit(submission())
      await orchestrator.waitForTask('nonce-1')

      const names = events.filter((e) => e.event !== 'task:state-changed').map((e) => e.event)
      expect(names).toEqual(['task:accepted', 'task:warning', 'task:notified', 'task:completed'])
    })

    it('completes with the fallback page when the provider fails', async () => {
      const provider = new FailingProvider(new Error('upstream 503'))
      const { orchestrator, hosting } = createHarness({ provider })

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(provider.calls).toBe(1)
      expect(status.state).toBe('completed')
      expect(status.artifactSource).toBe('fallback')
      expect(status.warnings).toEqual([
        {
          kind: 'GenerationRecoverable',
          code: 'GENERATION_RECOVERABLE',
          message: 'Fallback page used (PROVIDER_ERROR)',
          details: { reason: 'PROVIDER_ERROR', detail: 'upstream 503' },
        },
      ])
      expect(hosting.readFile('captcha-solver', 'index.html')).toContain('id="solve"')
    })

    it('uses the fallback page when no provider is configured', async () => {
      const { orchestrator } = createHarness()

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(status.state).toBe('completed')
      expect(status.warnings.map((w) => w.message)).toEqual(['Fallback page used (PROVIDER_NOT_CONFIGURED)'])
    })

    it('fails with RepositoryUnavailable and still notifies the evaluator', async () => {
      const { orchestrator, hosting, evaluator, transitionsOf } = createHarness()
      hosting.failAlways('createRepository', new HostingError('Forbidden', 'PERMISSION_DENIED', 403))

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(transitionsOf('nonce-1')).toEqual(['queued→generating', 'generating→committing', 'committing→failed'])
      expect(status.error).toEqual({
        kind: 'RepositoryUnavailable',
        code: 'REPOSITORY_UNAVAILABLE',
        message: 'Hosting provider failed to create repository: Forbidden',
        details: { operation: 'create repository', hostingCode: 'PERMISSION_DENIED', status: 403 },
      })
      expect(evaluator.payloadsFor('nonce-1')).toEqual([
        {
          nonce: 'nonce-1',
          status: 'failed',
          email: 'student@example.com',
          task: 'captcha-solver',
          round: 1,
          repo_url: null,
          pages_url: null,
          commit_sha: null,
          error: status.error,
          timestamp: FIXED_NOW.toISOString(),
        },
      ])
      expect(status.notification?.delivered).toBe(true)
    })

    it('reports unexpected errors as InternalError', async () => {
      const { orchestrator, hosting } = createHarness()
      hosting.failNext('getBranchHead', new Error('boom'))

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(status.state).toBe('failed')
      expect(status.error).toEqual({ kind: 'InternalError', code: 'INTERNAL_ERROR', message: 'boom' })
    })

    it('completes without a pages URL when publishing degrades', async () => {
      const { orchestrator, hosting, evaluator } = createHarness()
      hosting.failAlways('enablePages', new HostingError('Forbidden', 'PERMISSION_DENIED', 403))

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(status.state).toBe('completed')
      expect(status.pagesUrl).toBeUndefined()
      expect(status.warnings.map((w) => w.kind)).toEqual(['GenerationRecoverable', 'PublishDegraded'])
      expect(evaluator.payloadsFor('nonce-1')[0]?.pages_url).toBeNull()
    })

    it('stays completed when the callback cannot be delivered', async () => {
      const { orchestrator, evaluator } = createHarness()
      evaluator.defaultStatus = 500

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(status.state).toBe('completed')
      expect(evaluator.received).toHaveLength(3)
      expect(status.notification).toMatchObject({ delivered: false, attempts: 3, statusCode: 500 })
      expect(status.warnings.at(-1)).toEqual({
        kind: 'NotificationFailed',
        code: 'NOTIFICATION_FAILED',
        message: 'Callback delivery failed after 3 attempt(s): Callback answered HTTP 500',
        details: { attempts: 3, statusCode: 500 },
      })
    })
  })

  describe('budget', () => {
    it('fails a task whose stage outlives the budget', async () => {
      const { orchestrator, evaluator, transitionsOf } = createHarness({
        provider: new HangingProvider(),
        generationTimeoutMs: 10_000,
        orchestrator: { taskBudgetMs: 50 },
      })

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(transitionsOf('nonce-1')).toEqual(['queued→generating', 'generating→failed'])
      expect(status.error).toEqual({
        kind: 'BudgetExceeded',
        code: 'BUDGET_EXCEEDED',
        message: 'Task budget of 50ms exceeded',
        details: { budgetMs: 50, stage: 'generating' },
      })
      expect(evaluator.payloadsFor('nonce-1').map((p) => p.status)).toEqual(['failed'])
    })

    it('counts time spent waiting for a slot', async () => {
      const { orchestrator, transitionsOf } = createHarness({
        provider: new DelayedProvider(100),
        orchestrator: { taskBudgetMs: 150, maxConcurrentTasks: 1 },
      })

      orchestrator.submit(submission({ nonce: 'first', task: 'first-task' }))
      orchestrator.submit(submission({ nonce: 'second', task: 'second-task' }))
      const [first, second] = await Promise.all([
        orchestrator.waitForTask('first'),
        orchestrator.waitForTask('second'),
      ])

      expect(first.state).toBe('completed')
      expect(second.state).toBe('failed')
      expect(second.error?.kind).toBe('BudgetExceeded')
      expect(transitionsOf('second')).toEqual(['queued→generating', 'generating→failed'])
    })

    it('keeps a completed outcome when the callback is acknowledged after the budget', async () => {
      const { orchestrator, evaluator, transitionsOf } = createHarness({
        orchestrator: { taskBudgetMs: 150 },
      })
      evaluator.latencyMs = 300

      orchestrator.submit(submission())
      const status = await orchestrator.waitForTask('nonce-1')

      expect(status.state).toBe('completed')
      expect(status.error).toBeUndefined()
      expect(transitionsOf('nonce-1')).toEqual(HAPPY_PATH)
      expect(evaluator.payloadsFor('nonce-1').map((p) => p.status)).toEqual(['completed'])
      expect(status.notification).toMatchObject({ delivered: true, attempts: 1, statusCode: 200 })
    })
  })

  describe('concurrency', () => {
    it('never runs more tasks than the configured limit', async () => {
      const provider = new DelayedProvider(30)
      const { orchestrator } = createHarness({ provider, orchestrator: { maxConcurrentTasks: 2 } })

      for (const name of ['alpha', 'beta', 'gamma']) {
        orchestrator.submit(submission({ nonce: name, task: name }))
      }
      const results = await Promise.all(['alpha', 'beta', 'gamma'].map((n) => orchestrator.waitForTask(n)))

      expect(results.map((r) => r.state)).toEqual(['completed', 'completed', 'completed'])
      expect(provider.maxActive).toBe(2)
    })
  })

  describe('rounds', () => {
    const firstBrief = 'Create a captcha solver page with a button#solve and an element #result.'

    it('passes earlier briefs to the provider under the merge policy', async () => {
      const provider = new StaticProvider(sampleDocument('Captcha'))
      const { orchestrator } = createHarness({ provider, orchestrator: { briefPolicy: 'merge' } })

      orchestrator.submit(submission())
      await orchestrator.waitForTask('nonce-1')
      orchestrator.submit(submission({ nonce: 'nonce-2', round: 2, brief: 'Add a #history list of solved captchas.' }))
      const status = await orchestrator.waitForTask('nonce-2')

      expect(status.state).toBe('completed')
      expect(provider.prompts[1]).toContain(`Round 1: ${firstBrief}`)
    })

    it('sends only the current brief under the replace policy', async () => {
      const provider = new StaticProvider(sampleDocument('Captcha'))
      const { orchestrator } = createHarness({ provider })

      orchestrator.submit(submission())
      await orchestrator.waitForTask('nonce-1')
      orchestrator.submit(submission({ nonce: 'nonce-2', round: 2, brief: 'Add a #history list of solved captchas.' }))
      await orchestrator.waitForTask('nonce-2')

      expect(provider.prompts[1]).not.toContain('EARLIER ROUNDS')
    })

    it('commits a later round to the same repository', async () => {
      const { orchestrator, hosting } = createHarness({ provider: new StaticProvider(sampleDocument('Captcha')) })

      orchestrator.submit(submission())
      const first = await orchestrator.waitForTask('nonce-1')
      orchestrator.submit(submission({ nonce: 'nonce-2', round: 2, brief: 'Add a #history list of solved captchas.' }))
      const second = await orchestrator.waitForTask('nonce-2')

      expect(second.repositoryName).toBe(first.repositoryName)
      expect(hosting.callCount('createRepository')).toBe(1)
      expect(second.commitSha).toBe(hosting.headSha('captcha-solver'))
      expect(second.commitSha).not.toBe(first.commitSha)
    })
  })

  describe('queries', () => {
    it('throws TaskNotFoundError when waiting on an unknown nonce', async () => {
      const { orchestrator } = createHarness()
      await expect(orchestrator.waitForTask('missing')).rejects.toThrow(TaskNotFoundError)
    })

    it('returns undefined status for an unknown nonce', () => {
      const { orchestrator } = createHarness()
      expect(orchestrator.getStatus('missing')).toBeUndefined()
    })

    it('lists and counts tasks by state', async () => {
      const { orchestrator, hosting } = createHarness()
      orchestrator.submit(submission({ nonce: 'ok', task: 'good-task' }))
      await orchestrator.waitForTask('ok')
      hosting.failAlways('createRepository', new HostingError('Forbidden', 'PERMISSION_DENIED', 403))
      orchestrator.submit(submission({ nonce: 'bad', task: 'bad-task' }))
      await orchestrator.waitForTask('bad')

      expect(orchestrator.listTasks({ state: 'failed' }).map((t) => t.nonce)).toEqual(['bad'])
      expect(orchestrator.counts()).toMatchObject({ completed: 1, failed: 1, queued: 0 })
    })
  })

  describe('shutdown', () => {
    it('drains in-flight tasks and then refuses new ones', async () => {
      const { orchestrator } = createHarness({ provider: new DelayedProvider(20) })
      orchestrator.submit(submission())

      await orchestrator.shutdown()

      expect(orchestrator.getStatus('nonce-1')?.state).toBe('completed')
      expect(() => orchestrator.submit(submission({ nonce: 'late' }))).toThrow(EngineShutdownError)
    })
  })
})
