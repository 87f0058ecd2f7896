import { describe, it, expect, afterEach } from 'vitest'
import { createEngine } from '../engine-impl.js'
import type { Engine, EngineOptions } from '../engine.js'
import { createEventBus } from '../event-bus.js'
import { EngineShutdownError, ValidationError } from '../errors.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import type { PagesmithConfig } from '../../modules/config/config-schema.js'
import { RecordingEvaluator } from '../../../test/fakes/evaluator.js'
import { InMemoryHostingClient } from '../../../test/fakes/in-memory-hosting.js'
import { sampleDocument, StaticProvider } from '../../../test/fakes/providers.js'

const NOW = new Date('2026-01-02T03:04:05.000Z')

const config: PagesmithConfig = {
  ...DEFAULT_CONFIG,
  hosting: { ...DEFAULT_CONFIG.hosting, retry_base_ms: 1, retry_max_ms: 2 },
  callback: { ...DEFAULT_CONFIG.callback, retry_base_ms: 1, retry_max_ms: 2 },
}

const payload = {
  email: 'student@example.com',
  task: 'markdown-viewer',
  round: 1,
  nonce: 'engine-1',
  brief: 'Render the attached markdown into #output.',
  evaluation_url: 'https://eval.example.com/notify',
  secret: 'test-secret',
}

let engines: Engine[] = []

async function startEngine(overrides: Partial<EngineOptions> = {}): Promise<Engine> {
  const engine = await createEngine({
    config,
    env: { PAGESMITH_SUBMISSION_SECRET: 'test-secret' },
    provider: null,
    hostingClient: new InMemoryHostingClient(),
    fetch: new RecordingEvaluator().fetch,
    now: () => NOW,
    ...overrides,
  })
  engines.push(engine)
  return engine
}

afterEach(async () => {
  await Promise.all(engines.map((e) => e.shutdown()))
  engines = []
})

describe('createEngine', () => {
  it('emits engine:ready before resolving', async () => {
    const eventBus = createEventBus()
    let readyEvents = 0
    eventBus.on('engine:ready', () => {
      readyEvents++
    })

    const engine = await startEngine({ eventBus })

    expect(readyEvents).toBe(1)
    expect(engine.isReady).toBe(true)
    expect(engine.eventBus).toBe(eventBus)
  })
})

describe('Engine.health', () => {
  it('is degraded without a generative provider', async () => {
    const engine = await startEngine()

    expect(engine.health()).toEqual({
      status: 'degraded',
      ready: true,
      generatorConfigured: false,
      hostingConfigured: true,
      activeTasks: 0,
      tasks: { queued: 0, generating: 0, committing: 0, publishing: 0, notifying: 0, completed: 0, failed: 0 },
      timestamp: NOW.toISOString(),
    })
  })

  it('is degraded without hosting credentials', async () => {
    const engine = await startEngine({
      provider: new StaticProvider(sampleDocument('Viewer')),
      hostingClient: new InMemoryHostingClient({ configured: false }),
    })

    expect(engine.health()).toMatchObject({ status: 'degraded', generatorConfigured: true, hostingConfigured: false })
  })

  it('is ok with both configured', async () => {
    const engine = await startEngine({ provider: new StaticProvider(sampleDocument('Viewer')) })
    expect(engine.health().status).toBe('ok')
  })

  it('builds no provider when the API key variable is blank', async () => {
    const engine = await startEngine({
      env: { PAGESMITH_SUBMISSION_SECRET: 'test-secret', OPENAI_API_KEY: '  ' },
      provider: undefined,
    })
    expect(engine.health().generatorConfigured).toBe(false)
  })
})

describe('Engine.submit', () => {
  it('accepts a valid payload and runs it to completion', async () => {
    const hosting = new InMemoryHostingClient()
    const evaluator = new RecordingEvaluator()
    const engine = await startEngine({ hostingClient: hosting, fetch: evaluator.fetch })

    const accepted = engine.submit(payload)
    expect(accepted.state).toBe('queued')

    const status = await engine.waitForTask('engine-1')
    expect(status.state).toBe('completed')
    expect(status.repositoryUrl).toBe('https://github.com/octo/markdown-viewer')
    expect(evaluator.payloadsFor('engine-1').map((p) => p.status)).toEqual(['completed'])
    expect(engine.getStatus('engine-1')?.state).toBe('completed')
    expect(engine.listTasks().map((t) => t.nonce)).toEqual(['engine-1'])
  })

  it('rejects an invalid payload without creating a record', async () => {
    const engine = await startEngine()

    expect(() => engine.submit({ ...payload, round: 'one' })).toThrow(ValidationError)
    expect(engine.listTasks()).toEqual([])
  })

  it('rejects a payload with the wrong secret', async () => {
    const engine = await startEngine()

    let code: string | undefined
    try {
      engine.submit({ ...payload, secret: 'wrong-secret' })
    } catch (err) {
      if (err instanceof ValidationError) code = err.code
    }
    expect(code).toBe('INVALID_SECRET')
    expect(engine.getStatus('engine-1')).toBeUndefined()
  })

  it('skips the secret check when no secret is configured', async () => {
    const engine = await startEngine({ env: {} })

    engine.submit({ ...payload, secret: 'anything' })
    expect((await engine.waitForTask('engine-1')).state).toBe('completed')
  })
})

describe('Engine.shutdown', () => {
  it('drains tasks, reports shutting-down and refuses new work', async () => {
    const eventBus = createEventBus()
    const reasons: string[] = []
    eventBus.on('engine:shutdown', ({ reason }) => {
      reasons.push(reason)
    })
    const engine = await startEngine({ eventBus })
    engine.submit(payload)

    await engine.shutdown()
    await engine.shutdown()

    expect(reasons).toEqual(['shutdown() called'])
    expect(engine.getStatus('engine-1')?.state).toBe('completed')
    expect(engine.health()).toMatchObject({ status: 'shutting-down', ready: false })
    expect(() => engine.submit({ ...payload, nonce: 'engine-2' })).toThrow(EngineShutdownError)
  })
})
