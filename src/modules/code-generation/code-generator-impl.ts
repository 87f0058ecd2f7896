/**
 * CodeGeneratorImpl: provider first, deterministic fallback always.
 */

import type pino from 'pino'
import { GenerationRecoverableError } from '../../core/errors.js'
import { abortable, errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/masking.js'
import type { CodeGenerator } from './code-generator.js'
import { extractElementSpecs } from './element-specs.js'
import { renderFallbackPage, renderMinimalPage } from './fallback-generator.js'
import { extractHtmlDocument } from './html-document.js'
import { buildPrompt } from './prompt-builder.js'
import type { FallbackReason, GenerationInput, GenerationResult, GenerativeProvider, ElementSpec } from './types.js'

export interface CodeGeneratorOptions {
  provider?: GenerativeProvider
  timeoutMs: number
  maxAttachmentChars: number
  minDocumentChars: number
  logger?: pino.Logger
}

export class CodeGeneratorImpl implements CodeGenerator {
  private readonly _provider: GenerativeProvider | undefined
  private readonly _options: CodeGeneratorOptions
  private readonly _logger: pino.Logger

  constructor(options: CodeGeneratorOptions) {
    this._provider = options.provider
    this._options = options
    this._logger = options.logger ?? createLogger('code-generation')
  }

  get providerConfigured(): boolean {
    return this._provider !== undefined
  }

  async generate(input: GenerationInput, options: { signal?: AbortSignal } = {}): Promise<GenerationResult> {
    const elements = extractElementSpecs(input.brief, input.checks)
    const log = this._logger.child({ task: input.taskName, round: input.round })

    if (this._provider === undefined) {
      log.info('No generative provider configured; rendering fallback page')
      return this._fallback(input, elements, 'PROVIDER_NOT_CONFIGURED')
    }

    const prompt = buildPrompt(input, elements, { maxAttachmentChars: this._options.maxAttachmentChars })

    let raw: string
    try {
      raw = await this._complete(this._provider, prompt, options.signal)
    } catch (err) {
      const reason: FallbackReason =
        err instanceof GenerationRecoverableError && err.context['reason'] === 'PROVIDER_TIMEOUT'
          ? 'PROVIDER_TIMEOUT'
          : 'PROVIDER_ERROR'
      const detail = maskSecrets(errorMessage(err))
      log.warn({ provider: this._provider.id, reason, detail }, 'Generative provider failed; rendering fallback page')
      return this._fallback(input, elements, reason, detail)
    }

    const extracted = extractHtmlDocument(raw, this._options.minDocumentChars)
    if (!extracted.ok) {
      log.warn({ provider: this._provider.id, reason: extracted.reason, detail: extracted.detail }, 'Unusable provider response; rendering fallback page')
      return this._fallback(input, elements, extracted.reason, extracted.detail)
    }

    log.info({ provider: this._provider.id, chars: extracted.html.length }, 'Provider generated document')
    return { html: extracted.html, source: 'provider' }
  }

  /**
   * Call the provider under a timeout that also follows the caller's signal.
   */
  private async _complete(provider: GenerativeProvider, prompt: string, parent: AbortSignal | undefined): Promise<string> {
    const controller = new AbortController()
    const timeoutMs = this._options.timeoutMs
    const timer = setTimeout(() => {
      controller.abort(
        new GenerationRecoverableError(`Provider did not answer within ${String(timeoutMs)}ms`, 'PROVIDER_TIMEOUT', { timeoutMs })
      )
    }, timeoutMs)
    const onParentAbort = (): void => {
      controller.abort(parent?.reason)
    }
    if (parent?.aborted === true) onParentAbort()
    else parent?.addEventListener('abort', onParentAbort, { once: true })

    try {
      return await abortable(provider.complete(prompt, { signal: controller.signal }), controller.signal)
    } finally {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }
  }

  private _fallback(
    input: GenerationInput,
    elements: ElementSpec[],
    reason: FallbackReason,
    detail?: string
  ): GenerationResult {
    let html: string
    try {
      html = renderFallbackPage({
        taskName: input.taskName,
        round: input.round,
        brief: input.brief,
        attachments: input.attachments,
        checks: input.checks,
        elements,
      })
    } catch (err) {
      this._logger.error({ err }, 'Fallback rendering failed; using minimal page')
      html = renderMinimalPage(input.taskName, input.brief)
    }
    return { html, source: 'fallback', fallbackReason: reason, ...(detail !== undefined && { detail }) }
  }
}

/**
 * Create a CodeGenerator. Without a provider every call renders the fallback.
 */
export function createCodeGenerator(options: CodeGeneratorOptions): CodeGenerator {
  return new CodeGeneratorImpl(options)
}
