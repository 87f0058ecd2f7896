/**
 * GenerativeProvider backed by the `ai` SDK against an OpenAI-compatible
 * Chat Completions endpoint.
 */

import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import type { GenerativeProvider } from './types.js'

export interface AiSdkProviderOptions {
  apiKey: string
  model: string
  /** Omit for the SDK's default OpenAI endpoint */
  baseURL?: string
  /** Transport handed to the SDK; defaults to the global fetch */
  fetch?: typeof globalThis.fetch
}

export class AiSdkProvider implements GenerativeProvider {
  readonly id: string
  private readonly _options: AiSdkProviderOptions

  constructor(options: AiSdkProviderOptions) {
    this._options = options
    this.id = `openai-compatible:${options.model}`
  }

  async complete(prompt: string, options: { signal: AbortSignal }): Promise<string> {
    const provider = createOpenAI({
      apiKey: this._options.apiKey,
      ...(this._options.baseURL !== undefined && { baseURL: this._options.baseURL }),
      ...(this._options.fetch !== undefined && { fetch: this._options.fetch }),
    })
    // chat() targets Chat Completions, which OpenAI-compatible gateways implement
    const { text } = await generateText({
      model: provider.chat(this._options.model),
      prompt,
      abortSignal: options.signal,
      // Retries belong to the caller's budget, not the SDK
      maxRetries: 0,
    })
    return text
  }
}
