/**
 * CodeGenerator: turns a brief into a complete HTML document.
 *
 * `generate()` is total: any provider failure, timeout or unusable response
 * is absorbed by the deterministic fallback page, and the result says which
 * path produced it.
 */

import type { GenerationInput, GenerationResult } from './types.js'

export interface CodeGenerator {
  /** Whether a generative provider is configured */
  readonly providerConfigured: boolean

  generate(input: GenerationInput, options?: { signal?: AbortSignal }): Promise<GenerationResult>
}
