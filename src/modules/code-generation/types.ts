/**
 * Types for the code-generation module.
 */

import type { ArtifactSource, DecodedAttachment, TaskCheck } from '../../core/types.js'

/**
 * A text-completion backend. Implementations must honour `signal`.
 */
export interface GenerativeProvider {
  readonly id: string
  complete(prompt: string, options: { signal: AbortSignal }): Promise<string>
}

/** Brief of an earlier round, passed along under the `merge` policy */
export interface PreviousBrief {
  round: number
  brief: string
}

export interface GenerationInput {
  taskName: string
  round: number
  brief: string
  attachments: DecodedAttachment[]
  checks: TaskCheck[]
  previousBriefs: PreviousBrief[]
}

/** Why the deterministic generator produced the document */
export type FallbackReason =
  | 'PROVIDER_NOT_CONFIGURED'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'EMPTY_RESPONSE'
  | 'MALFORMED_DOCUMENT'
  | 'DOCUMENT_TOO_SHORT'

export interface GenerationResult {
  html: string
  source: ArtifactSource
  fallbackReason?: FallbackReason
  /** Provider error message or extraction detail, secrets masked */
  detail?: string
}

/** An element the page must contain, as named by the brief or a check */
export interface ElementSpec {
  id: string
  /** Lowercase tag name when the reference named one (`button#go`) */
  tag?: string
}
