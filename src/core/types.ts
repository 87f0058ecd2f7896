/**
 * Core types for Pagesmith
 * Shared type definitions used across all modules
 */

/** Caller-supplied token identifying one submission; the Status Store key */
export type Nonce = string

/** Severity level for errors and log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Lifecycle state of a TaskRecord */
export type TaskState =
  | 'queued'
  | 'generating'
  | 'committing'
  | 'publishing'
  | 'notifying'
  | 'completed'
  | 'failed'

/** Closed error taxonomy for task outcomes */
export type TaskErrorKind =
  | 'ValidationError'
  | 'GenerationRecoverable'
  | 'RepositoryNameExhausted'
  | 'RepositoryUnavailable'
  | 'PublishDegraded'
  | 'BudgetExceeded'
  | 'NotificationFailed'
  | 'InternalError'

/** Structured cause stored on a record or sent to the callback */
export interface TaskError {
  kind: TaskErrorKind
  code: string
  message: string
  details?: Record<string, unknown>
}

/** A client-side assertion the artifact should satisfy; opaque to the engine */
export type TaskCheck = string | Record<string, unknown>

/** Attachment as submitted: a filename and a `data:` URL */
export interface AttachmentRef {
  name: string
  url: string
}

/** Attachment after decoding */
export interface DecodedAttachment {
  name: string
  mimeType: string
  data: Uint8Array
  /** UTF-8 text when the payload is textual */
  text?: string
}

/** Validated inbound submission */
export interface TaskSubmission {
  email: string
  task: string
  round: number
  nonce: Nonce
  brief: string
  attachments: AttachmentRef[]
  checks: TaskCheck[]
  evaluationUrl: string
  endpoint: string
  secret: string
}

/** Where the generated document came from */
export type ArtifactSource = 'provider' | 'fallback'

/** Delivery outcome of the evaluation callback */
export interface NotificationOutcome {
  delivered: boolean
  attempts: number
  statusCode?: number
  deliveredAt?: string
  error?: TaskError
}

/** One accepted submission and everything the engine learned about it */
export interface TaskRecord {
  readonly nonce: Nonce
  readonly taskName: string
  readonly round: number
  readonly email: string
  readonly brief: string
  readonly attachments: DecodedAttachment[]
  readonly checks: TaskCheck[]
  readonly evaluationUrl: string
  readonly callerEndpoint: string
  state: TaskState
  generatedArtifact?: string
  artifactSource?: ArtifactSource
  repositoryName?: string
  repositoryUrl?: string
  commitSha?: string
  pagesUrl?: string
  error?: TaskError
  warnings: TaskError[]
  notification?: NotificationOutcome
  readonly createdAt: string
  updatedAt: string
}

/** Public-safe projection of a TaskRecord returned by status queries */
export interface TaskStatusView {
  nonce: Nonce
  task: string
  round: number
  state: TaskState
  artifactSource?: ArtifactSource
  repositoryName?: string
  repositoryUrl?: string
  commitSha?: string
  pagesUrl?: string
  error?: TaskError
  warnings: TaskError[]
  notification?: NotificationOutcome
  createdAt: string
  updatedAt: string
}

/** Handle to a repository on the hosting provider */
export interface RepositoryHandle {
  owner: string
  name: string
  fullName: string
  htmlUrl: string
  defaultBranch: string
}
