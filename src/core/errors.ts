/**
 * Error definitions for Pagesmith
 * Provides the structured error hierarchy and the closed task error taxonomy
 */

import type { TaskError, TaskErrorKind } from './types.js'

/** Base error class for all Pagesmith errors */
export class PagesmithError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PagesmithError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PagesmithError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PagesmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a status-store mutation would break a record invariant */
export class RecordInvariantError extends PagesmithError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RECORD_INVARIANT', context)
    this.name = 'RecordInvariantError'
  }
}

/** A status query named a nonce the engine never accepted */
export class TaskNotFoundError extends PagesmithError {
  constructor(nonce: string) {
    super(`No task with nonce ${nonce}`, 'TASK_NOT_FOUND', { nonce })
    this.name = 'TaskNotFoundError'
  }
}

// ---------------------------------------------------------------------------
// Task error taxonomy
// ---------------------------------------------------------------------------

/**
 * An error that belongs to the closed task error taxonomy.
 * `kind` is what ends up on the TaskRecord and in the callback payload.
 */
export class StageError extends PagesmithError {
  public readonly kind: TaskErrorKind

  constructor(
    kind: TaskErrorKind,
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, code, context)
    this.name = 'StageError'
    this.kind = kind
  }
}

/** Submission rejected before a TaskRecord exists */
export class ValidationError extends StageError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'VALIDATION_ERROR') {
    super('ValidationError', message, code, context)
    this.name = 'ValidationError'
  }
}

/** A submission reused a nonce the engine has already accepted */
export class DuplicateNonceError extends ValidationError {
  constructor(nonce: string) {
    super(`Nonce already accepted: ${nonce}`, { nonce }, 'DUPLICATE_NONCE')
    this.name = 'DuplicateNonceError'
  }
}

/** The engine is shutting down and no longer accepts submissions */
export class EngineShutdownError extends ValidationError {
  constructor() {
    super('Engine is shutting down; submission rejected', {}, 'ENGINE_SHUTDOWN')
    this.name = 'EngineShutdownError'
  }
}

/** Provider-side generation failure; always absorbed by the fallback generator */
export class GenerationRecoverableError extends StageError {
  constructor(message: string, reason: string, context: Record<string, unknown> = {}) {
    super('GenerationRecoverable', message, 'GENERATION_RECOVERABLE', { reason, ...context })
    this.name = 'GenerationRecoverableError'
  }
}

/** Every candidate repository name collided with an existing repository */
export class RepositoryNameExhaustedError extends StageError {
  constructor(taskName: string, attempted: string[]) {
    super(
      'RepositoryNameExhausted',
      `No free repository name for task "${taskName}" after ${String(attempted.length)} attempt(s)`,
      'REPOSITORY_NAME_EXHAUSTED',
      { taskName, attempted }
    )
    this.name = 'RepositoryNameExhaustedError'
  }
}

/** The hosting provider could not be reached or refused the operation */
export class RepositoryUnavailableError extends StageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('RepositoryUnavailable', message, 'REPOSITORY_UNAVAILABLE', context)
    this.name = 'RepositoryUnavailableError'
  }
}

/** Static hosting could not be enabled or resolved; the task degrades */
export class PublishDegradedError extends StageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('PublishDegraded', message, 'PUBLISH_DEGRADED', context)
    this.name = 'PublishDegradedError'
  }
}

/** The task's wall-clock budget ran out before it reached a terminal state */
export class BudgetExceededError extends StageError {
  constructor(budgetMs: number, context: Record<string, unknown> = {}) {
    super(
      'BudgetExceeded',
      `Task budget of ${String(budgetMs)}ms exceeded`,
      'BUDGET_EXCEEDED',
      { budgetMs, ...context }
    )
    this.name = 'BudgetExceededError'
  }
}

/** The evaluation callback could not be delivered */
export class NotificationFailedError extends StageError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('NotificationFailed', message, 'NOTIFICATION_FAILED', context)
    this.name = 'NotificationFailedError'
  }
}

// ---------------------------------------------------------------------------
// Conversion to the record form
// ---------------------------------------------------------------------------

/**
 * Convert any thrown value into the structured error stored on a TaskRecord.
 * Values outside the taxonomy become `InternalError`.
 */
export function toTaskError(err: unknown): TaskError {
  if (err instanceof StageError) {
    return {
      kind: err.kind,
      code: err.code,
      message: err.message,
      ...(Object.keys(err.context).length > 0 ? { details: err.context } : {}),
    }
  }
  const message = err instanceof Error ? err.message : String(err)
  return { kind: 'InternalError', code: 'INTERNAL_ERROR', message }
}
