/**
 * Tests for the error hierarchy and its conversion to the record form.
 */

import { describe, it, expect } from 'vitest'
import {
  BudgetExceededError,
  ConfigError,
  DuplicateNonceError,
  GenerationRecoverableError,
  PagesmithError,
  RepositoryNameExhaustedError,
  StageError,
  TaskNotFoundError,
  ValidationError,
  toTaskError,
} from '../errors.js'

describe('PagesmithError', () => {
  it('carries a code and context and serializes them', () => {
    const error = new ConfigError('bad value', { field: 'global.task_budget_ms' })
    expect(error).toBeInstanceOf(PagesmithError)
    expect(error.name).toBe('ConfigError')
    expect(error.toJSON()).toMatchObject({
      name: 'ConfigError',
      message: 'bad value',
      code: 'CONFIG_ERROR',
      context: { field: 'global.task_budget_ms' },
    })
  })

  it('is not part of the task taxonomy unless it is a StageError', () => {
    expect(new TaskNotFoundError('n-1')).not.toBeInstanceOf(StageError)
  })
})

describe('stage errors', () => {
  it('assigns the taxonomy kind', () => {
    expect(new BudgetExceededError(1_000).kind).toBe('BudgetExceeded')
    expect(new GenerationRecoverableError('x', 'PROVIDER_TIMEOUT').kind).toBe('GenerationRecoverable')
    expect(new RepositoryNameExhaustedError('site', ['site', 'site-2']).kind).toBe('RepositoryNameExhausted')
  })

  it('keeps duplicate nonces a validation error with its own code', () => {
    const error = new DuplicateNonceError('n-1')
    expect(error).toBeInstanceOf(ValidationError)
    expect(error.kind).toBe('ValidationError')
    expect(error.code).toBe('DUPLICATE_NONCE')
  })
})

describe('toTaskError', () => {
  it('converts stage errors with their context as details', () => {
    expect(toTaskError(new BudgetExceededError(5_000, { stage: 'committing' }))).toEqual({
      kind: 'BudgetExceeded',
      code: 'BUDGET_EXCEEDED',
      message: 'Task budget of 5000ms exceeded',
      details: { budgetMs: 5_000, stage: 'committing' },
    })
  })

  it('omits empty details', () => {
    expect(toTaskError(new ValidationError('bad'))).toEqual({
      kind: 'ValidationError',
      code: 'VALIDATION_ERROR',
      message: 'bad',
    })
  })

  it('maps anything else to InternalError', () => {
    expect(toTaskError(new TypeError('undefined is not a function'))).toEqual({
      kind: 'InternalError',
      code: 'INTERNAL_ERROR',
      message: 'undefined is not a function',
    })
    expect(toTaskError('plain string')).toEqual({ kind: 'InternalError', code: 'INTERNAL_ERROR', message: 'plain string' })
  })
})
