/**
 * Inbound submission validation.
 */

import { createHash, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import type { TaskSubmission } from '../../core/types.js'

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' })

export const AttachmentRefSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().min(1),
})

export const TaskCheckSchema = z.union([z.string(), z.record(z.unknown())])

/** Wire shape of a submission (snake_case, as callers send it) */
export const SubmissionSchema = z.object({
  email: z.string().trim().email(),
  task: z.string().trim().min(1).max(200),
  round: z.number().int().min(1),
  nonce: z.string().trim().min(1).max(200),
  brief: z.string().trim().min(1),
  attachments: z.array(AttachmentRefSchema).default([]),
  checks: z.array(TaskCheckSchema).default([]),
  evaluation_url: httpUrl,
  endpoint: z.string().default(''),
  secret: z.string().min(1),
})

export type SubmissionInput = z.input<typeof SubmissionSchema>

/**
 * Validate a raw submission.
 * @throws {ValidationError} listing every failing field
 */
export function parseSubmission(input: unknown): TaskSubmission {
  const result = SubmissionSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }))
    throw new ValidationError(
      `Invalid submission: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues }
    )
  }
  const data = result.data
  return {
    email: data.email,
    task: data.task,
    round: data.round,
    nonce: data.nonce,
    brief: data.brief,
    attachments: data.attachments,
    checks: data.checks,
    evaluationUrl: data.evaluation_url,
    endpoint: data.endpoint,
    secret: data.secret,
  }
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest()
}

/**
 * Compare the submitted secret with the configured one in constant time.
 * With no configured secret every submission passes.
 * @throws {ValidationError} code INVALID_SECRET
 */
export function verifySubmissionSecret(submission: TaskSubmission, expected: string | undefined): void {
  if (expected === undefined || expected === '') return
  if (!timingSafeEqual(digest(submission.secret), digest(expected))) {
    throw new ValidationError('Submission secret does not match', { nonce: submission.nonce }, 'INVALID_SECRET')
  }
}
